// ---------------------------------------------------------------------------
// Size-Based Ranging — pinhole camera model
// ---------------------------------------------------------------------------
// Similar triangles: realSize / distance = pixelSize / focalLength
//   ⇒ distance = realSize × focalLength / pixelSize

import type { KnownObjectSize, MeasurementAxis } from '@rangefinder/object-sizes';
import type { CameraIntrinsics, Detection, PixelBox, RangeComponent } from '../types.js';
import { assertNever, methodForCategory } from '../types.js';
import { boxAspect, pixelDiagonal } from '../geometry.js';

export const SIZE_MIN_PIXELS = 5;
export const SIZE_MIN_DISTANCE = 1;
export const SIZE_MAX_DISTANCE = 2000;

/** Beyond this distance confidence decays as 500 / distance. */
export const LONG_RANGE_DISTANCE = 500;

export interface PixelMeasurement {
  pixelSize: number;
  focalLength: number;
}

/**
 * Pixel extent along the record's measurement axis, paired with the
 * focal length. Every axis ranges against fy.
 */
export function measurePixels(
  box: PixelBox,
  axis: MeasurementAxis,
  intrinsics: CameraIntrinsics,
): PixelMeasurement {
  switch (axis) {
    case 'height':
    case 'shoulder-height':
      return { pixelSize: box.height, focalLength: intrinsics.fy };
    case 'width':
      return { pixelSize: box.width, focalLength: intrinsics.fy };
    case 'diagonal':
      return { pixelSize: pixelDiagonal(box), focalLength: intrinsics.fy };
    default:
      return assertNever(axis);
  }
}

export function pinholeDistance(realSizeMeters: number, focalLength: number, pixelSize: number): number {
  return (realSizeMeters * focalLength) / pixelSize;
}

/** Small boxes carry more quantization error. */
export function sizePenalty(pixelSize: number): number {
  if (pixelSize < 50) return pixelSize / 50;
  if (pixelSize < 100) return 0.8 + (pixelSize - 50) / 250;
  return 1;
}

/** An unexpected aspect ratio suggests occlusion or an unusual pose. */
export function aspectPenalty(actualAspect: number, expectedAspect: number): number {
  const deviation = Math.abs(actualAspect - expectedAspect) / Math.max(expectedAspect, 0.1);
  if (deviation > 0.5) return 0.6;
  if (deviation > 0.3) return 0.8;
  return 1;
}

export function distancePenalty(distance: number): number {
  return distance > LONG_RANGE_DISTANCE ? LONG_RANGE_DISTANCE / distance : 1;
}

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}

export function sizeConfidence(
  detection: Detection,
  known: KnownObjectSize,
  pixelSize: number,
  distance: number,
): number {
  const c =
    detection.confidence *
    sizePenalty(pixelSize) *
    (1 - known.variability * 0.5) *
    aspectPenalty(boxAspect(detection.box), known.aspectRatio) *
    distancePenalty(distance);
  return Number.isFinite(c) ? clamp01(c) : 0;
}

/**
 * Range one detection against its known real-world size.
 * Returns undefined for an unknown label, a box under 5 px on the
 * measured axis, or a distance outside [1, 2000] m.
 */
export function rangeBySize(
  detection: Detection,
  known: KnownObjectSize | undefined,
  intrinsics: CameraIntrinsics,
): RangeComponent | undefined {
  if (!known) return undefined;

  const { pixelSize, focalLength } = measurePixels(detection.box, known.axis, intrinsics);
  if (!(pixelSize >= SIZE_MIN_PIXELS)) return undefined;

  const distance = pinholeDistance(known.sizeMeters, focalLength, pixelSize);
  if (!(distance >= SIZE_MIN_DISTANCE && distance <= SIZE_MAX_DISTANCE)) return undefined;

  const confidence = sizeConfidence(detection, known, pixelSize, distance);

  return {
    method: methodForCategory(known.category),
    distance,
    confidence,
    weight: clamp01(confidence * known.reliability),
    label: known.displayName,
    details: `${known.sizeMeters.toFixed(1)}m object at ${pixelSize.toFixed(0)}px`,
  };
}
