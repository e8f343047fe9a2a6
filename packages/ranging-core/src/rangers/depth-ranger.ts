// ---------------------------------------------------------------------------
// Depth-Based Ranging — calibrated monocular inverse depth
// ---------------------------------------------------------------------------
// The depth model outputs relative inverse depth (larger = closer):
//   distance = scaleFactor / inverseDepth
// scaleFactor comes from a single known-distance calibration.

import type { DepthRaster, Detection, FrameSize, Point2D, RangeComponent } from '../types.js';
import { pixelCenter } from '../geometry.js';

export const TARGET_WINDOW_PX = 50;
export const CENTER_WINDOW_PX = 100;
export const SAMPLE_STRIDE = 4;

export const DEPTH_MIN_DISTANCE = 0.5;
export const DEPTH_MAX_DISTANCE = 2000;

/** Below any well-conditioned size estimate: absolute scale is approximate. */
export const DEPTH_CONFIDENCE = 0.5;
export const DEPTH_WEIGHT = 0.3;

/**
 * Collect finite, positive raster values from a square window given in
 * frame pixels. The window is rescaled per axis into raster coordinates,
 * clipped to the raster, and sampled every `stride` pixels.
 */
export function sampleDepthWindow(
  depth: DepthRaster,
  center: Point2D,
  windowPx: number,
  frame: FrameSize,
  stride: number = SAMPLE_STRIDE,
): number[] {
  if (frame.width <= 0 || frame.height <= 0 || stride < 1) return [];

  const sx = depth.width / frame.width;
  const sy = depth.height / frame.height;
  const half = windowPx / 2;

  const startX = Math.max(0, Math.floor((center.x - half) * sx));
  const startY = Math.max(0, Math.floor((center.y - half) * sy));
  const endX = Math.min(depth.width, Math.floor((center.x + half) * sx));
  const endY = Math.min(depth.height, Math.floor((center.y + half) * sy));

  const values: number[] = [];
  for (let y = startY; y < endY; y += stride) {
    const row = y * depth.width;
    for (let x = startX; x < endX; x += stride) {
      const v = depth.data[row + x];
      if (v !== undefined && Number.isFinite(v) && v > 0) values.push(v);
    }
  }
  return values;
}

/** Upper median (`sorted[⌊n/2⌋]`); undefined for an empty list. */
export function medianOf(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Range the target (or the frame centre when there is none) from the
 * depth raster. Returns undefined when there is no raster, no valid
 * sample, or the distance falls outside [0.5, 2000] m.
 */
export function rangeByDepth(
  depth: DepthRaster | undefined,
  target: Detection | undefined,
  frame: FrameSize,
  scaleFactor: number,
): RangeComponent | undefined {
  if (!depth) return undefined;

  const center = target
    ? pixelCenter(target.box)
    : { x: frame.width / 2, y: frame.height / 2 };
  const windowPx = target ? TARGET_WINDOW_PX : CENTER_WINDOW_PX;

  const median = medianOf(sampleDepthWindow(depth, center, windowPx, frame));
  if (median === undefined) return undefined;

  const distance = scaleFactor / median;
  if (!(distance >= DEPTH_MIN_DISTANCE && distance <= DEPTH_MAX_DISTANCE)) return undefined;

  return {
    method: 'depth',
    distance,
    confidence: DEPTH_CONFIDENCE,
    weight: DEPTH_WEIGHT,
    details: `AI depth estimation (median of ${windowPx}px window)`,
  };
}
