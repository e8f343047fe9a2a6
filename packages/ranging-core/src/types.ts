// ---------------------------------------------------------------------------
// @rangefinder/ranging-core — Ranging Types
// ---------------------------------------------------------------------------

import type { ObjectCategory } from '@rangefinder/object-sizes';

// ---------------------------------------------------------------------------
// Frame input
// ---------------------------------------------------------------------------

export interface PixelBox {
  /** Top-left x (pixels). */
  x: number;
  /** Top-left y (pixels). */
  y: number;
  /** Width (pixels, > 0). */
  width: number;
  /** Height (pixels, > 0). */
  height: number;
}

export interface Point2D {
  x: number;
  y: number;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface Detection {
  /** Class label from the detector (open namespace). */
  label: string;
  /** Detection confidence in [0,1]. */
  confidence: number;
  /** Bounding box in frame pixels, top-left origin. */
  box: PixelBox;
  /** Capture time (ms since epoch). */
  timestamp: number;
}

/** Pinhole intrinsics; only the focal lengths are used for ranging. */
export interface CameraIntrinsics {
  /** Focal length in pixels (x-axis). */
  fx: number;
  /** Focal length in pixels (y-axis). */
  fy: number;
  /** Principal point x (pixels). */
  cx?: number;
  /** Principal point y (pixels). */
  cy?: number;
  /** Frame size the intrinsics were computed for. */
  reference?: FrameSize;
}

/**
 * Single-channel inverse depth (larger = closer), row-major.
 * Co-registered with the frame but not necessarily the same resolution.
 */
export interface DepthRaster {
  width: number;
  height: number;
  data: Float32Array | Float64Array;
}

export interface FrameResult {
  detections: Detection[];
  depth?: DepthRaster;
  intrinsics: CameraIntrinsics;
  frameSize: FrameSize;
  timestamp: number;
}

// ---------------------------------------------------------------------------
// Ranging methods
// ---------------------------------------------------------------------------

export type SizeRangingMethod =
  | 'size-human'
  | 'size-vehicle'
  | 'size-wildlife'
  | 'size-structure'
  | 'size-sign';

export type RangingMethod = SizeRangingMethod | 'depth' | 'fused';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

export function methodForCategory(category: ObjectCategory): SizeRangingMethod {
  switch (category) {
    case 'human': return 'size-human';
    case 'vehicle': return 'size-vehicle';
    case 'wildlife': return 'size-wildlife';
    case 'structure': return 'size-structure';
    case 'sign': return 'size-sign';
    default: return assertNever(category);
  }
}

export function methodDisplayName(method: RangingMethod): string {
  switch (method) {
    case 'size-human': return 'Size (Human)';
    case 'size-vehicle': return 'Size (Vehicle)';
    case 'size-wildlife': return 'Size (Wildlife)';
    case 'size-structure': return 'Size (Structure)';
    case 'size-sign': return 'Size (Sign)';
    case 'depth': return 'Depth AI';
    case 'fused': return 'Fused';
    default: return assertNever(method);
  }
}

// ---------------------------------------------------------------------------
// Ranging output
// ---------------------------------------------------------------------------

export interface RangeComponent {
  method: RangingMethod;
  /** Distance in metres (> 0). */
  distance: number;
  confidence: number;
  /** Fusion weight in [0,1]. */
  weight: number;
  /** Display name of the sized object; absent for depth. */
  label?: string;
  details: string;
}

export type RangeQuality = 'excellent' | 'good' | 'fair' | 'poor';

export interface RangeEstimate {
  /** Published distance in metres (after smoothing when enabled). */
  distanceMeters: number;
  /** Fused distance before the temporal filter. */
  rawDistanceMeters: number;
  confidence: number;
  method: RangingMethod;
  /** One-sigma uncertainty in metres. */
  uncertaintyMeters: number;
  /** Uncertainty as % of distance; 0 when distance is 0. */
  uncertaintyPercent: number;
  quality: RangeQuality;
  locked: boolean;
  components: readonly RangeComponent[];
  timestamp: number;
}

/**
 * One engine output per frame. `none` means no method produced a
 * component; a low-confidence measurement is still an `estimate`.
 */
export type RangeReading =
  | { readonly kind: 'none'; readonly timestamp: number }
  | { readonly kind: 'estimate'; readonly estimate: RangeEstimate };

export type RangeTrend = 'approaching' | 'receding' | 'steady' | 'unknown';

// ---------------------------------------------------------------------------
// Temporal filter
// ---------------------------------------------------------------------------

export interface FilterState {
  /** Current estimate (metres). */
  estimate: number;
  /** Current estimate variance (m²). */
  variance: number;
}

export interface FilterConfig {
  /** Process noise variance added per step (m²). */
  processNoise: number;
  /** Measurement noise variance used when none is given (m²). */
  measurementNoise: number;
}

// ---------------------------------------------------------------------------
// Recoverable outcomes
// ---------------------------------------------------------------------------

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
