// ---------------------------------------------------------------------------
// Depth scale calibration
// ---------------------------------------------------------------------------
// distance = scale / inverseDepth  ⇒  scale = knownDistance × inverseDepth

import type { Result } from '../types.js';
import { err, ok } from '../types.js';

export type CalibrationErrorCode = 'INVALID_DEPTH_VALUE' | 'INVALID_DISTANCE';

export interface CalibrationError {
  code: CalibrationErrorCode;
  message: string;
}

export const DEFAULT_DEPTH_SCALE = 1.0;

/**
 * Holds the depth scale factor. One ground-truth pair (a target at a
 * known distance and the inverse depth read at it) sets the scale until
 * the next calibration. Persisting it across restarts is up to the caller.
 */
export class DepthCalibration {
  private _scaleFactor: number;

  constructor(initialScale: number = DEFAULT_DEPTH_SCALE) {
    this._scaleFactor = initialScale;
  }

  get scaleFactor(): number {
    return this._scaleFactor;
  }

  /**
   * Derive the scale factor from a known distance. A rejected pair
   * leaves the current scale untouched.
   */
  calibrate(knownDistanceMeters: number, measuredInverseDepth: number): Result<number, CalibrationError> {
    if (!Number.isFinite(measuredInverseDepth) || measuredInverseDepth <= 0) {
      return err({
        code: 'INVALID_DEPTH_VALUE',
        message: `Measured depth value must be a positive number, got ${measuredInverseDepth}`,
      });
    }
    if (!Number.isFinite(knownDistanceMeters) || knownDistanceMeters <= 0) {
      return err({
        code: 'INVALID_DISTANCE',
        message: `Known distance must be a positive number of metres, got ${knownDistanceMeters}`,
      });
    }

    this._scaleFactor = knownDistanceMeters * measuredInverseDepth;
    return ok(this._scaleFactor);
  }

  /** Metres for an inverse-depth value under the current scale. */
  distanceFor(inverseDepth: number): number | undefined {
    return inverseDepth > 0 ? this._scaleFactor / inverseDepth : undefined;
  }
}
