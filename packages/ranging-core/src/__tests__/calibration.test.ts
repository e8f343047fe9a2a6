// ---------------------------------------------------------------------------
// Depth Calibration Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { DepthCalibration, DEFAULT_DEPTH_SCALE } from '../calibration/depth-calibration.js';
import { rangeByDepth } from '../rangers/depth-ranger.js';
import type { DepthRaster } from '../types.js';

describe('DepthCalibration', () => {
  it('starts at the default scale', () => {
    expect(new DepthCalibration().scaleFactor).toBe(DEFAULT_DEPTH_SCALE);
  });

  it('sets scale = knownDistance × inverseDepth', () => {
    const cal = new DepthCalibration();
    const result = cal.calibrate(100, 0.5);
    expect(result).toEqual({ ok: true, value: 50 });
    expect(cal.scaleFactor).toBe(50);
  });

  it('rejects a non-positive depth value and keeps the scale', () => {
    const cal = new DepthCalibration(12);
    const result = cal.calibrate(100, 0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_DEPTH_VALUE');
    expect(cal.scaleFactor).toBe(12);
  });

  it('rejects a non-finite depth value', () => {
    const result = new DepthCalibration().calibrate(100, Number.NaN);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_DEPTH_VALUE');
  });

  it('rejects a non-positive known distance', () => {
    const cal = new DepthCalibration(12);
    const result = cal.calibrate(-5, 0.5);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_DISTANCE');
      expect(result.error.message).toBe('Known distance must be a positive number of metres, got -5');
    }
    expect(cal.scaleFactor).toBe(12);
  });

  it('converts inverse depth to metres', () => {
    const cal = new DepthCalibration(50);
    expect(cal.distanceFor(0.5)).toBe(100);
    expect(cal.distanceFor(0)).toBeUndefined();
  });

  it('reproduces the known distance from the same depth reading', () => {
    const cal = new DepthCalibration();
    cal.calibrate(250, 0.25);
    const raster: DepthRaster = { width: 32, height: 32, data: new Float32Array(32 * 32).fill(0.25) };
    const c = rangeByDepth(raster, undefined, { width: 32, height: 32 }, cal.scaleFactor);
    expect(c?.distance).toBe(250);
  });
});
