/**
 * Property-based tests for ranging guarantees: pinhole consistency,
 * output bounds, fusion envelope, and calibration round trips.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { KnownObjectSize } from '@rangefinder/object-sizes';
import { MEASUREMENT_AXES, OBJECT_CATEGORIES } from '@rangefinder/object-sizes';
import { rangeBySize, measurePixels } from '../rangers/size-ranger.js';
import { rangeByDepth } from '../rangers/depth-ranger.js';
import { fuseComponents, MIN_RELATIVE_UNCERTAINTY } from '../fusion/fusion.js';
import { DepthCalibration } from '../calibration/depth-calibration.js';
import type { Detection, RangeComponent } from '../types.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const unit = () => fc.double({ min: 0, max: 1, noNaN: true });

const knownSize: fc.Arbitrary<KnownObjectSize> = fc.record({
  label: fc.constant('thing'),
  displayName: fc.constant('Thing'),
  category: fc.constantFrom(...OBJECT_CATEGORIES),
  axis: fc.constantFrom(...MEASUREMENT_AXES),
  sizeMeters: fc.double({ min: 0.05, max: 100, noNaN: true }),
  variability: unit(),
  reliability: unit(),
  aspectRatio: fc.double({ min: 0.05, max: 10, noNaN: true }),
});

const detection: fc.Arbitrary<Detection> = fc.record({
  label: fc.constant('thing'),
  confidence: unit(),
  box: fc.record({
    x: fc.constant(0),
    y: fc.constant(0),
    width: fc.double({ min: 0, max: 5000, noNaN: true }),
    height: fc.double({ min: 0, max: 5000, noNaN: true }),
  }),
  timestamp: fc.constant(0),
});

const focal = fc.double({ min: 100, max: 20_000, noNaN: true });

const component: fc.Arbitrary<RangeComponent> = fc.record({
  method: fc.constantFrom('size-human', 'size-vehicle', 'depth'),
  distance: fc.double({ min: 0.5, max: 2000, noNaN: true }),
  confidence: unit(),
  weight: fc.double({ min: 0.01, max: 1, noNaN: true }),
  details: fc.constant('generated'),
});

// ---------------------------------------------------------------------------
// Size ranger
// ---------------------------------------------------------------------------

describe('size ranger properties', () => {
  it('follows the pinhole relation for every emitted distance', () => {
    fc.assert(fc.property(detection, knownSize, focal, focal, (det, known, fx, fy) => {
      const c = rangeBySize(det, known, { fx, fy });
      if (!c) return;
      const { pixelSize, focalLength } = measurePixels(det.box, known.axis, { fx, fy });
      expect(c.distance).toBeCloseTo((known.sizeMeters * focalLength) / pixelSize, 6);
    }));
  });

  it('never emits a distance outside [1, 2000] m', () => {
    fc.assert(fc.property(detection, knownSize, focal, focal, (det, known, fx, fy) => {
      const c = rangeBySize(det, known, { fx, fy });
      if (!c) return;
      expect(c.distance).toBeGreaterThanOrEqual(1);
      expect(c.distance).toBeLessThanOrEqual(2000);
    }));
  });

  it('keeps confidence and weight in [0, 1]', () => {
    fc.assert(fc.property(detection, knownSize, focal, focal, (det, known, fx, fy) => {
      const c = rangeBySize(det, known, { fx, fy });
      if (!c) return;
      expect(c.confidence).toBeGreaterThanOrEqual(0);
      expect(c.confidence).toBeLessThanOrEqual(1);
      expect(c.weight).toBeGreaterThanOrEqual(0);
      expect(c.weight).toBeLessThanOrEqual(1);
    }));
  });
});

// ---------------------------------------------------------------------------
// Depth ranger
// ---------------------------------------------------------------------------

describe('depth ranger properties', () => {
  it('never emits a distance outside [0.5, 2000] m', () => {
    fc.assert(fc.property(
      fc.double({ min: 1e-4, max: 100, noNaN: true }),
      fc.double({ min: 1e-3, max: 1e5, noNaN: true }),
      (value, scale) => {
        const raster = { width: 16, height: 16, data: new Float64Array(256).fill(value) };
        const c = rangeByDepth(raster, undefined, { width: 16, height: 16 }, scale);
        if (!c) return;
        expect(c.distance).toBeGreaterThanOrEqual(0.5);
        expect(c.distance).toBeLessThanOrEqual(2000);
      },
    ));
  });

  it('returns the calibration distance for the calibration depth value', () => {
    fc.assert(fc.property(
      fc.double({ min: 1, max: 1500, noNaN: true }),
      fc.double({ min: 0.01, max: 10, noNaN: true }),
      (known, value) => {
        const cal = new DepthCalibration();
        expect(cal.calibrate(known, value).ok).toBe(true);
        const raster = { width: 16, height: 16, data: new Float64Array(256).fill(value) };
        const c = rangeByDepth(raster, undefined, { width: 16, height: 16 }, cal.scaleFactor);
        expect(c).toBeDefined();
        expect(Math.abs((c?.distance ?? 0) - known)).toBeLessThanOrEqual(known * 1e-9);
      },
    ));
  });
});

// ---------------------------------------------------------------------------
// Fusion
// ---------------------------------------------------------------------------

describe('fusion properties', () => {
  it('passes a single component through unchanged', () => {
    fc.assert(fc.property(component, (c) => {
      const fused = fuseComponents([c]);
      expect(fused?.distance).toBe(c.distance);
      expect(fused?.method).toBe(c.method);
    }));
  });

  it('keeps the fused distance between the extremes', () => {
    fc.assert(fc.property(fc.array(component, { minLength: 2, maxLength: 6 }), (cs) => {
      const fused = fuseComponents(cs);
      expect(fused).toBeDefined();
      const distances = cs.map(c => c.distance);
      expect(fused?.distance).toBeGreaterThanOrEqual(Math.min(...distances));
      expect(fused?.distance).toBeLessThanOrEqual(Math.max(...distances));
    }));
  });

  it('floors uncertainty at 3% of the fused distance', () => {
    fc.assert(fc.property(fc.array(component, { minLength: 2, maxLength: 6 }), (cs) => {
      const fused = fuseComponents(cs);
      if (!fused) return;
      expect(fused.uncertainty).toBeGreaterThanOrEqual(fused.distance * MIN_RELATIVE_UNCERTAINTY);
      expect(fused.confidence).toBeGreaterThanOrEqual(0);
      expect(fused.confidence).toBeLessThanOrEqual(1);
    }));
  });
});
