// ---------------------------------------------------------------------------
// Size-Based Ranging Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import type { KnownObjectSize } from '@rangefinder/object-sizes';
import {
  rangeBySize,
  measurePixels,
  pinholeDistance,
  sizePenalty,
  aspectPenalty,
  distancePenalty,
} from '../rangers/size-ranger.js';
import type { CameraIntrinsics, Detection } from '../types.js';

const person: KnownObjectSize = {
  label: 'person',
  displayName: 'Adult',
  category: 'human',
  axis: 'height',
  sizeMeters: 1.7,
  variability: 0.08,
  reliability: 0.9,
  aspectRatio: 0.4,
};

const car: KnownObjectSize = {
  label: 'car',
  displayName: 'Car (side)',
  category: 'vehicle',
  axis: 'width',
  sizeMeters: 4.5,
  variability: 0.12,
  reliability: 0.75,
  aspectRatio: 3,
};

const intrinsics: CameraIntrinsics = { fx: 1400, fy: 1400 };

function detection(width: number, height: number, confidence = 0.9, label = 'person'): Detection {
  return { label, confidence, box: { x: 10, y: 20, width, height }, timestamp: 0 };
}

describe('Size-Based Ranging', () => {
  describe('pinhole model', () => {
    it('computes realSize × focal / pixelSize', () => {
      expect(pinholeDistance(1.7, 1400, 150)).toBeCloseTo(15.8667, 4);
      expect(pinholeDistance(2, 1000, 100)).toBe(20);
    });

    it('measures height axes with fy', () => {
      const m = measurePixels({ x: 0, y: 0, width: 30, height: 80 }, 'shoulder-height', { fx: 1000, fy: 1200 });
      expect(m).toEqual({ pixelSize: 80, focalLength: 1200 });
    });

    it('measures the width axis with fy', () => {
      const m = measurePixels({ x: 0, y: 0, width: 30, height: 80 }, 'width', { fx: 1000, fy: 1200 });
      expect(m).toEqual({ pixelSize: 30, focalLength: 1200 });
    });

    it('measures the diagonal axis as √(w² + h²)', () => {
      const m = measurePixels({ x: 0, y: 0, width: 30, height: 40 }, 'diagonal', { fx: 1000, fy: 1200 });
      expect(m.pixelSize).toBe(50);
      expect(m.focalLength).toBe(1200);
    });
  });

  describe('confidence penalties', () => {
    it('scales linearly below 50 px', () => {
      expect(sizePenalty(25)).toBe(0.5);
      expect(sizePenalty(5)).toBe(0.1);
    });

    it('ramps from 0.8 to 1.0 between 50 and 100 px', () => {
      expect(sizePenalty(50)).toBe(0.8);
      expect(sizePenalty(75)).toBeCloseTo(0.9, 10);
      expect(sizePenalty(100)).toBe(1);
      expect(sizePenalty(400)).toBe(1);
    });

    it('penalizes aspect deviation', () => {
      expect(aspectPenalty(0.4, 0.4)).toBe(1);
      expect(aspectPenalty(0.56, 0.4)).toBe(0.8);
      expect(aspectPenalty(0.7, 0.4)).toBe(0.6);
    });

    it('decays beyond 500 m', () => {
      expect(distancePenalty(500)).toBe(1);
      expect(distancePenalty(1000)).toBe(0.5);
    });
  });

  describe('rangeBySize', () => {
    it('ranges a standing adult at 150 px', () => {
      const c = rangeBySize(detection(60, 150), person, intrinsics);
      expect(c).toBeDefined();
      expect(c?.distance).toBeCloseTo(15.87, 2);
      expect(c?.confidence).toBeCloseTo(0.864, 10);
      expect(c?.weight).toBeCloseTo(0.864 * 0.9, 10);
      expect(c?.method).toBe('size-human');
      expect(c?.label).toBe('Adult');
      expect(c?.details).toBe('1.7m object at 150px');
    });

    it('maps the category to the method', () => {
      const c = rangeBySize(detection(90, 30, 0.8, 'car'), car, { fx: 1000, fy: 2000 });
      expect(c?.method).toBe('size-vehicle');
      expect(c?.distance).toBe(100);
    });

    it('ranges a width record against fy when fx differs', () => {
      const c = rangeBySize(detection(300, 100, 0.8, 'car'), car, { fx: 1000, fy: 1400 });
      // 4.5 × 1400 / 300
      expect(c?.distance).toBe(21);
      expect(c?.details).toBe('4.5m object at 300px');
    });

    it('returns undefined for an unknown label', () => {
      expect(rangeBySize(detection(60, 150), undefined, intrinsics)).toBeUndefined();
    });

    it('rejects boxes under 5 px on the measured axis', () => {
      expect(rangeBySize(detection(2, 4.9), person, intrinsics)).toBeUndefined();
    });

    it('accepts a box of exactly 5 px', () => {
      const c = rangeBySize(detection(2, 5), person, intrinsics);
      expect(c?.distance).toBeCloseTo(476, 6);
      // 476 m is inside the long-range band, so no distance penalty
      expect(c?.confidence).toBeCloseTo(0.9 * 0.1 * 0.96, 10);
    });

    it('rejects distances under 1 m', () => {
      expect(rangeBySize(detection(400, 1000), person, { fx: 500, fy: 500 })).toBeUndefined();
    });

    it('rejects distances over 2000 m', () => {
      const tower: KnownObjectSize = { ...person, category: 'structure', sizeMeters: 10 };
      expect(rangeBySize(detection(4, 9), tower, { fx: 2000, fy: 2000 })).toBeUndefined();
    });

    it('keeps a distance of exactly 2000 m', () => {
      const post: KnownObjectSize = { ...person, category: 'structure', sizeMeters: 2 };
      const c = rangeBySize(detection(2, 5), post, { fx: 5000, fy: 5000 });
      expect(c?.distance).toBe(2000);
      expect(c?.method).toBe('size-structure');
    });

    it('applies the long-range penalty', () => {
      const c = rangeBySize(detection(400, 1000), { ...person, sizeMeters: 1 }, { fx: 1_000_000, fy: 1_000_000 });
      // 1 × 1e6 / 1000 = 1000 m; aspect 0.4 matches
      expect(c?.distance).toBe(1000);
      expect(c?.confidence).toBeCloseTo(0.9 * 0.96 * 0.5, 10);
    });

    it('applies the occlusion penalty for a squat box', () => {
      const c = rangeBySize(detection(150, 150), person, intrinsics);
      expect(c?.confidence).toBeCloseTo(0.9 * 0.96 * 0.6, 10);
    });
  });
});
