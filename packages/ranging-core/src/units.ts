import type { DisplayUnit } from '@rangefinder/config';
import type { RangeEstimate } from './types.js';
import { assertNever } from './types.js';

export const METERS_PER_YARD = 0.9144;
export const METERS_PER_FOOT = 0.3048;

export function metersTo(meters: number, unit: DisplayUnit): number {
  switch (unit) {
    case 'meters': return meters;
    case 'yards': return meters / METERS_PER_YARD;
    case 'feet': return meters / METERS_PER_FOOT;
    default: return assertNever(unit);
  }
}

export function toMeters(value: number, unit: DisplayUnit): number {
  switch (unit) {
    case 'meters': return value;
    case 'yards': return value * METERS_PER_YARD;
    case 'feet': return value * METERS_PER_FOOT;
    default: return assertNever(unit);
  }
}

export function unitSymbol(unit: DisplayUnit): string {
  switch (unit) {
    case 'meters': return 'm';
    case 'yards': return 'yd';
    case 'feet': return 'ft';
    default: return assertNever(unit);
  }
}

export function formatDistance(estimate: RangeEstimate, unit: DisplayUnit = 'yards', precision = 0): string {
  return metersTo(estimate.distanceMeters, unit).toFixed(precision);
}

export function formatUncertainty(estimate: RangeEstimate, unit: DisplayUnit = 'yards', precision = 0): string {
  return `±${metersTo(estimate.uncertaintyMeters, unit).toFixed(precision)}`;
}
