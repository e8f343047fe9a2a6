import type { RangeQuality } from '../types.js';
import { assertNever } from '../types.js';

export function uncertaintyPercent(distance: number, uncertainty: number): number {
  return distance > 0 ? (uncertainty / distance) * 100 : 0;
}

/** Coarse display tier from confidence and relative uncertainty. */
export function classifyQuality(confidence: number, uncertaintyPct: number): RangeQuality {
  if (confidence > 0.8 && uncertaintyPct < 5) return 'excellent';
  if (confidence > 0.6 && uncertaintyPct < 10) return 'good';
  if (confidence > 0.4 && uncertaintyPct < 20) return 'fair';
  return 'poor';
}

export function qualityLabel(quality: RangeQuality): string {
  switch (quality) {
    case 'excellent': return 'Excellent';
    case 'good': return 'Good';
    case 'fair': return 'Fair';
    case 'poor': return 'Poor';
    default: return assertNever(quality);
  }
}

export function qualityColor(quality: RangeQuality): 'green' | 'yellow' | 'orange' | 'red' {
  switch (quality) {
    case 'excellent': return 'green';
    case 'good': return 'yellow';
    case 'fair': return 'orange';
    case 'poor': return 'red';
    default: return assertNever(quality);
  }
}
