// ---------------------------------------------------------------------------
// Multi-method fusion — weighted mean with weighted-variance uncertainty
// ---------------------------------------------------------------------------
// mean     = Σ wᵢ·dᵢ / Σ wᵢ
// variance = Σ wᵢ·(dᵢ − mean)² / Σ wᵢ
// σ        = max(√variance, 0.03·mean)

import type { RangeComponent, RangingMethod } from '../types.js';

/** Relative uncertainty floor applied even when all methods agree. */
export const MIN_RELATIVE_UNCERTAINTY = 0.03;

/** Single-component uncertainty: d × (1 − c) × this factor. */
export const SINGLE_UNCERTAINTY_FACTOR = 0.2;

export interface FusionResult {
  /** Fused distance in metres, before temporal smoothing. */
  distance: number;
  confidence: number;
  /** One-sigma uncertainty in metres. */
  uncertainty: number;
  /**
   * Weighted standard deviation before the relative floor; equals
   * `uncertainty` for a single component. Filter R for fused input.
   */
  spread: number;
  method: RangingMethod;
  components: readonly RangeComponent[];
}

/**
 * Fuse candidate components into one distance.
 * Returns undefined when there is nothing to fuse: no components, or
 * several components whose weights sum to zero.
 */
export function fuseComponents(components: readonly RangeComponent[]): FusionResult | undefined {
  const [first] = components;
  if (!first) return undefined;

  if (components.length === 1) {
    const uncertainty = first.distance * (1 - first.confidence) * SINGLE_UNCERTAINTY_FACTOR;
    return {
      distance: first.distance,
      confidence: first.confidence,
      uncertainty,
      spread: uncertainty,
      method: first.method,
      components,
    };
  }

  let totalWeight = 0;
  let weightedSum = 0;
  let weightedConfidence = 0;
  let maxConfidence = 0;
  let minDistance = Infinity;
  let maxDistance = -Infinity;
  for (const c of components) {
    totalWeight += c.weight;
    weightedSum += c.weight * c.distance;
    weightedConfidence += c.weight * c.confidence;
    if (c.confidence > maxConfidence) maxConfidence = c.confidence;
    if (c.distance < minDistance) minDistance = c.distance;
    if (c.distance > maxDistance) maxDistance = c.distance;
  }
  if (!(totalWeight > 0)) return undefined;

  // Rounding can push the quotient one ulp past the extremes.
  const mean = Math.min(maxDistance, Math.max(minDistance, weightedSum / totalWeight));

  let variance = 0;
  for (const c of components) {
    const diff = c.distance - mean;
    variance += c.weight * diff * diff;
  }
  variance /= totalWeight;
  const spread = Math.sqrt(variance);

  return {
    distance: mean,
    confidence: (maxConfidence + weightedConfidence / totalWeight) / 2,
    uncertainty: Math.max(spread, mean * MIN_RELATIVE_UNCERTAINTY),
    spread,
    method: 'fused',
    components,
  };
}
