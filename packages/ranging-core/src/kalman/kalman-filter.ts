// ---------------------------------------------------------------------------
// Scalar Kalman filter for distance smoothing
// ---------------------------------------------------------------------------
// Random-walk model (F = H = 1):
// Predict: P(k|k-1) = P(k-1|k-1) + Q
// Update:  K = P(k|k-1) / (P(k|k-1) + R)
//          x̂(k|k) = x̂(k-1) + K·(z − x̂(k-1))
//          P(k|k) = (1 − K)·P(k|k-1)

import type { FilterConfig, FilterState } from '../types.js';

/** Uninformative prior: the first measurement dominates. */
export const INITIAL_VARIANCE = 100;

export const DEFAULT_FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze({
  processNoise: 0.5,
  measurementNoise: 2.0,
});

export function createFilterState(): FilterState {
  return { estimate: 0, variance: INITIAL_VARIANCE };
}

/** Predict step: the estimate carries over, variance grows by Q. */
export function filterPredict(state: FilterState, config: FilterConfig): FilterState {
  return { estimate: state.estimate, variance: state.variance + config.processNoise };
}

/**
 * Update step against measurement `z` with noise variance `r`.
 * Also returns the gain applied.
 */
export function filterUpdate(
  predicted: FilterState,
  z: number,
  r: number,
): { state: FilterState; gain: number } {
  const denom = predicted.variance + r;
  const gain = denom > 0 ? predicted.variance / denom : 1;
  return {
    state: {
      estimate: predicted.estimate + gain * (z - predicted.estimate),
      variance: (1 - gain) * predicted.variance,
    },
    gain,
  };
}

/** Predict + update for a single measurement. */
export function filterStep(
  state: FilterState,
  z: number,
  config: FilterConfig,
  measurementNoise?: number,
): FilterState {
  const r = measurementNoise ?? config.measurementNoise;
  return filterUpdate(filterPredict(state, config), z, r).state;
}

/**
 * Stateful 1-D filter owned by one ranging session.
 * The owner calls `reset()` when the target or scene changes; the
 * filter does no change detection of its own.
 */
export class DistanceKalmanFilter {
  private state: FilterState = createFilterState();
  private readonly config: FilterConfig;

  constructor(config: Partial<FilterConfig> = {}) {
    this.config = { ...DEFAULT_FILTER_CONFIG, ...config };
  }

  /**
   * Incorporate a measurement and return the smoothed estimate.
   * `measurementNoise` overrides the default R for this update.
   */
  update(measurement: number, measurementNoise?: number): number {
    this.state = filterStep(this.state, measurement, this.config, measurementNoise);
    return this.state.estimate;
  }

  reset(): void {
    this.state = createFilterState();
  }

  get estimate(): number {
    return this.state.estimate;
  }

  get variance(): number {
    return this.state.variance;
  }

  /** Standard deviation of the estimate. */
  get uncertainty(): number {
    return Math.sqrt(this.state.variance);
  }

  get settings(): Readonly<FilterConfig> {
    return this.config;
  }

  snapshot(): Readonly<FilterState> {
    return Object.freeze({ ...this.state });
  }
}
