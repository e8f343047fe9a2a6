// ---------------------------------------------------------------------------
// Ranging Engine — per-frame orchestration
// ---------------------------------------------------------------------------
// frame → size ranger (each detection) + depth ranger (primary detection)
//       → fusion → temporal filter → published reading
//
// Synchronous and I/O free. One owner drives an engine instance; the
// filter, calibration scale and history are its only cross-frame state.

import { resolveSettings, type RangingSettings } from '@rangefinder/config';
import type { ObjectSizeLookup } from '@rangefinder/object-sizes';
import type {
  FilterState,
  FrameResult,
  RangeComponent,
  RangeEstimate,
  RangeReading,
  RangeTrend,
  Result,
} from './types.js';
import { scaleIntrinsics } from './geometry.js';
import { selectPrimaryDetection } from './selector/primary-detection.js';
import { rangeBySize } from './rangers/size-ranger.js';
import { rangeByDepth } from './rangers/depth-ranger.js';
import { fuseComponents, type FusionResult } from './fusion/fusion.js';
import { classifyQuality, uncertaintyPercent } from './fusion/quality.js';
import { DistanceKalmanFilter } from './kalman/kalman-filter.js';
import { DepthCalibration, type CalibrationError } from './calibration/depth-calibration.js';
import { RangeHistory } from './history/range-history.js';
import { formatDistance, formatUncertainty } from './units.js';
import { silentLogger, type Logger } from './logger.js';

export type RangeListener = (reading: RangeReading) => void;

function noReading(timestamp: number): RangeReading {
  const reading: RangeReading = { kind: 'none', timestamp };
  return Object.freeze(reading);
}

function estimateReading(estimate: RangeEstimate): RangeReading {
  const reading: RangeReading = { kind: 'estimate', estimate };
  return Object.freeze(reading);
}

/** Display stand-in for a `none` reading. Not a measurement. */
export const NO_ESTIMATE: Readonly<RangeEstimate> = Object.freeze({
  distanceMeters: 0,
  rawDistanceMeters: 0,
  confidence: 0,
  method: 'fused',
  uncertaintyMeters: 0,
  uncertaintyPercent: 0,
  quality: 'poor',
  locked: false,
  components: Object.freeze([]),
  timestamp: 0,
});

/** The reading's estimate, or NO_ESTIMATE stamped with the reading's time. */
export function displayEstimate(reading: RangeReading): RangeEstimate {
  return reading.kind === 'estimate' ? reading.estimate : { ...NO_ESTIMATE, timestamp: reading.timestamp };
}

export interface RangingEngineOptions {
  lookup: ObjectSizeLookup;
  /** Explicit overrides on top of environment and defaults. */
  settings?: Partial<RangingSettings>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class RangingEngine {
  private readonly lookup: ObjectSizeLookup;
  private readonly settings: RangingSettings;
  private readonly logger: Logger;
  private readonly filter: DistanceKalmanFilter;
  private readonly calibration: DepthCalibration;
  private readonly recent: RangeHistory;
  private readonly listeners = new Set<RangeListener>();
  private _current: RangeReading = noReading(0);

  /** Throws ConfigError when the resolved settings are invalid. */
  constructor(options: RangingEngineOptions) {
    this.lookup = options.lookup;
    this.settings = resolveSettings(options.settings, options.env);
    this.logger = (options.logger ?? silentLogger).child({ component: 'ranging-engine' });
    this.filter = new DistanceKalmanFilter({
      processNoise: this.settings.processNoise,
      measurementNoise: this.settings.measurementNoise,
    });
    this.calibration = new DepthCalibration(this.settings.depthScaleFactor);
    this.recent = new RangeHistory(this.settings.historySize);
  }

  // ── Ranging ──

  /** Candidate components for one frame, before fusion. */
  collectComponents(frame: FrameResult): RangeComponent[] {
    const intrinsics = scaleIntrinsics(frame.intrinsics, frame.frameSize);
    const components: RangeComponent[] = [];

    for (const detection of frame.detections) {
      const component = rangeBySize(detection, this.lookup.lookup(detection.label), intrinsics);
      if (component) components.push(component);
    }

    if (this.settings.enableDepthFusion) {
      const target = selectPrimaryDetection(frame.detections, frame.frameSize);
      const component = rangeByDepth(frame.depth, target, frame.frameSize, this.calibration.scaleFactor);
      if (component) components.push(component);
    }

    return components;
  }

  /**
   * Range one frame and publish the reading. A frame without any
   * component yields `kind: 'none'` and leaves the filter untouched.
   */
  process(frame: FrameResult): RangeReading {
    const components = this.collectComponents(frame);
    const fused = fuseComponents(components);

    if (!fused) {
      this.logger.debug('range.none', {
        detections: frame.detections.length,
        depth: frame.depth !== undefined,
      });
      return this.publish(noReading(frame.timestamp));
    }

    const estimate = this.toEstimate(fused, frame.timestamp);
    this.recent.push(estimate);
    this.logger.debug('range.estimate', {
      method: estimate.method,
      distance: estimate.distanceMeters,
      raw: estimate.rawDistanceMeters,
      confidence: estimate.confidence,
      components: components.length,
    });
    return this.publish(estimateReading(estimate));
  }

  private toEstimate(fused: FusionResult, timestamp: number): RangeEstimate {
    let distance = fused.distance;
    if (this.settings.enableTemporalSmoothing) {
      // Fused readings use their unfloored spread as R; a single component uses the default R.
      distance = fused.components.length > 1
        ? this.filter.update(fused.distance, fused.spread)
        : this.filter.update(fused.distance);
    }

    const pct = uncertaintyPercent(distance, fused.uncertainty);
    return Object.freeze({
      distanceMeters: distance,
      rawDistanceMeters: fused.distance,
      confidence: fused.confidence,
      method: fused.method,
      uncertaintyMeters: fused.uncertainty,
      uncertaintyPercent: pct,
      quality: classifyQuality(fused.confidence, pct),
      locked: fused.confidence > this.settings.lockThreshold,
      components: Object.freeze(fused.components.map(c => Object.freeze({ ...c }))),
      timestamp,
    });
  }

  // ── Publication ──

  /** Receive every reading; returns an unsubscribe function. */
  subscribe(listener: RangeListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private publish(reading: RangeReading): RangeReading {
    this._current = reading;
    for (const listener of this.listeners) {
      try {
        listener(reading);
      } catch (e) {
        this.logger.error('listener.failed', { message: e instanceof Error ? e.message : String(e) });
      }
    }
    return reading;
  }

  get current(): RangeReading {
    return this._current;
  }

  get locked(): boolean {
    return this._current.kind === 'estimate' && this._current.estimate.locked;
  }

  // ── Calibration ──

  get scaleFactor(): number {
    return this.calibration.scaleFactor;
  }

  /**
   * Set the depth scale from a target at a known distance. On success
   * the filter restarts so estimates under the old scale do not linger.
   */
  calibrate(knownDistanceMeters: number, measuredInverseDepth: number): Result<number, CalibrationError> {
    const result = this.calibration.calibrate(knownDistanceMeters, measuredInverseDepth);
    if (result.ok) {
      this.filter.reset();
      this.logger.info('depth.calibrated', { scaleFactor: result.value, knownDistanceMeters });
    } else {
      this.logger.warn('depth.calibration_rejected', { code: result.error.code, measuredInverseDepth });
    }
    return result;
  }

  // ── Display ──

  /** Distance in the configured display unit, without the unit symbol. */
  formatDistance(estimate: RangeEstimate, precision = 0): string {
    return formatDistance(estimate, this.settings.displayUnit, precision);
  }

  formatUncertainty(estimate: RangeEstimate, precision = 0): string {
    return formatUncertainty(estimate, this.settings.displayUnit, precision);
  }

  // ── Session state ──

  /** Call when the tracked target or scene changes. */
  reset(): void {
    this.filter.reset();
    this.recent.clear();
    this._current = noReading(0);
    this.logger.info('engine.reset');
  }

  setDepthFusion(enabled: boolean): void {
    this.settings.enableDepthFusion = enabled;
  }

  setTemporalSmoothing(enabled: boolean): void {
    this.settings.enableTemporalSmoothing = enabled;
  }

  get config(): Readonly<RangingSettings> {
    return this.settings;
  }

  filterState(): Readonly<FilterState> {
    return this.filter.snapshot();
  }

  history(): RangeEstimate[] {
    return this.recent.toArray();
  }

  trend(): RangeTrend {
    return this.recent.trend(this.settings.trendBand);
  }
}
