// ---------------------------------------------------------------------------
// @rangefinder/ranging-core — Barrel Export
// ---------------------------------------------------------------------------
// Passive ranging: size-based and depth-based distance, weighted fusion,
// scalar Kalman smoothing, depth-scale calibration.

export type {
  PixelBox,
  Point2D,
  FrameSize,
  Detection,
  CameraIntrinsics,
  DepthRaster,
  FrameResult,
  SizeRangingMethod,
  RangingMethod,
  RangeComponent,
  RangeQuality,
  RangeEstimate,
  RangeReading,
  RangeTrend,
  FilterState,
  FilterConfig,
  Result,
} from './types.js';

export { methodForCategory, methodDisplayName, assertNever, ok, err } from './types.js';

export {
  pixelCenter,
  normalizedCenter,
  pixelDiagonal,
  boxAspect,
  scaleIntrinsics,
  DEFAULT_INTRINSICS,
} from './geometry.js';

export { selectPrimaryDetection, primaryScore, CENTER_EPSILON } from './selector/primary-detection.js';

export * from './rangers/index.js';
export * from './fusion/index.js';
export * from './kalman/index.js';

export {
  DepthCalibration,
  DEFAULT_DEPTH_SCALE,
  type CalibrationError,
  type CalibrationErrorCode,
} from './calibration/depth-calibration.js';

export {
  RangeHistory,
  distanceTrend,
  DEFAULT_HISTORY_SIZE,
  MIN_TREND_SAMPLES,
} from './history/range-history.js';

export {
  metersTo,
  toMeters,
  unitSymbol,
  formatDistance,
  formatUncertainty,
  METERS_PER_YARD,
  METERS_PER_FOOT,
} from './units.js';

export {
  createLogger,
  silentLogger,
  stdoutSink,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
  type LogSink,
} from './logger.js';

export {
  RangingEngine,
  NO_ESTIMATE,
  displayEstimate,
  type RangingEngineOptions,
  type RangeListener,
} from './engine.js';
