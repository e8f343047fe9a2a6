export {
  rangeBySize,
  measurePixels,
  pinholeDistance,
  sizeConfidence,
  sizePenalty,
  aspectPenalty,
  distancePenalty,
  SIZE_MIN_PIXELS,
  SIZE_MIN_DISTANCE,
  SIZE_MAX_DISTANCE,
  LONG_RANGE_DISTANCE,
  type PixelMeasurement,
} from './size-ranger.js';

export {
  rangeByDepth,
  sampleDepthWindow,
  medianOf,
  TARGET_WINDOW_PX,
  CENTER_WINDOW_PX,
  SAMPLE_STRIDE,
  DEPTH_MIN_DISTANCE,
  DEPTH_MAX_DISTANCE,
  DEPTH_CONFIDENCE,
  DEPTH_WEIGHT,
} from './depth-ranger.js';
