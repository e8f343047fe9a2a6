export {
  createFilterState,
  filterPredict,
  filterUpdate,
  filterStep,
  DistanceKalmanFilter,
  DEFAULT_FILTER_CONFIG,
  INITIAL_VARIANCE,
} from './kalman-filter.js';
