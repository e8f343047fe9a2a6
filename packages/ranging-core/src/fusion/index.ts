export {
  fuseComponents,
  MIN_RELATIVE_UNCERTAINTY,
  SINGLE_UNCERTAINTY_FACTOR,
  type FusionResult,
} from './fusion.js';

export {
  classifyQuality,
  uncertaintyPercent,
  qualityLabel,
  qualityColor,
} from './quality.js';
