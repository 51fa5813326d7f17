/**
 * Cost Estimator Module
 *
 * Pluggable per-provider request cost functions.
 */

export {
  COST_ESTIMATORS,
  COST_ESTIMATOR_NAMES,
  getCostEstimator,
  isCostEstimatorName,
  zeroCost,
} from './cost-estimator.js';
export type { CostContext, CostEstimator, CostEstimatorName } from './cost-estimator.js';

export {
  DEFAULT_ENCODING,
  SUPPORTED_ENCODINGS,
  UnsupportedEndpointError,
  countTextTokens,
  endpointFromUrl,
  estimateOpenAiTokens,
  isSupportedEncoding,
} from './openai-cost-estimator.js';
export type { SupportedEncoding } from './openai-cost-estimator.js';
