/**
 * Cost Estimators
 *
 * A cost estimator says how many resource units (e.g. tokens) a request
 * will consume. One is selected by name when the run is configured and
 * called once per job, when the job is created.
 */

import type { RequestPayload } from '../../shared/types/index.js';
import { estimateOpenAiTokens } from './openai-cost-estimator.js';

export interface CostContext {
  /** Endpoint path, e.g. 'embeddings' or 'chat/completions' */
  endpoint: string;
  /** Token encoding name */
  encoding: string;
}

export type CostEstimator = (payload: RequestPayload, context: CostContext) => number;

/**
 * Estimator that prices every request at zero; only the request bucket throttles
 */
export const zeroCost: CostEstimator = () => 0;

export const COST_ESTIMATORS = {
  none: zeroCost,
  openai: estimateOpenAiTokens,
} as const satisfies Record<string, CostEstimator>;

export type CostEstimatorName = keyof typeof COST_ESTIMATORS;

export const COST_ESTIMATOR_NAMES: readonly CostEstimatorName[] = ['none', 'openai'];

export function isCostEstimatorName(value: string): value is CostEstimatorName {
  return Object.prototype.hasOwnProperty.call(COST_ESTIMATORS, value);
}

export function getCostEstimator(name: CostEstimatorName): CostEstimator {
  return COST_ESTIMATORS[name];
}
