/**
 * AdmissionLoop Module
 *
 * Scheduler that admits jobs against the request and cost buckets.
 */

export { AdmissionLoop, InvalidCostError, DEFAULT_LOOP_SLEEP_MS } from './admission-loop.js';
export type {
  AdmissionLoopDependencies,
  AdmissionLoopOptions,
  AdmissionState,
} from './admission-loop.js';
