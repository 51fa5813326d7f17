/**
 * Batch Request Processor
 *
 * Streams newline-delimited JSON requests to a rate-limited HTTP API,
 * throttled by a request budget and a cost (token) budget, with retries,
 * a global cooldown after rate-limit errors and a JSONL results file.
 */

// Export shared types
export * from './shared/types/index.js';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/job-source/index.js';
export * from './services/retry-queue/index.js';
export * from './services/status-tracker/index.js';
export * from './services/cost-estimator/index.js';
export * from './services/result-log/index.js';
export * from './services/dispatcher/index.js';
export * from './services/admission-loop/index.js';
export * from './services/request-processor/index.js';
