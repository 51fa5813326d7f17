/**
 * Dispatcher Module
 *
 * One outbound attempt per call, with outcome classification and retry policy.
 */

export { Dispatcher, DEFAULT_RATE_LIMIT_SIGNATURE, extractProviderError } from './dispatcher.js';
export type { DispatcherDependencies, DispatcherOptions, ProviderError } from './dispatcher.js';
