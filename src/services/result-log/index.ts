/**
 * Result Log Module
 *
 * Append-only JSONL output of terminal job outcomes.
 */

export { ResultLog, OutputAlreadyExistsError, PathUnwritableError } from './result-log.js';
export type { ResultSink } from './result-log.js';
