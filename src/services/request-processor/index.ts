/**
 * Request Processor Module
 *
 * End-to-end batch runs over a requests file.
 */

export {
  processRequestsFile,
  InputFileNotFoundError,
  WITH_ERRORS_SUFFIX,
} from './request-processor.js';
export type {
  DryRunResult,
  ProcessResult,
  RequestProcessorDependencies,
  RunSummary,
} from './request-processor.js';
