/**
 * Shared types for the batch request processor
 */

export type {
  RequestPayload,
  RawJob,
  FailureKind,
  FailureRecord,
  ProviderFailureRecord,
  TransportFailureRecord,
  CostFailureRecord,
  Job,
  TerminalOutcome,
  ResultLine,
} from './job.js';
export { toResultLine } from './job.js';
