/**
 * Job Types
 *
 * A job is one line of the requests file on its way through the admission
 * loop: created once, re-queued on retryable failures, dropped after its
 * terminal outcome has been written.
 */

/**
 * Provider-specific request body. The core never reads its keys except to
 * estimate cost.
 */
export type RequestPayload = Record<string, unknown>;

/**
 * A parsed line of the requests file, before the loop turns it into a Job
 */
export interface RawJob {
  /** Request body with the reserved `metadata` key removed */
  payload: RequestPayload;
  /** Value of the `metadata` key, when the line carried a non-null one */
  metadata?: unknown;
  /** 1-based line number in the source */
  lineNumber: number;
}

/**
 * Kinds of failed attempt
 */
export type FailureKind =
  | 'rate_limit'
  | 'api_error'
  | 'transport_failure'
  | 'cost_exceeds_limit';

/**
 * Failed attempt where the provider answered with an error object
 */
export interface ProviderFailureRecord {
  kind: 'rate_limit' | 'api_error';
  /** 1-based attempt number */
  attempt: number;
  message: string;
  /** The provider's error object */
  error: unknown;
}

/**
 * Failed attempt where no response was obtained
 */
export interface TransportFailureRecord {
  kind: 'transport_failure';
  attempt: number;
  message: string;
  errorName: string;
  statusCode?: number;
}

/**
 * Job that could never be admitted because its cost exceeds the bucket limit
 */
export interface CostFailureRecord {
  kind: 'cost_exceeds_limit';
  /** Always 0: no dispatch was attempted */
  attempt: number;
  message: string;
  cost: number;
  limit: number;
}

/**
 * One failed attempt, appended to a job's error history
 */
export type FailureRecord = ProviderFailureRecord | TransportFailureRecord | CostFailureRecord;

/**
 * One unit of outbound work with its own retry budget and cost
 */
export interface Job {
  /** Run-unique id, assigned from the admission loop's counter */
  readonly id: number;
  readonly payload: RequestPayload;
  /** Resource units consumed per dispatch, estimated once at creation */
  readonly cost: number;
  /** Decremented on every dispatch attempt */
  attemptsRemaining: number;
  readonly maxAttempts: number;
  readonly metadata?: unknown;
  /** Failed attempts so far, oldest first */
  readonly errorHistory: FailureRecord[];
}

/**
 * Outcome written to the result log; never written for a retried attempt
 */
export type TerminalOutcome =
  | { status: 'succeeded'; response: unknown }
  | { status: 'retries_exhausted'; errorHistory: FailureRecord[] };

/**
 * One line of the result log:
 * `[payload, response | errorHistory]` or `[payload, response | errorHistory, metadata]`
 */
export type ResultLine =
  | [payload: RequestPayload, outcome: unknown]
  | [payload: RequestPayload, outcome: unknown, metadata: unknown];

/**
 * Build the result-log line for a terminal outcome
 */
export function toResultLine(job: Job, outcome: TerminalOutcome): ResultLine {
  const body =
    outcome.status === 'succeeded' ? outcome.response : outcome.errorHistory;
  return job.metadata === undefined
    ? [job.payload, body]
    : [job.payload, body, job.metadata];
}
