/**
 * Dispatcher
 *
 * Runs one attempt of one job: issues the outbound call, classifies what
 * came back, updates the status counters and either writes the job's
 * terminal outcome or puts it back on the retry queue.
 *
 * Outcome classes:
 * - success: a response without an error field
 * - rate-limit rejection: an error whose message contains the configured
 *   signature; stamps the time so the admission loop cools down
 * - API error: any other error field
 * - transport failure: the transport raised instead of responding
 *
 * The last three are retried while the job has attempts left. A job is
 * written to the result log exactly once, when it succeeds or runs out of
 * attempts.
 *
 * Suspension points: the transport call and the result-log write.
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { TransportError } from '../../clients/http-transport/index.js';
import type { RequestTransport } from '../../clients/http-transport/index.js';
import { toResultLine } from '../../shared/types/index.js';
import type {
  FailureRecord,
  Job,
  TerminalOutcome,
  TransportFailureRecord,
} from '../../shared/types/index.js';
import { systemClock } from '../../utils/clock/index.js';
import type { Clock } from '../../utils/clock/index.js';
import { isRecord } from '../../utils/guards.js';
import type { ResultSink } from '../result-log/index.js';
import type { RetryQueue } from '../retry-queue/index.js';
import type { StatusTracker } from '../status-tracker/index.js';

/**
 * Substring of a provider error message that marks a rate-limit rejection
 */
export const DEFAULT_RATE_LIMIT_SIGNATURE = 'Rate limit';

export interface DispatcherDependencies {
  transport: RequestTransport;
  resultSink: ResultSink;
  retryQueue: RetryQueue;
  statusTracker: StatusTracker;

  /**
   * Time source for rate-limit timestamps
   * @default systemClock
   */
  clock?: Clock;
}

export interface DispatcherOptions {
  requestUrl: string;

  /** Extra request headers, e.g. Authorization */
  headers?: Record<string, string>;

  /**
   * @default DEFAULT_RATE_LIMIT_SIGNATURE
   */
  rateLimitSignature?: string;
}

/**
 * Provider error carried in a response body
 */
export interface ProviderError {
  message: string;
  error: unknown;
}

/**
 * Read the error indicator of a response, if it has one
 *
 * The message is `error.message` when present, the error itself when it
 * is a string, and its JSON text otherwise.
 */
export function extractProviderError(response: unknown): ProviderError | undefined {
  if (!isRecord(response) || response.error === undefined || response.error === null) {
    return undefined;
  }

  const error = response.error;
  if (typeof error === 'string') {
    return { message: error, error };
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return { message: error.message, error };
  }
  return { message: JSON.stringify(error), error };
}

export class Dispatcher {
  private readonly transport: RequestTransport;
  private readonly resultSink: ResultSink;
  private readonly retryQueue: RetryQueue;
  private readonly statusTracker: StatusTracker;
  private readonly clock: Clock;
  private readonly requestUrl: string;
  private readonly headers: Record<string, string>;
  private readonly rateLimitSignature: string;
  private readonly logger: ServiceLogger;

  constructor(dependencies: DispatcherDependencies, options: DispatcherOptions) {
    this.transport = dependencies.transport;
    this.resultSink = dependencies.resultSink;
    this.retryQueue = dependencies.retryQueue;
    this.statusTracker = dependencies.statusTracker;
    this.clock = dependencies.clock ?? systemClock;
    this.requestUrl = options.requestUrl;
    this.headers = options.headers ?? {};
    this.rateLimitSignature = options.rateLimitSignature ?? DEFAULT_RATE_LIMIT_SIGNATURE;
    this.logger = createServiceLogger('Dispatcher');
  }

  /**
   * Run one attempt of a job that has already been admitted
   * (its attemptsRemaining already counts this attempt)
   *
   * Transport failures are handled here; only result-log write errors
   * propagate.
   */
  async dispatch(job: Job): Promise<void> {
    const attempt = job.maxAttempts - job.attemptsRemaining;
    this.logger.info({ jobId: job.id, attempt }, `Starting request #${job.id}`);

    let response: unknown;
    try {
      response = await this.transport.send({
        url: this.requestUrl,
        headers: this.headers,
        payload: job.payload,
      });
    } catch (error) {
      this.statusTracker.recordOtherError();
      const failure = this.transportFailure(error, attempt);
      this.logger.warn(
        { jobId: job.id, attempt, error: failure.message },
        `Request ${job.id} failed with ${failure.errorName}`
      );
      await this.handleFailure(job, failure);
      return;
    }

    const providerError = extractProviderError(response);
    if (!providerError) {
      await this.finalize(job, { status: 'succeeded', response });
      this.statusTracker.recordSucceeded();
      this.logger.debug({ jobId: job.id }, `Request ${job.id} saved`);
      return;
    }

    const isRateLimit = providerError.message.includes(this.rateLimitSignature);
    if (isRateLimit) {
      this.statusTracker.recordRateLimitError(this.clock.now());
    } else {
      this.statusTracker.recordApiError();
    }
    this.logger.warn(
      { jobId: job.id, attempt, rateLimited: isRateLimit, error: providerError.message },
      `Request ${job.id} failed with error`
    );

    await this.handleFailure(job, {
      kind: isRateLimit ? 'rate_limit' : 'api_error',
      attempt,
      message: providerError.message,
      error: providerError.error,
    });
  }

  /**
   * Finalize a job as failed without another attempt
   *
   * Used for jobs that can never be admitted (cost above the bucket limit).
   */
  async reject(job: Job, failure: FailureRecord): Promise<void> {
    job.errorHistory.push(failure);
    await this.finalizeFailed(job);
  }

  private transportFailure(error: unknown, attempt: number): TransportFailureRecord {
    const failure: TransportFailureRecord = {
      kind: 'transport_failure',
      attempt,
      message: error instanceof Error ? error.message : String(error),
      errorName: error instanceof Error ? error.name : 'Error',
    };
    if (error instanceof TransportError && error.statusCode !== undefined) {
      failure.statusCode = error.statusCode;
    }
    return failure;
  }

  private async handleFailure(job: Job, failure: FailureRecord): Promise<void> {
    job.errorHistory.push(failure);

    if (job.attemptsRemaining > 0) {
      this.retryQueue.push(job);
      this.logger.debug(
        { jobId: job.id, attemptsRemaining: job.attemptsRemaining },
        'Job queued for retry'
      );
      return;
    }

    await this.finalizeFailed(job);
  }

  private async finalizeFailed(job: Job): Promise<void> {
    this.logger.error(
      { jobId: job.id, payload: job.payload, failures: job.errorHistory.length },
      `Request ${job.id} failed after all attempts`
    );
    await this.finalize(job, { status: 'retries_exhausted', errorHistory: job.errorHistory });
    this.statusTracker.recordFailed();
  }

  private async finalize(job: Job, outcome: TerminalOutcome): Promise<void> {
    try {
      await this.resultSink.append(toResultLine(job, outcome));
    } catch (error) {
      log.methodError(
        this.logger,
        'finalize',
        error instanceof Error ? error : new Error(String(error)),
        { jobId: job.id }
      );
      throw error;
    }
  }
}
