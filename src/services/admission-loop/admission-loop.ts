/**
 * AdmissionLoop
 *
 * The scheduler of a batch run. Each iteration holds at most one job,
 * refills both rate buckets and launches a dispatch when both can pay for
 * it. Dispatches run concurrently with the loop; the loop never awaits
 * them individually.
 *
 * States:
 *   FETCHING        pulling the next job (retry queue first, then source)
 *   CAPACITY_CHECK  refilling buckets, deciding on admission
 *   DISPATCH        consuming capacity and launching the call
 *   WAIT            micro-sleep so in-flight calls can progress
 *   COOLDOWN        global pause after a rate-limit rejection
 *   DRAINED         source exhausted, retry queue empty, nothing in flight
 *
 * Suspension points on the loop side: source reads, result writes for jobs
 * that can never be admitted, the micro-sleep and the cooldown sleep. The
 * cooldown is checked after every one of them, right before capacity.
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { CostFailureRecord, Job, RawJob } from '../../shared/types/index.js';
import { systemClock } from '../../utils/clock/index.js';
import type { Clock } from '../../utils/clock/index.js';
import type { RateBucket } from '../../utils/rate-bucket/index.js';
import type { CostContext, CostEstimator } from '../cost-estimator/index.js';
import type { Dispatcher } from '../dispatcher/index.js';
import { MalformedInputError } from '../job-source/index.js';
import type { JobSource } from '../job-source/index.js';
import type { RetryQueue } from '../retry-queue/index.js';
import type { StatusSnapshot, StatusTracker } from '../status-tracker/index.js';

export type AdmissionState =
  | 'FETCHING'
  | 'CAPACITY_CHECK'
  | 'DISPATCH'
  | 'WAIT'
  | 'COOLDOWN'
  | 'DRAINED';

/** Default micro-sleep between iterations */
export const DEFAULT_LOOP_SLEEP_MS = 1;

/**
 * Error thrown when a cost estimator returns a negative or non-finite cost
 */
export class InvalidCostError extends Error {
  constructor(
    public readonly lineNumber: number,
    public readonly cost: number
  ) {
    super(`Invalid cost ${cost} estimated for line ${lineNumber}: expected a non-negative finite number`);
    this.name = 'InvalidCostError';
  }
}

export interface AdmissionLoopDependencies {
  source: JobSource;
  retryQueue: RetryQueue;
  /** Pays 1 per dispatch */
  requestBucket: RateBucket;
  /** Pays job.cost per dispatch */
  costBucket: RateBucket;
  dispatcher: Dispatcher;
  statusTracker: StatusTracker;
  costEstimator: CostEstimator;
  costContext: CostContext;

  /**
   * @default systemClock
   */
  clock?: Clock;
}

export interface AdmissionLoopOptions {
  /** Attempts per job, at least 1 */
  maxAttempts: number;

  /** Pause on admissions after a rate-limit rejection */
  cooldownMs: number;

  /**
   * @default DEFAULT_LOOP_SLEEP_MS
   */
  loopSleepMs?: number;
}

export class AdmissionLoop {
  private readonly source: JobSource;
  private readonly retryQueue: RetryQueue;
  private readonly requestBucket: RateBucket;
  private readonly costBucket: RateBucket;
  private readonly dispatcher: Dispatcher;
  private readonly statusTracker: StatusTracker;
  private readonly costEstimator: CostEstimator;
  private readonly costContext: CostContext;
  private readonly clock: Clock;
  private readonly maxAttempts: number;
  private readonly cooldownMs: number;
  private readonly loopSleepMs: number;
  private readonly logger: ServiceLogger;

  private state: AdmissionState = 'FETCHING';
  private started = false;
  private nextJobId = 1;
  private held: Job | undefined;
  private readonly inFlight = new Set<Promise<void>>();
  private fatal: { error: unknown } | undefined;

  constructor(dependencies: AdmissionLoopDependencies, options: AdmissionLoopOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1. Received: ${options.maxAttempts}`);
    }
    if (!(options.cooldownMs >= 0)) {
      throw new RangeError(`cooldownMs must be >= 0. Received: ${options.cooldownMs}`);
    }

    this.source = dependencies.source;
    this.retryQueue = dependencies.retryQueue;
    this.requestBucket = dependencies.requestBucket;
    this.costBucket = dependencies.costBucket;
    this.dispatcher = dependencies.dispatcher;
    this.statusTracker = dependencies.statusTracker;
    this.costEstimator = dependencies.costEstimator;
    this.costContext = dependencies.costContext;
    this.clock = dependencies.clock ?? systemClock;
    this.maxAttempts = options.maxAttempts;
    this.cooldownMs = options.cooldownMs;
    this.loopSleepMs = options.loopSleepMs ?? DEFAULT_LOOP_SLEEP_MS;
    this.logger = createServiceLogger('AdmissionLoop');
  }

  getState(): AdmissionState {
    return this.state;
  }

  /** Number of dispatches launched and not yet settled */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run until DRAINED
   *
   * Rejects with the first fatal error: malformed input (including payloads
   * the cost estimator cannot price), an invalid cost estimate, or a
   * result-log write failure inside a dispatch. In-flight
   * dispatches are allowed to settle before the rejection.
   *
   * @returns final status counters
   */
  async run(): Promise<StatusSnapshot> {
    if (this.started) {
      throw new Error('AdmissionLoop.run() can only be called once');
    }
    this.started = true;
    log.methodEntry(this.logger, 'run', {
      maxAttempts: this.maxAttempts,
      cooldownMs: this.cooldownMs,
      loopSleepMs: this.loopSleepMs,
    });

    try {
      await this.loop();
    } catch (error) {
      await Promise.allSettled(this.inFlight);
      throw error;
    }

    await Promise.all(this.inFlight);
    const snapshot = this.statusTracker.snapshot();
    log.methodExit(this.logger, 'run', { ...snapshot });
    return snapshot;
  }

  private async loop(): Promise<void> {
    for (;;) {
      this.throwIfFatal();

      this.transition('FETCHING');
      if (!this.held) {
        this.held = await this.pull();
        // a rejection may have landed while the pull was suspended
        await this.cooldown();
      }

      this.transition('CAPACITY_CHECK');
      const now = this.clock.now();
      this.requestBucket.refill(now);
      this.costBucket.refill(now);

      const job = this.held;
      if (job && this.requestBucket.canConsume(1) && this.costBucket.canConsume(job.cost)) {
        this.transition('DISPATCH');
        this.requestBucket.consume(1);
        this.costBucket.consume(job.cost);
        job.attemptsRemaining--;
        this.held = undefined;
        this.launch(job);
      }

      if (this.isComplete()) {
        this.transition('DRAINED');
        return;
      }

      this.transition('WAIT');
      await this.clock.sleep(this.loopSleepMs);
      await this.cooldown();
    }
  }

  private isComplete(): boolean {
    return (
      this.held === undefined &&
      this.retryQueue.isEmpty() &&
      this.source.isExhausted() &&
      this.statusTracker.isIdle()
    );
  }

  /**
   * Next job to hold: the oldest retry, else a new job from the source.
   * Jobs that can never be admitted are finalized here and skipped.
   */
  private async pull(): Promise<Job | undefined> {
    const retry = this.retryQueue.shift();
    if (retry) {
      this.logger.debug(
        { jobId: retry.id, attemptsRemaining: retry.attemptsRemaining },
        `Retrying request #${retry.id}`
      );
      return retry;
    }

    while (!this.source.isExhausted()) {
      const raw = await this.source.next();
      if (!raw) {
        return undefined;
      }

      const job = this.createJob(raw);
      if (job.cost <= this.costBucket.limit) {
        return job;
      }

      const failure: CostFailureRecord = {
        kind: 'cost_exceeds_limit',
        attempt: 0,
        message: `Request cost ${job.cost} exceeds the cost limit of ${this.costBucket.limit} per ${this.costBucket.periodSeconds}s`,
        cost: job.cost,
        limit: this.costBucket.limit,
      };
      this.logger.warn({ jobId: job.id, cost: job.cost, limit: failure.limit }, failure.message);
      await this.dispatcher.reject(job, failure);
    }
    return undefined;
  }

  private createJob(raw: RawJob): Job {
    let cost: number;
    try {
      cost = this.costEstimator(raw.payload, this.costContext);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedInputError(
        this.source.sourceName,
        raw.lineNumber,
        `cannot estimate cost: ${reason}`
      );
    }
    if (!Number.isFinite(cost) || cost < 0) {
      throw new InvalidCostError(raw.lineNumber, cost);
    }

    const job: Job = {
      id: this.nextJobId++,
      payload: raw.payload,
      cost,
      attemptsRemaining: this.maxAttempts,
      maxAttempts: this.maxAttempts,
      metadata: raw.metadata,
      errorHistory: [],
    };
    this.statusTracker.recordStarted();
    this.logger.debug({ jobId: job.id, line: raw.lineNumber, cost }, `Created request #${job.id}`);
    return job;
  }

  private launch(job: Job): void {
    const task: Promise<void> = this.dispatcher
      .dispatch(job)
      .then(
        () => undefined,
        (error: unknown) => {
          if (!this.fatal) {
            this.fatal = { error };
          }
          this.logger.error(
            { jobId: job.id, error: error instanceof Error ? error.message : String(error) },
            'Dispatch failed fatally, stopping admissions'
          );
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Sleep while a rate-limit rejection lies within the cooldown window.
   * Rejections arriving during the sleep extend the pause.
   */
  private async cooldown(): Promise<void> {
    let announced = false;
    for (;;) {
      this.throwIfFatal();

      const lastRejection = this.statusTracker.getLastRateLimitErrorTime();
      if (lastRejection <= 0) {
        return;
      }
      const remainingMs = lastRejection + this.cooldownMs - this.clock.now();
      if (remainingMs <= 0) {
        return;
      }

      this.transition('COOLDOWN', { remainingMs });
      if (!announced) {
        this.logger.warn({ remainingMs }, `Rate limit hit, pausing admissions for ${remainingMs}ms`);
        announced = true;
      }
      await this.clock.sleep(remainingMs);
    }
  }

  private throwIfFatal(): void {
    if (this.fatal) {
      throw this.fatal.error;
    }
  }

  private transition(to: AdmissionState, context: Record<string, unknown> = {}): void {
    if (this.state === to) {
      return;
    }
    log.stateTransition(this.logger, this.state, to, context);
    this.state = to;
  }
}
