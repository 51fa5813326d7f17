/**
 * StatusTracker
 *
 * Progress counters for one batch run. A single instance is shared by the
 * admission loop (started / in progress) and the dispatcher (outcomes and
 * error kinds). Nothing derived is cached: completion is always read off
 * `inProgress`.
 *
 * Invariant: started === succeeded + failed + inProgress
 */

export interface StatusSnapshot {
  started: number;
  inProgress: number;
  succeeded: number;
  failed: number;
  rateLimitErrors: number;
  /** API errors other than rate-limit rejections */
  apiErrors: number;
  otherErrors: number;
  /** Time (ms) of the latest rate-limit rejection, 0 until the first one */
  lastRateLimitErrorTime: number;
}

export class StatusTracker {
  private started = 0;
  private inProgress = 0;
  private succeeded = 0;
  private failed = 0;
  private rateLimitErrors = 0;
  private apiErrors = 0;
  private otherErrors = 0;
  private lastRateLimitErrorTime = 0;

  /** A job entered the run */
  recordStarted(): void {
    this.started++;
    this.inProgress++;
  }

  recordSucceeded(): void {
    this.assertInProgress('recordSucceeded');
    this.inProgress--;
    this.succeeded++;
  }

  /** A job reached its terminal failure */
  recordFailed(): void {
    this.assertInProgress('recordFailed');
    this.inProgress--;
    this.failed++;
  }

  recordRateLimitError(now: number): void {
    this.rateLimitErrors++;
    this.lastRateLimitErrorTime = now;
  }

  recordApiError(): void {
    this.apiErrors++;
  }

  recordOtherError(): void {
    this.otherErrors++;
  }

  getLastRateLimitErrorTime(): number {
    return this.lastRateLimitErrorTime;
  }

  isIdle(): boolean {
    return this.inProgress === 0;
  }

  snapshot(): StatusSnapshot {
    return {
      started: this.started,
      inProgress: this.inProgress,
      succeeded: this.succeeded,
      failed: this.failed,
      rateLimitErrors: this.rateLimitErrors,
      apiErrors: this.apiErrors,
      otherErrors: this.otherErrors,
      lastRateLimitErrorTime: this.lastRateLimitErrorTime,
    };
  }

  private assertInProgress(method: string): void {
    if (this.inProgress === 0) {
      throw new Error(`StatusTracker.${method} called with no job in progress`);
    }
  }
}
