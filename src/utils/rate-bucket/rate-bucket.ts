/**
 * RateBucket
 *
 * Token bucket with continuous, lazily applied refill. One bucket throttles
 * one resource: the admission loop keeps one for request count and one for
 * cost units (e.g. tokens).
 *
 * Capacity is real-valued. It only grows through refill(), up to `limit`,
 * and only shrinks through consume(). Callers check canConsume() first;
 * nothing here blocks or waits.
 *
 * @example
 * ```typescript
 * // 1500 requests per minute
 * const requests = new RateBucket({ limit: 1500, periodSeconds: 60 });
 *
 * requests.refill(Date.now());
 * if (requests.canConsume(1)) {
 *   requests.consume(1);
 *   // launch the call
 * }
 * ```
 */

export interface RateBucketOptions {
  /** Maximum steady-state quantity per period */
  limit: number;

  /** Seconds over which `limit` applies */
  periodSeconds: number;

  /**
   * Optional name for logging and error messages
   * @default 'RateBucket'
   */
  name?: string;

  /**
   * Timestamp (ms) the bucket starts refilling from
   * @default Date.now()
   */
  now?: number;
}

export interface RateBucketStats {
  name: string;
  limit: number;
  periodSeconds: number;
  capacity: number;
  lastRefillTime: number;
}

export class RateBucket {
  readonly limit: number;
  readonly periodSeconds: number;
  readonly name: string;
  private capacity: number;
  private lastRefillTime: number;

  constructor(options: RateBucketOptions) {
    if (!Number.isFinite(options.limit) || options.limit <= 0) {
      throw new RangeError(`limit must be a positive number. Received: ${options.limit}`);
    }
    if (!Number.isFinite(options.periodSeconds) || options.periodSeconds <= 0) {
      throw new RangeError(
        `periodSeconds must be a positive number. Received: ${options.periodSeconds}`
      );
    }

    this.limit = options.limit;
    this.periodSeconds = options.periodSeconds;
    this.name = options.name || 'RateBucket';
    this.capacity = options.limit;
    this.lastRefillTime = options.now ?? Date.now();
  }

  /**
   * Add the capacity accrued since the last refill, clamped to `limit`
   *
   * @param now - Current time in milliseconds
   */
  refill(now: number): void {
    const elapsedSeconds = Math.max(0, now - this.lastRefillTime) / 1000;
    this.capacity = Math.min(
      this.limit,
      this.capacity + (elapsedSeconds * this.limit) / this.periodSeconds
    );
    this.lastRefillTime = Math.max(now, this.lastRefillTime);
  }

  canConsume(amount: number): boolean {
    return this.capacity >= amount;
  }

  /**
   * Take `amount` from the bucket
   *
   * @throws RangeError if amount is negative or not finite
   * @throws Error if the bucket holds less than amount
   */
  consume(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`${this.name}: amount must be a non-negative number. Received: ${amount}`);
    }
    if (!this.canConsume(amount)) {
      throw new Error(
        `${this.name}: cannot consume ${amount}, only ${this.capacity} available`
      );
    }
    this.capacity -= amount;
  }

  getCapacity(): number {
    return this.capacity;
  }

  getStats(): RateBucketStats {
    return {
      name: this.name,
      limit: this.limit,
      periodSeconds: this.periodSeconds,
      capacity: this.capacity,
      lastRefillTime: this.lastRefillTime,
    };
  }
}
