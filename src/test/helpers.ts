/**
 * Test helpers shared by unit tests
 */

import type { Job, ResultLine } from '../shared/types/index.js';
import type { ResultSink } from '../services/result-log/index.js';
import type { Clock } from '../utils/clock/index.js';

/**
 * Build a job with defaults suitable for dispatcher and queue tests
 */
export function createTestJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 1,
    payload: { input: 'hello' },
    cost: 0,
    attemptsRemaining: 2,
    maxAttempts: 3,
    errorHistory: [],
    ...overrides,
  };
}

/**
 * Virtual clock
 *
 * sleep() advances time immediately, then yields one macrotask turn so
 * in-flight calls (and any real I/O) get to run. Loops that would take
 * minutes of wall-clock time finish in milliseconds.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 1_700_000_000_000) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Result sink that keeps lines in memory
 */
export class MemoryResultSink implements ResultSink {
  readonly lines: ResultLine[] = [];

  async append(line: ResultLine): Promise<void> {
    this.lines.push(line);
  }
}
