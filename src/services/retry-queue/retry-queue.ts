/**
 * RetryQueue
 *
 * Unbounded FIFO of jobs awaiting another attempt. The admission loop
 * drains it before reading new jobs from the source, so retries are
 * admitted in the order they failed.
 */

import type { Job } from '../../shared/types/index.js';

export class RetryQueue {
  private items: Job[] = [];
  private head = 0;

  push(job: Job): void {
    this.items.push(job);
  }

  /**
   * Remove and return the oldest job, or undefined when empty
   */
  shift(): Job | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const job = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return job;
  }

  size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }
}
