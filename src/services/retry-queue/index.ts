export { RetryQueue } from './retry-queue.js';
