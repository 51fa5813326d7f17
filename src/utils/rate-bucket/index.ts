/**
 * Rate Bucket Module
 *
 * Token bucket used for the dual request/cost admission check.
 */

export { RateBucket } from './rate-bucket.js';
export type { RateBucketOptions, RateBucketStats } from './rate-bucket.js';
