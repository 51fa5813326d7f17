/**
 * Utility exports
 */

export * from './clock/index.js';
export * from './rate-bucket/index.js';
export * from './file-paths/index.js';
export * from './example-requests/index.js';
export { isRecord } from './guards.js';
