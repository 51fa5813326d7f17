export { StatusTracker } from './status-tracker.js';
export type { StatusSnapshot } from './status-tracker.js';
