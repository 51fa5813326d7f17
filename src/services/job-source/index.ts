/**
 * Job Source Module
 *
 * Streams job descriptions from newline-delimited JSON.
 */

export {
  JsonlJobSource,
  MalformedInputError,
  METADATA_KEY,
  parseRequestLine,
} from './job-source.js';
export type { JobSource, JsonlJobSourceOptions, LineSource } from './job-source.js';
