/**
 * JobSource
 *
 * Lazily turns newline-delimited JSON into raw job descriptions, one per
 * line, in file order. Forward-only and not restartable: once next() has
 * resolved to undefined the source stays exhausted.
 *
 * A line that is not a JSON object aborts the run (MalformedInputError);
 * nothing is skipped silently. Whitespace-only lines carry no job.
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { RawJob } from '../../shared/types/index.js';
import { isRecord } from '../../utils/guards.js';

/**
 * Reserved payload key carried through to the result log instead of being sent
 */
export const METADATA_KEY = 'metadata';

export type LineSource = AsyncIterable<string> | Iterable<string>;

export interface JobSource {
  /** Name used in error messages, usually the file path */
  readonly sourceName: string;

  /**
   * Read the next job description; undefined once the input is exhausted.
   * May suspend on I/O.
   *
   * @throws MalformedInputError if the next line is not a JSON object
   */
  next(): Promise<RawJob | undefined>;

  isExhausted(): boolean;

  /** Stop reading and release the underlying stream */
  close(): Promise<void>;
}

/**
 * Error thrown when an input line cannot be turned into a job
 */
export class MalformedInputError extends Error {
  constructor(
    public readonly source: string,
    public readonly lineNumber: number,
    reason: string
  ) {
    super(`Malformed input on line ${lineNumber} of ${source}: ${reason}`);
    this.name = 'MalformedInputError';
  }
}

export interface JsonlJobSourceOptions {
  /**
   * Name used in error messages, usually the file path
   * @default '<input>'
   */
  sourceName?: string;

  /** Called once by close(), e.g. to destroy the underlying file stream */
  release?: () => void;
}

function toAsyncIterator(lines: LineSource): AsyncIterator<string> {
  if (Symbol.asyncIterator in lines) {
    return lines[Symbol.asyncIterator]();
  }
  const iterator = lines[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
    return: async () => iterator.return?.() ?? { done: true, value: undefined },
  };
}

/**
 * Parse one line of the requests file
 *
 * @returns the raw job, or undefined for a whitespace-only line
 * @throws MalformedInputError for anything other than a JSON object
 */
export function parseRequestLine(
  line: string,
  lineNumber: number,
  sourceName: string
): RawJob | undefined {
  if (line.trim() === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(sourceName, lineNumber, reason);
  }

  if (!isRecord(parsed)) {
    throw new MalformedInputError(
      sourceName,
      lineNumber,
      `expected a JSON object, got ${Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed}`
    );
  }

  const { [METADATA_KEY]: metadata, ...payload } = parsed;
  const job: RawJob = { payload, lineNumber };
  if (metadata !== undefined && metadata !== null) {
    job.metadata = metadata;
  }
  return job;
}

/**
 * JobSource over newline-delimited JSON
 *
 * @example
 * ```typescript
 * const source = JsonlJobSource.fromFile('requests.jsonl');
 * for (let job = await source.next(); job; job = await source.next()) {
 *   console.log(job.lineNumber, job.payload);
 * }
 * ```
 */
export class JsonlJobSource implements JobSource {
  private readonly iterator: AsyncIterator<string>;
  readonly sourceName: string;
  private readonly release: (() => void) | undefined;
  private lineNumber = 0;
  private closed = false;
  private exhausted = false;

  constructor(lines: LineSource, options: JsonlJobSourceOptions = {}) {
    this.iterator = toAsyncIterator(lines);
    this.sourceName = options.sourceName ?? '<input>';
    this.release = options.release;
  }

  /**
   * Stream a file line by line
   */
  static fromFile(path: string): JsonlJobSource {
    const input = createReadStream(path, { encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    return new JsonlJobSource(lines, {
      sourceName: path,
      release: () => input.destroy(),
    });
  }

  async next(): Promise<RawJob | undefined> {
    while (!this.exhausted) {
      const result = await this.iterator.next();
      if (result.done) {
        this.exhausted = true;
        break;
      }

      this.lineNumber++;
      const job = parseRequestLine(result.value, this.lineNumber, this.sourceName);
      if (job) {
        return job;
      }
    }
    return undefined;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const wasExhausted = this.exhausted;
    this.exhausted = true;
    try {
      if (!wasExhausted) {
        await this.iterator.return?.();
      }
    } finally {
      this.release?.();
    }
  }
}
