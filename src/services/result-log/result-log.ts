/**
 * ResultLog
 *
 * Append-only newline-delimited JSON file holding one line per terminal job
 * outcome. The file stays open for the whole run; every append goes through
 * the same write stream, so lines from concurrently completing jobs are
 * written whole and in completion order. Appends wait for 'drain' while the
 * stream's buffer is full.
 */

import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { ResultLine } from '../../shared/types/index.js';

/**
 * Where terminal outcomes go. The dispatcher only depends on this.
 */
export interface ResultSink {
  /** Write one line; a suspension point for the caller */
  append(line: ResultLine): Promise<void>;
}

/**
 * Error thrown when the results file already exists
 */
export class OutputAlreadyExistsError extends Error {
  constructor(public readonly path: string) {
    super(
      `Results file ${path} already exists. Delete it or choose a different results path.`
    );
    this.name = 'OutputAlreadyExistsError';
  }
}

/**
 * Error thrown when the results file or its directory cannot be created
 */
export class PathUnwritableError extends Error {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot write results file ${path}${reason}`, { cause });
    this.name = 'PathUnwritableError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class ResultLog implements ResultSink {
  private readonly logger: ServiceLogger;
  private linesWritten = 0;
  private closed = false;
  private failure: Error | undefined;
  private draining: Promise<void> | undefined;

  private constructor(
    public readonly path: string,
    private readonly stream: Writable
  ) {
    this.logger = createServiceLogger('ResultLog');
    this.stream.on('error', (error: Error) => this.recordFailure(error));
  }

  /**
   * Create the results file (and missing parent directories) for appending
   *
   * @throws OutputAlreadyExistsError if the file exists
   * @throws PathUnwritableError if the directory or file cannot be created
   */
  static async open(path: string): Promise<ResultLog> {
    try {
      await mkdir(dirname(path), { recursive: true });
    } catch (error) {
      throw new PathUnwritableError(path, error);
    }

    const stream = createWriteStream(path, { flags: 'wx', encoding: 'utf8' });
    try {
      await once(stream, 'open');
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new OutputAlreadyExistsError(path);
      }
      throw new PathUnwritableError(path, error);
    }

    return new ResultLog(path, stream);
  }

  /**
   * Append to a stream that is already open
   *
   * @param path - name used in logs and errors
   */
  static fromStream(path: string, stream: Writable): ResultLog {
    return new ResultLog(path, stream);
  }

  async append(line: ResultLine): Promise<void> {
    if (this.closed) {
      throw new Error(`ResultLog ${this.path} is closed`);
    }
    while (this.draining) {
      await this.draining;
    }
    if (this.failure) {
      throw this.failure;
    }

    const text = `${JSON.stringify(line)}\n`;
    this.linesWritten++;
    await new Promise<void>((resolve, reject) => {
      const accepted = this.stream.write(text, (error) => {
        if (error) {
          log.methodError(this.logger, 'append', error, { path: this.path });
          reject(error);
        } else {
          resolve();
        }
      });
      if (!accepted) {
        this.waitForDrain();
      }
    });
  }

  getLinesWritten(): number {
    return this.linesWritten;
  }

  /**
   * Flush pending writes and close the file
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.failure) {
      // already reported through append()
      this.stream.destroy();
      return;
    }
    this.stream.end();
    await finished(this.stream);
    this.logger.debug({ path: this.path, lines: this.linesWritten }, 'Results file closed');
  }

  private waitForDrain(): void {
    if (this.draining) return;
    this.draining = once(this.stream, 'drain').then(
      () => {
        this.draining = undefined;
      },
      (error: unknown) => {
        this.draining = undefined;
        this.recordFailure(error instanceof Error ? error : new Error(String(error)));
      }
    );
  }

  private recordFailure(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
  }
}
