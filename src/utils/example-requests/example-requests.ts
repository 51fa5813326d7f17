/**
 * Example requests file
 *
 * Writes a synthetic batch of embedding requests, handy for trying out
 * rate limits against a real endpoint.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export const DEFAULT_EXAMPLE_COUNT = 10_000;
export const DEFAULT_EXAMPLE_MODEL = 'text-embedding-ada-002';

export interface ExampleRequestsOptions {
  /** @default DEFAULT_EXAMPLE_COUNT */
  count?: number;
  /** @default DEFAULT_EXAMPLE_MODEL */
  model?: string;
}

/**
 * Error thrown when the example file would overwrite an existing file
 */
export class RequestsFileExistsError extends Error {
  constructor(public readonly path: string) {
    super(`Requests file ${path} already exists. Delete it or choose a different path.`);
    this.name = 'RequestsFileExistsError';
  }
}

export function exampleRequestLines(count: number, model: string): string[] {
  return Array.from({ length: count }, (_, i) => JSON.stringify({ model, input: `${i}\n` }));
}

/**
 * Write `count` requests of the form {"model": model, "input": "<i>\n"}
 *
 * @returns number of requests written
 * @throws RequestsFileExistsError if the file exists
 */
export async function createExampleRequestsFile(
  path: string,
  options: ExampleRequestsOptions = {}
): Promise<number> {
  const count = options.count ?? DEFAULT_EXAMPLE_COUNT;
  const model = options.model ?? DEFAULT_EXAMPLE_MODEL;
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer. Received: ${count}`);
  }

  const lines = exampleRequestLines(count, model);
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(path, lines.map((line) => `${line}\n`).join(''), { flag: 'wx' });
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST') {
      throw new RequestsFileExistsError(path);
    }
    throw error;
  }
  return count;
}
