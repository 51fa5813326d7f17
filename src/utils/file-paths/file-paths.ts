/**
 * File path helpers
 */

import { stat } from 'node:fs/promises';
import { format, parse } from 'node:path';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * The path itself if nothing exists there, otherwise the first free
 * `<stem>_<n><ext>` beside it
 *
 * @example
 * // with out.jsonl and out_1.jsonl taken
 * await nonDuplicatePath('out.jsonl') // 'out_2.jsonl'
 */
export async function nonDuplicatePath(path: string): Promise<string> {
  if (!(await pathExists(path))) {
    return path;
  }

  const { dir, name, ext } = parse(path);
  for (let n = 1; ; n++) {
    const candidate = format({ dir, name: `${name}_${n}`, ext });
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}

/**
 * Insert a suffix before the extension
 *
 * @example
 * withSuffix('out/results.jsonl', '_with_errors') // 'out/results_with_errors.jsonl'
 */
export function withSuffix(path: string, suffix: string): string {
  const { dir, name, ext } = parse(path);
  return format({ dir, name: `${name}${suffix}`, ext });
}
