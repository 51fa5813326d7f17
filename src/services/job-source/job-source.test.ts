/**
 * Tests for JsonlJobSource
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { JsonlJobSource, MalformedInputError, parseRequestLine } from './job-source.js';

describe('parseRequestLine()', () => {
  it('should split metadata from the payload', () => {
    const job = parseRequestLine(
      '{"model":"m","input":"hi","metadata":{"row_id":7}}',
      3,
      'requests.jsonl'
    );

    expect(job).toEqual({
      payload: { model: 'm', input: 'hi' },
      metadata: { row_id: 7 },
      lineNumber: 3,
    });
  });

  it('should leave metadata unset when the key is absent or null', () => {
    expect(parseRequestLine('{"input":"a"}', 1, 'x')).toEqual({
      payload: { input: 'a' },
      lineNumber: 1,
    });
    expect(parseRequestLine('{"input":"a","metadata":null}', 2, 'x')).toEqual({
      payload: { input: 'a' },
      lineNumber: 2,
    });
  });

  it('should keep falsy but present metadata', () => {
    expect(parseRequestLine('{"metadata":0}', 1, 'x')).toEqual({
      payload: {},
      metadata: 0,
      lineNumber: 1,
    });
  });

  it('should return undefined for whitespace-only lines', () => {
    expect(parseRequestLine('   \t', 4, 'x')).toBeUndefined();
  });

  it('should reject unparseable JSON with the line number', () => {
    expect(() => parseRequestLine('{"input": ', 12, 'requests.jsonl')).toThrow(MalformedInputError);

    try {
      parseRequestLine('{"input": ', 12, 'requests.jsonl');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      if (error instanceof MalformedInputError) {
        expect(error.lineNumber).toBe(12);
        expect(error.source).toBe('requests.jsonl');
        expect(error.message).toMatch(/^Malformed input on line 12 of requests\.jsonl: /);
      }
    }
  });

  it.each([
    ['[1,2]', 'array'],
    ['42', 'number'],
    ['"text"', 'string'],
    ['null', 'null'],
  ])('should reject the non-object line %s', (line, kind) => {
    expect(() => parseRequestLine(line, 1, 'in.jsonl')).toThrow(
      `Malformed input on line 1 of in.jsonl: expected a JSON object, got ${kind}`
    );
  });
});

describe('JsonlJobSource', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('should yield jobs in order and then report exhaustion once', async () => {
    const source = new JsonlJobSource(['{"input":"a"}', '', '{"input":"b"}']);

    expect(source.isExhausted()).toBe(false);
    expect(await source.next()).toEqual({ payload: { input: 'a' }, lineNumber: 1 });
    expect(await source.next()).toEqual({ payload: { input: 'b' }, lineNumber: 3 });
    expect(await source.next()).toBeUndefined();
    expect(source.isExhausted()).toBe(true);
    expect(await source.next()).toBeUndefined();
  });

  it('should read lazily from an async iterable', async () => {
    const pulled: number[] = [];
    async function* lines() {
      for (let i = 1; i <= 3; i++) {
        pulled.push(i);
        yield JSON.stringify({ input: String(i) });
      }
    }

    const source = new JsonlJobSource(lines());
    await source.next();

    expect(pulled).toEqual([1]);
  });

  it('should stop at a malformed line', async () => {
    const source = new JsonlJobSource(['{"input":"a"}', 'not json'], {
      sourceName: 'batch.jsonl',
    });

    await source.next();
    await expect(source.next()).rejects.toThrow(
      /^Malformed input on line 2 of batch\.jsonl: /
    );
  });

  it('should stream a file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'job-source-'));
    const path = join(dir, 'requests.jsonl');
    await writeFile(path, '{"input":"x","metadata":{"id":1}}\r\n{"input":"y"}\n');

    const source = JsonlJobSource.fromFile(path);

    expect(await source.next()).toEqual({
      payload: { input: 'x' },
      metadata: { id: 1 },
      lineNumber: 1,
    });
    expect(await source.next()).toEqual({ payload: { input: 'y' }, lineNumber: 2 });
    expect(await source.next()).toBeUndefined();
  });

  it('should be exhausted after close()', async () => {
    const source = new JsonlJobSource(['{"a":1}', '{"a":2}']);

    await source.close();

    expect(source.isExhausted()).toBe(true);
    expect(await source.next()).toBeUndefined();
  });

  it('should call release once, even after exhaustion', async () => {
    const release = vi.fn();
    const source = new JsonlJobSource(['{"a":1}'], { release });

    expect(await source.next()).toEqual({ payload: { a: 1 }, lineNumber: 1 });
    expect(await source.next()).toBeUndefined();
    await source.close();
    await source.close();

    expect(release).toHaveBeenCalledTimes(1);
  });
});
