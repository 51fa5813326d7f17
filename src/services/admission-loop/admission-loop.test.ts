/**
 * Tests for AdmissionLoop
 *
 * The loop runs on a ManualClock: every sleep advances virtual time and
 * yields one macrotask turn, during which launched dispatches settle.
 */

import { describe, it, expect, vi } from 'vitest';
import { mockDeep } from 'vitest-mock-extended';
import type { DeepMockProxy } from 'vitest-mock-extended';
import { AdmissionLoop, InvalidCostError } from './admission-loop.js';
import type { RequestTransport } from '../../clients/http-transport/index.js';
import { estimateOpenAiTokens, zeroCost } from '../cost-estimator/index.js';
import type { CostEstimator } from '../cost-estimator/index.js';
import { Dispatcher } from '../dispatcher/index.js';
import { JsonlJobSource, MalformedInputError } from '../job-source/index.js';
import type { LineSource } from '../job-source/index.js';
import type { ResultSink } from '../result-log/index.js';
import { RetryQueue } from '../retry-queue/index.js';
import { StatusTracker } from '../status-tracker/index.js';
import { RateBucket } from '../../utils/rate-bucket/index.js';
import { ManualClock, MemoryResultSink } from '../../test/helpers.js';
import type { RequestPayload } from '../../shared/types/index.js';

const T0 = 1_700_000_000_000;

interface HarnessOptions {
  lines: LineSource;
  respond?: (payload: RequestPayload) => unknown;
  maxAttempts?: number;
  cooldownMs?: number;
  loopSleepMs?: number;
  requestLimit?: number;
  costLimit?: number;
  costEstimator?: CostEstimator;
  resultSink?: ResultSink;
}

interface Harness {
  loop: AdmissionLoop;
  dispatcher: Dispatcher;
  transport: DeepMockProxy<RequestTransport>;
  sink: MemoryResultSink;
  tracker: StatusTracker;
  clock: ManualClock;
  sendTimes: number[];
  sentPayloads: RequestPayload[];
}

function createHarness(options: HarnessOptions): Harness {
  const clock = new ManualClock(T0);
  const sink = new MemoryResultSink();
  const tracker = new StatusTracker();
  const retryQueue = new RetryQueue();
  const transport = mockDeep<RequestTransport>();
  const sendTimes: number[] = [];
  const sentPayloads: RequestPayload[] = [];
  const respond = options.respond ?? (() => ({ data: 'ok' }));

  transport.send.mockImplementation(async (request) => {
    sendTimes.push(clock.now());
    sentPayloads.push(request.payload);
    return respond(request.payload);
  });

  const dispatcher = new Dispatcher(
    {
      transport,
      resultSink: options.resultSink ?? sink,
      retryQueue,
      statusTracker: tracker,
      clock,
    },
    { requestUrl: 'https://api.example.test/v1/embeddings' }
  );

  const loop = new AdmissionLoop(
    {
      source: new JsonlJobSource(options.lines, { sourceName: 'requests.jsonl' }),
      retryQueue,
      requestBucket: new RateBucket({
        limit: options.requestLimit ?? 100,
        periodSeconds: 60,
        name: 'requests',
        now: clock.now(),
      }),
      costBucket: new RateBucket({
        limit: options.costLimit ?? 1000,
        periodSeconds: 60,
        name: 'cost',
        now: clock.now(),
      }),
      dispatcher,
      statusTracker: tracker,
      costEstimator: options.costEstimator ?? zeroCost,
      costContext: { endpoint: 'embeddings', encoding: 'cl100k_base' },
      clock,
    },
    {
      maxAttempts: options.maxAttempts ?? 3,
      cooldownMs: options.cooldownMs ?? 15_000,
      loopSleepMs: options.loopSleepMs,
    }
  );

  return { loop, dispatcher, transport, sink, tracker, clock, sendTimes, sentPayloads };
}

/** Let `count` macrotask turns pass */
async function ticks(count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/** Estimator that reads the cost from a `weight` field */
const weightCost: CostEstimator = (payload) =>
  typeof payload.weight === 'number' ? payload.weight : 0;

describe('AdmissionLoop', () => {
  // ============================================================================
  // Constructor
  // ============================================================================

  describe('Constructor', () => {
    it('should start in FETCHING', () => {
      const { loop } = createHarness({ lines: [] });
      expect(loop.getState()).toBe('FETCHING');
    });

    it.each([0, 1.5, Number.NaN])('should reject maxAttempts %s', (maxAttempts) => {
      expect(() => createHarness({ lines: [], maxAttempts })).toThrow(RangeError);
    });

    it('should reject a negative cooldown', () => {
      expect(() => createHarness({ lines: [], cooldownMs: -1 })).toThrow(RangeError);
    });
  });

  // ============================================================================
  // Draining
  // ============================================================================

  describe('run()', () => {
    it('should drain an empty input without sleeping', async () => {
      const { loop, clock } = createHarness({ lines: [] });

      const snapshot = await loop.run();

      expect(loop.getState()).toBe('DRAINED');
      expect(snapshot.started).toBe(0);
      expect(clock.sleeps).toEqual([]);
    });

    it('should write one success line for a single job', async () => {
      const { loop, sink, transport } = createHarness({ lines: ['{"input":"a"}'] });

      const snapshot = await loop.run();

      expect(transport.send).toHaveBeenCalledTimes(1);
      expect(sink.lines).toEqual([[{ input: 'a' }, { data: 'ok' }]]);
      expect(snapshot).toMatchObject({ started: 1, succeeded: 1, failed: 0, inProgress: 0 });
      expect(loop.getInFlightCount()).toBe(0);
    });

    it('should send the payload without metadata and write metadata last', async () => {
      const { loop, sink, sentPayloads } = createHarness({
        lines: ['{"input":"m","metadata":{"row":"x"}}'],
      });

      await loop.run();

      expect(sentPayloads).toEqual([{ input: 'm' }]);
      expect(sink.lines).toEqual([[{ input: 'm' }, { data: 'ok' }, { row: 'x' }]]);
    });

    it('should only run once', async () => {
      const { loop } = createHarness({ lines: [] });
      await loop.run();

      await expect(loop.run()).rejects.toThrow('AdmissionLoop.run() can only be called once');
    });
  });

  // ============================================================================
  // Retries
  // ============================================================================

  describe('retries', () => {
    it('should stop after maxAttempts and write the full history', async () => {
      const { loop, sink, transport } = createHarness({
        lines: ['{"input":"a"}'],
        maxAttempts: 3,
        respond: () => ({ error: { message: 'Invalid input' } }),
      });

      const snapshot = await loop.run();

      expect(transport.send).toHaveBeenCalledTimes(3);
      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toEqual([
        { input: 'a' },
        [1, 2, 3].map((attempt) => ({
          kind: 'api_error',
          attempt,
          message: 'Invalid input',
          error: { message: 'Invalid input' },
        })),
      ]);
      expect(snapshot).toMatchObject({ apiErrors: 3, failed: 1, succeeded: 0, inProgress: 0 });
    });

    it('should admit retries before new jobs, keeping job ids', async () => {
      let failedOnce = false;
      const harness = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}'],
        respond: (payload) => {
          if (payload.input === 'a' && !failedOnce) {
            failedOnce = true;
            return { error: 'temporary failure' };
          }
          return { data: payload.input };
        },
      });
      const dispatchSpy = vi.spyOn(harness.dispatcher, 'dispatch');

      await harness.loop.run();

      expect(harness.sentPayloads).toEqual([{ input: 'a' }, { input: 'a' }, { input: 'b' }]);
      expect(dispatchSpy.mock.calls.map(([job]) => job.id)).toEqual([1, 1, 2]);
      expect(harness.sink.lines).toEqual([
        [{ input: 'a' }, { data: 'a' }],
        [{ input: 'b' }, { data: 'b' }],
      ]);
    });

    it('should never exceed maxAttempts per job', async () => {
      const { loop, sink, transport } = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}', '{"input":"c"}'],
        maxAttempts: 2,
        respond: () => {
          throw new Error('connection refused');
        },
      });

      const snapshot = await loop.run();

      expect(transport.send).toHaveBeenCalledTimes(6);
      expect(sink.lines).toHaveLength(3);
      for (const line of sink.lines) {
        expect(Array.isArray(line[1]) ? line[1].length : -1).toBe(2);
      }
      expect(snapshot).toMatchObject({ otherErrors: 6, failed: 3, started: 3 });
    });

    it('should keep started = succeeded + failed + inProgress at every call', async () => {
      const observations: boolean[] = [];
      let calls = 0;
      let tracker: StatusTracker | undefined;
      const harness = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}', '{"input":"c"}', '{"input":"d"}'],
        respond: () => {
          if (tracker) {
            const s = tracker.snapshot();
            observations.push(s.started === s.succeeded + s.failed + s.inProgress);
          }
          calls++;
          return calls % 2 === 0 ? { error: 'flaky' } : { data: calls };
        },
      });
      tracker = harness.tracker;

      const snapshot = await harness.loop.run();

      expect(observations.length).toBeGreaterThan(4);
      expect(observations.every(Boolean)).toBe(true);
      expect(snapshot.started).toBe(snapshot.succeeded + snapshot.failed);
      expect(harness.sink.lines).toHaveLength(4);
    });
  });

  // ============================================================================
  // Throttling
  // ============================================================================

  describe('throttling', () => {
    it('should space admissions by request bucket refill', async () => {
      const { loop, sendTimes, tracker } = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}', '{"input":"c"}'],
        requestLimit: 1,
        loopSleepMs: 1000,
      });

      await loop.run();

      expect(sendTimes).toHaveLength(3);
      expect(sendTimes[0]).toBe(T0);
      expect(sendTimes[1] - sendTimes[0]).toBeGreaterThanOrEqual(60_000);
      expect(sendTimes[1] - sendTimes[0]).toBeLessThanOrEqual(61_000);
      expect(sendTimes[2] - sendTimes[1]).toBeGreaterThanOrEqual(60_000);
      expect(sendTimes[2] - sendTimes[1]).toBeLessThanOrEqual(61_000);
      expect(tracker.snapshot().succeeded).toBe(3);
    });

    it('should admit a zero-cost job while the cost bucket is empty', async () => {
      const { loop, sendTimes, sentPayloads } = createHarness({
        lines: ['{"input":"heavy","weight":10}', '{"input":"free","weight":0}'],
        costLimit: 10,
        costEstimator: weightCost,
      });

      await loop.run();

      expect(sentPayloads.map((payload) => payload.input)).toEqual(['heavy', 'free']);
      expect(sendTimes).toEqual([T0, T0 + 1]);
    });

    it('should finalize a job whose cost exceeds the bucket limit without sending it', async () => {
      const { loop, sink, sentPayloads } = createHarness({
        lines: ['{"input":"big","weight":11}', '{"input":"small","weight":2}'],
        costLimit: 10,
        costEstimator: weightCost,
      });

      const snapshot = await loop.run();

      expect(sentPayloads).toEqual([{ input: 'small', weight: 2 }]);
      expect(sink.lines).toEqual([
        [
          { input: 'big', weight: 11 },
          [
            {
              kind: 'cost_exceeds_limit',
              attempt: 0,
              message: 'Request cost 11 exceeds the cost limit of 10 per 60s',
              cost: 11,
              limit: 10,
            },
          ],
        ],
        [{ input: 'small', weight: 2 }, { data: 'ok' }],
      ]);
      expect(snapshot).toMatchObject({ started: 2, succeeded: 1, failed: 1 });
    });
  });

  // ============================================================================
  // Cooldown
  // ============================================================================

  describe('cooldown', () => {
    it('should pause all admissions for the cooldown window after a rate-limit rejection', async () => {
      const cooldownMs = 15_000;
      let calls = 0;
      const { loop, sendTimes, clock, tracker } = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}'],
        cooldownMs,
        respond: () => {
          calls++;
          return calls === 1 ? { error: { message: 'Rate limit reached for requests' } } : { data: 1 };
        },
      });

      await loop.run();

      // rejection observed after the first 1ms micro-sleep
      const rejectedAt = T0 + 1;
      expect(tracker.getLastRateLimitErrorTime()).toBe(rejectedAt);
      expect(sendTimes).toEqual([T0, rejectedAt + cooldownMs, rejectedAt + cooldownMs + 1]);
      expect(clock.sleeps).toEqual([1, cooldownMs, 1, 1]);
      expect(tracker.snapshot()).toMatchObject({ rateLimitErrors: 1, succeeded: 2 });
    });

    it('should hold a job pulled while a rate-limit rejection arrived', async () => {
      const cooldownMs = 15_000;
      let calls = 0;
      async function* slowLines(): AsyncGenerator<string> {
        for (const line of ['{"input":"a"}', '{"input":"b"}']) {
          await ticks(5);
          yield line;
        }
      }
      const { loop, sendTimes, sentPayloads, tracker } = createHarness({
        lines: slowLines(),
        cooldownMs,
        respond: async () => {
          calls++;
          if (calls === 1) {
            await ticks(2);
            return { error: { message: 'Rate limit reached for requests' } };
          }
          return { data: 1 };
        },
      });

      await loop.run();

      // rejection lands while line 2 is still being read
      const rejectedAt = T0 + 1;
      expect(tracker.getLastRateLimitErrorTime()).toBe(rejectedAt);
      expect(sentPayloads.map((payload) => payload.input)).toEqual(['a', 'b', 'a']);
      expect(sendTimes).toEqual([T0, rejectedAt + cooldownMs, rejectedAt + cooldownMs + 1]);
      expect(tracker.snapshot()).toMatchObject({ rateLimitErrors: 1, succeeded: 2 });
    });

    it('should not pause on API errors that are not rate limits', async () => {
      let calls = 0;
      const { loop, clock } = createHarness({
        lines: ['{"input":"a"}'],
        respond: () => {
          calls++;
          return calls === 1 ? { error: { message: 'Server overloaded' } } : { data: 1 };
        },
      });

      await loop.run();

      expect(clock.sleeps).toEqual([1, 1]);
    });
  });

  // ============================================================================
  // Fatal errors
  // ============================================================================

  describe('fatal errors', () => {
    it('should abort on malformed input after in-flight calls settle', async () => {
      const { loop, sink } = createHarness({ lines: ['{"input":"a"}', 'not json'] });

      await expect(loop.run()).rejects.toThrow(MalformedInputError);
      expect(sink.lines).toEqual([[{ input: 'a' }, { data: 'ok' }]]);
      expect(loop.getInFlightCount()).toBe(0);
    });

    it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])(
      'should abort when the estimator returns %s',
      async (cost) => {
        const { loop, tracker, transport } = createHarness({
          lines: ['{"input":"a"}'],
          costEstimator: () => cost,
        });

        await expect(loop.run()).rejects.toThrow(InvalidCostError);
        expect(tracker.snapshot().started).toBe(0);
        expect(transport.send).not.toHaveBeenCalled();
      }
    );

    it('should abort with the line number when the estimator cannot price a payload', async () => {
      const { loop, sink, transport } = createHarness({
        lines: ['{"input":"a"}', '{"input":5}'],
        costEstimator: estimateOpenAiTokens,
      });

      const run = loop.run();

      await expect(run).rejects.toThrow(MalformedInputError);
      await expect(run).rejects.toThrow(
        'Malformed input on line 2 of requests.jsonl: cannot estimate cost: Expecting either string or list of strings for "input"'
      );
      expect(transport.send).toHaveBeenCalledTimes(1);
      expect(sink.lines).toEqual([[{ input: 'a' }, { data: 'ok' }]]);
    });

    it('should abort with the line number when the estimator has no accounting for the endpoint', async () => {
      const { loop } = createHarness({
        lines: ['{"prompt":"a"}'],
        costEstimator: (payload) =>
          estimateOpenAiTokens(payload, { endpoint: 'images/generations', encoding: 'cl100k_base' }),
      });

      await expect(loop.run()).rejects.toThrow(
        'Malformed input on line 1 of requests.jsonl: cannot estimate cost: API endpoint "images/generations" is not supported by the openai cost estimator'
      );
    });

    it('should abort when a result cannot be written', async () => {
      const resultSink = mockDeep<ResultSink>();
      resultSink.append.mockRejectedValue(new Error('disk full'));
      const { loop, transport } = createHarness({
        lines: ['{"input":"a"}', '{"input":"b"}'],
        resultSink,
      });

      await expect(loop.run()).rejects.toThrow('disk full');
      expect(transport.send).toHaveBeenCalledTimes(1);
      expect(loop.getInFlightCount()).toBe(0);
    });
  });
});
