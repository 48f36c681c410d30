import { describe, it, expect, vi } from 'vitest';
import type { BatchDonePayload } from '@tasksync/protocol';
import { executeBatch, isAcceptable, summarize } from '../batch-executor.js';
import { ConcurrencyLimiter } from '../concurrency-limiter.js';
import { Retrier } from '../retrier.js';
import { ServiceResponseError } from '../errors.js';
import { SyncBus } from '../events.js';

const retrier = () => new Retrier({ maxAttempts: 3, random: () => 0, sleep: async () => {} });

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ConcurrencyLimiter', () => {
  it('never runs more than the limit at once and keeps FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;
    const started: number[] = [];

    await Promise.all(
      [0, 1, 2, 3, 4].map((n) =>
        limiter.run(async () => {
          started.push(n);
          running++;
          peak = Math.max(peak, running);
          await delay(5);
          running--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(started).toEqual([0, 1, 2, 3, 4]);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.queueLength).toBe(0);
  });

  it('releases the slot when a task rejects', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('treats limits below one as one', () => {
    expect(new ConcurrencyLimiter(0).limit).toBe(1);
  });
});

describe('executeBatch', () => {
  it('returns one outcome per identifier, in input order, with |F| failures', async () => {
    const ids = ['a', 'b', 'c', 'd', 'e', 'f'];
    const failing = new Set(['b', 'e']);
    const op = vi.fn(async (id: string) => {
      // finish in reverse order
      await delay((ids.length - ids.indexOf(id)) * 2);
      if (failing.has(id)) throw new ServiceResponseError({ status: 404, message: `${id} missing`, resource: 'task' });
      return id.toUpperCase();
    });

    const result = await executeBatch(ids, op, { retrier: retrier(), concurrency: 3 });

    expect(result.outcomes).toHaveLength(ids.length);
    expect(result.outcomes.map((o) => o.id)).toEqual(ids);
    expect(result.outcomes.map((o) => o.index)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(result.outcomes.filter((o) => !o.ok).map((o) => o.id)).toEqual(['b', 'e']);
    expect(result.outcomes.flatMap((o) => (o.ok ? [o.value] : []))).toEqual(['A', 'C', 'D', 'F']);
    expect(result.summary).toEqual({
      total: 6,
      succeeded: 4,
      failed: 2,
      byKind: { NotFound: 2 },
      successRate: 4 / 6,
    });
    expect(result.cancelled).toBe(false);
  });

  it('retries each identifier independently', async () => {
    const attempts = new Map<string, number>();
    const op = async (id: string) => {
      const n = (attempts.get(id) ?? 0) + 1;
      attempts.set(id, n);
      if (id === 'slow' && n < 3) throw new ServiceResponseError({ status: 429, message: 'busy' });
      return n;
    };

    const result = await executeBatch(['fast', 'slow'], op, { retrier: retrier() });

    expect(result.outcomes.map((o) => o.attempts)).toEqual([1, 3]);
    expect(result.summary.failed).toBe(0);
  });

  it('caps parallel operations at the concurrency limit', async () => {
    let running = 0;
    let peak = 0;
    const op = async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(3);
      running--;
      return true;
    };

    await executeBatch(Array.from({ length: 10 }, (_, i) => `id${i}`), op, { retrier: retrier(), concurrency: 4 });

    expect(peak).toBe(4);
  });

  it('processes duplicate identifiers independently', async () => {
    const op = vi.fn(async (id: string) => id);
    const result = await executeBatch(['x', 'x'], op, { retrier: retrier() });
    expect(op).toHaveBeenCalledTimes(2);
    expect(result.outcomes.map((o) => o.index)).toEqual([0, 1]);
  });

  it('marks unstarted identifiers Cancelled and keeps completed outcomes', async () => {
    const controller = new AbortController();
    const bus = new SyncBus();
    const done: BatchDonePayload[] = [];
    bus.on('batch:done', (payload) => done.push(payload));
    const op = async (id: string) => {
      if (id === 'id1') controller.abort();
      return id;
    };

    const result = await executeBatch(['id0', 'id1', 'id2', 'id3'], op, {
      retrier: retrier(),
      concurrency: 1,
      signal: controller.signal,
      bus,
    });

    expect(result.outcomes).toHaveLength(4);
    expect(result.outcomes.map((o) => o.ok)).toEqual([true, true, false, false]);
    expect(result.outcomes.flatMap((o) => (o.ok ? [] : [o.error.kind]))).toEqual(['Cancelled', 'Cancelled']);
    expect(result.cancelled).toBe(true);
    expect(done).toEqual([{ scope: undefined, total: 4, succeeded: 2, failed: 2, cancelled: true }]);
  });

  it('handles an empty identifier list', async () => {
    const result = await executeBatch([], async () => 1, { retrier: retrier() });
    expect(result.outcomes).toEqual([]);
    expect(result.summary.successRate).toBe(1);
  });
});

describe('summary helpers', () => {
  it('accepts a batch at or above the threshold', () => {
    const summary = summarize<number>([
      { id: 'a', index: 0, ok: true, value: 1, attempts: 1 },
      { id: 'b', index: 1, ok: true, value: 2, attempts: 1 },
    ]);
    expect(isAcceptable(summary)).toBe(true);
    expect(isAcceptable({ ...summary, successRate: 0.89 })).toBe(false);
    expect(isAcceptable({ ...summary, successRate: 0.5 }, 0.5)).toBe(true);
  });
});
