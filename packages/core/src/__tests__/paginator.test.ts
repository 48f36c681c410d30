import { describe, it, expect, vi } from 'vitest';
import type { Page } from '@tasksync/protocol';
import { paginate } from '../paginator.js';
import { Retrier } from '../retrier.js';
import { ServiceResponseError } from '../errors.js';

/** Offset-cursor listing over `total` numbered items */
function listing(total: number, pageSize: number) {
  return vi.fn(async (cursor: string | undefined): Promise<Page<number>> => {
    const offset = cursor === undefined ? 0 : Number(cursor);
    const items = Array.from({ length: Math.max(0, Math.min(pageSize, total - offset)) }, (_, i) => offset + i);
    const next = offset + items.length;
    return next < total ? { items, hasMore: true, pageToken: String(next) } : { items, hasMore: false };
  });
}

const retrier = () => new Retrier({ maxAttempts: 3, random: () => 0, sleep: async () => {} });

describe('PageStream', () => {
  it.each([
    [0, 10, 1],
    [7, 10, 1],
    [10, 10, 1],
    [25, 10, 3],
    [100, 7, 15],
  ])('yields %i items with page size %i in order using %i fetches', async (total, pageSize, fetches) => {
    const fetchPage = listing(total, pageSize);
    const items: number[] = [];

    for await (const item of paginate(fetchPage, { retrier: retrier() })) items.push(item);

    expect(items).toEqual(Array.from({ length: total }, (_, i) => i));
    expect(fetchPage).toHaveBeenCalledTimes(fetches);
  });

  it('restarts from the first page on every traversal', async () => {
    const fetchPage = listing(5, 2);
    const stream = paginate(fetchPage, { retrier: retrier() });

    const first = await stream.collect();
    const second = await stream.collect();

    expect(first.items).toEqual([0, 1, 2, 3, 4]);
    expect(second.items).toEqual([0, 1, 2, 3, 4]);
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual([undefined, '2', '4', undefined, '2', '4']);
  });

  it('retries a failing page without repeating items', async () => {
    const inner = listing(6, 3);
    let failed = false;
    const fetchPage = async (cursor: string | undefined) => {
      if (cursor === '3' && !failed) {
        failed = true;
        throw new ServiceResponseError({ status: 502, message: 'bad gateway' });
      }
      return inner(cursor);
    };

    const traversal = await paginate(fetchPage, { retrier: retrier() }).collect();

    expect(traversal.items).toEqual([0, 1, 2, 3, 4, 5]);
    expect(traversal.error).toBeUndefined();
    expect(traversal.pages).toBe(2);
  });

  it('keeps items from pages before a terminal failure', async () => {
    const inner = listing(9, 3);
    const fetchPage = async (cursor: string | undefined) => {
      if (cursor === '6') throw new ServiceResponseError({ status: 403, message: 'forbidden' });
      return inner(cursor);
    };

    const traversal = await paginate(fetchPage, { retrier: retrier() }).collect();

    expect(traversal.items).toEqual([0, 1, 2, 3, 4, 5]);
    expect(traversal.pages).toBe(2);
    expect(traversal.error?.kind).toBe('PermissionDenied');
  });

  it('throws the classified error from a for-await loop', async () => {
    const fetchPage = async (): Promise<Page<number>> => {
      throw new ServiceResponseError({ status: 404, code: 1470404, message: 'tasklist gone', resource: 'tasklist' });
    };
    const consume = async () => {
      for await (const _item of paginate(fetchPage, { retrier: retrier() })) {
        // unreachable
      }
    };
    await expect(consume()).rejects.toMatchObject({ kind: 'NotFound', resource: 'tasklist' });
  });

  it('returns the M items seen before cancellation and a Cancelled marker', async () => {
    const controller = new AbortController();
    const fetchPage = listing(50, 10);
    const seen: number[] = [];
    let error: unknown;

    try {
      for await (const item of paginate(fetchPage, { retrier: retrier(), signal: controller.signal })) {
        seen.push(item);
        if (seen.length === 13) controller.abort();
      }
    } catch (err) {
      error = err;
    }

    expect(seen).toEqual(Array.from({ length: 13 }, (_, i) => i));
    expect(error).toMatchObject({ kind: 'Cancelled' });
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('stops when the service repeats a cursor', async () => {
    const fetchPage = async (): Promise<Page<number>> => ({ items: [1], hasMore: true, pageToken: 'same' });

    const traversal = await paginate(fetchPage, { retrier: retrier() }).collect();

    expect(traversal.items).toEqual([1, 1]);
    expect(traversal.error?.kind).toBe('Unknown');
  });

  it('ends when hasMore is set without a token', async () => {
    const fetchPage = vi.fn(async (): Promise<Page<number>> => ({ items: [1, 2], hasMore: true }));
    const traversal = await paginate(fetchPage, { retrier: retrier() }).collect();
    expect(traversal.items).toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('counts without keeping items', async () => {
    const result = await paginate(listing(23, 5), { retrier: retrier() }).count();
    expect(result).toEqual({ count: 23, pages: 5 });
  });
});
