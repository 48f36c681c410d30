import {
  DEFAULT_ACCEPTABLE_SUCCESS_RATE,
  DEFAULT_BATCH_CONCURRENCY,
  type BatchOutcome,
  type BatchResult,
  type BatchSummary,
  type ErrorKind,
  type ResourceKind,
} from '@tasksync/protocol';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import type { TaskSyncError } from './errors.js';
import { SyncBus } from './events.js';
import type { Retrier } from './retrier.js';

export type BatchOp<T> = (id: string, signal?: AbortSignal) => Promise<T>;

export type SyncBatchOutcome<T> = BatchOutcome<T, TaskSyncError>;
export type SyncBatchResult<T> = BatchResult<T, TaskSyncError>;

export interface BatchOptions {
  retrier: Retrier;
  /** Parallel operations across distinct identifiers */
  concurrency?: number;
  signal?: AbortSignal;
  bus?: SyncBus;
  resource?: ResourceKind;
  label?: string;
}

export function summarize<T>(outcomes: readonly SyncBatchOutcome<T>[]): BatchSummary {
  const byKind: Partial<Record<ErrorKind, number>> = {};
  let succeeded = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      succeeded++;
    } else {
      byKind[outcome.error.kind] = (byKind[outcome.error.kind] ?? 0) + 1;
    }
  }
  const total = outcomes.length;
  return {
    total,
    succeeded,
    failed: total - succeeded,
    byKind,
    successRate: total === 0 ? 1 : succeeded / total,
  };
}

/** Whether a batch met the caller's success ratio */
export function isAcceptable(summary: BatchSummary, threshold: number = DEFAULT_ACCEPTABLE_SUCCESS_RATE): boolean {
  return summary.successRate >= threshold;
}

/**
 * Batch Executor — apply one operation to each identifier.
 *
 * Every identifier runs through the Retrier on its own; a terminal
 * failure is recorded on its outcome and never stops the others.
 * Outcomes come back in input order whatever the completion order.
 * Duplicate identifiers are processed independently and may race at
 * the service.
 *
 * On cancellation, identifiers that had not started get a Cancelled
 * outcome and completed outcomes are kept.
 */
export async function executeBatch<T>(
  ids: readonly string[],
  op: BatchOp<T>,
  options: BatchOptions,
): Promise<SyncBatchResult<T>> {
  const { retrier, signal, resource } = options;
  const bus = options.bus ?? new SyncBus();
  const label = options.label ?? 'batch';
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);

  bus.emitLog('info', `${label}: ${ids.length} item(s), concurrency ${limiter.limit}`, 'batch');

  const outcomes = await Promise.all(
    ids.map((id, index) =>
      limiter.run(async (): Promise<SyncBatchOutcome<T>> => {
        const result = await retrier.execute((_attempt, attemptSignal) => op(id, attemptSignal), {
          signal,
          resource,
          label: `${label} ${id}`,
        });
        if (result.ok) {
          bus.emitBatchItem(id, index, true, result.attempts);
          return { id, index, ok: true, value: result.value, attempts: result.attempts };
        }
        bus.emitBatchItem(id, index, false, result.attempts, result.error.kind);
        return { id, index, ok: false, error: result.error, attempts: result.attempts };
      }),
    ),
  );

  const summary = summarize(outcomes);
  const cancelled = outcomes.some((outcome) => !outcome.ok && outcome.error.kind === 'Cancelled');

  bus.emitBatchDone(summary.total, summary.succeeded, summary.failed, cancelled);
  bus.emitLog(
    summary.failed > 0 ? 'warn' : 'info',
    `${label}: ${summary.succeeded} succeeded, ${summary.failed} failed${cancelled ? ' (cancelled)' : ''}`,
    'batch',
  );

  return { outcomes, summary, cancelled };
}
