import type { ErrorKind } from './errors.js';

/**
 * Per-identifier result of a batch operation.
 *
 * `index` is the identifier's position in the request, so outcomes can be
 * zipped back to requests even when identifiers repeat.
 */
export type BatchOutcome<T, E = unknown> =
  | { id: string; index: number; ok: true; value: T; attempts: number }
  | { id: string; index: number; ok: false; error: E; attempts: number };

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  byKind: Partial<Record<ErrorKind, number>>;
  /** succeeded / total, 1 for an empty batch */
  successRate: number;
}

export interface BatchResult<T, E = unknown> {
  outcomes: BatchOutcome<T, E>[];
  summary: BatchSummary;
  /** True when the batch was cut short by its cancellation signal */
  cancelled: boolean;
}

/** Default success ratio for BatchSummary acceptance checks */
export const DEFAULT_ACCEPTABLE_SUCCESS_RATE = 0.9;
