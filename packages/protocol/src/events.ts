import type { ErrorKind } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogPayload {
  scope?: string;       // Call scope this log belongs to
  level: LogLevel;
  message: string;
  source?: string;
}

export interface RetryPayload {
  scope?: string;
  attempt: number;      // Attempt that just failed (1-based)
  kind: ErrorKind;
  delayMs: number;
  fromRetryAfter: boolean;
}

export interface PagePayload {
  scope?: string;
  label: string;
  pageNumber: number;   // 1-based
  itemCount: number;
  hasMore: boolean;
}

export interface BatchItemPayload {
  scope?: string;
  id: string;
  index: number;
  ok: boolean;
  kind?: ErrorKind;
  attempts: number;
}

export interface BatchDonePayload {
  scope?: string;
  total: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

export interface BalanceLoadPayload {
  scope?: string;
  candidate: string;
  count?: number;
  kind?: ErrorKind;
}
