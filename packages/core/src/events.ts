import { EventEmitter } from 'node:events';
import type {
  BalanceLoadPayload,
  BatchDonePayload,
  BatchItemPayload,
  ErrorKind,
  LogLevel,
  LogPayload,
  PagePayload,
  RetryPayload,
} from '@tasksync/protocol';

export interface SyncEvents {
  'log': [LogPayload];
  'retry': [RetryPayload];
  'page': [PagePayload];
  'batch:item': [BatchItemPayload];
  'batch:done': [BatchDonePayload];
  'balance:load': [BalanceLoadPayload];
}

/**
 * SyncBus - event bus for one client call scope.
 *
 * Components never reach for a process-wide bus; callers create one per
 * client (or per operation) and pass it down. A bus nobody listens to
 * costs nothing.
 */
export class SyncBus extends EventEmitter<SyncEvents> {
  /** The scope this bus is tagged with (undefined for an untagged bus) */
  public readonly scope: string | undefined;

  constructor(scope?: string) {
    super();
    this.scope = scope;
  }

  /** Create a new scope-tagged bus instance */
  static create(scope: string): SyncBus {
    return new SyncBus(scope);
  }

  /** Dispose this bus instance */
  dispose(): void {
    this.removeAllListeners();
  }

  emitLog(level: LogLevel, message: string, source?: string): void {
    this.emit('log', { scope: this.scope, level, message, source });
  }

  emitRetry(attempt: number, kind: ErrorKind, delayMs: number, fromRetryAfter: boolean): void {
    this.emit('retry', { scope: this.scope, attempt, kind, delayMs, fromRetryAfter });
  }

  emitPage(label: string, pageNumber: number, itemCount: number, hasMore: boolean): void {
    this.emit('page', { scope: this.scope, label, pageNumber, itemCount, hasMore });
  }

  emitBatchItem(id: string, index: number, ok: boolean, attempts: number, kind?: ErrorKind): void {
    this.emit('batch:item', { scope: this.scope, id, index, ok, attempts, kind });
  }

  emitBatchDone(total: number, succeeded: number, failed: number, cancelled: boolean): void {
    this.emit('batch:done', { scope: this.scope, total, succeeded, failed, cancelled });
  }

  emitBalanceLoad(candidate: string, count?: number, kind?: ErrorKind): void {
    this.emit('balance:load', { scope: this.scope, candidate, count, kind });
  }
}
