import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  type ResourceKind,
} from '@tasksync/protocol';
import { ErrorClassifier } from './error-classifier.js';
import { TaskSyncError, cancelledError } from './errors.js';
import { SyncBus } from './events.js';

export type Result<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: TaskSyncError; attempts: number };

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  baseDelayMs: DEFAULT_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetrierOptions extends Partial<RetryPolicy> {
  classifier?: ErrorClassifier;
  bus?: SyncBus;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  sleep?: SleepFn;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Resource the call addresses, used to qualify NotFound */
  resource?: ResourceKind;
  /** Operation name for log lines */
  label?: string;
}

export type AttemptFn<T> = (attempt: number, signal?: AbortSignal) => Promise<T>;

/** Abortable delay; rejects with a Cancelled error when the signal fires */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Return the value of a successful result or throw its error */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

/**
 * Rate-Limited Retrier — runs one logical operation with exponential
 * backoff and a bounded attempt budget.
 *
 * Only errors the classifier marks retryable are retried. A server
 * retry-after replaces the computed delay for that attempt. Budget and
 * counters live in the execute() call, so one Retrier can serve any
 * number of concurrent operations.
 */
export class Retrier {
  readonly policy: RetryPolicy;
  readonly classifier: ErrorClassifier;
  private bus: SyncBus;
  private random: () => number;
  private sleepFn: SleepFn;

  constructor(options: RetrierOptions = {}) {
    this.policy = {
      maxAttempts: Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts)),
      baseDelayMs: Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: Math.max(0, options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs),
    };
    this.classifier = options.classifier ?? new ErrorClassifier();
    this.bus = options.bus ?? new SyncBus();
    this.random = options.random ?? Math.random;
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Backoff before retrying after failed attempt k (1-based):
   * min(ceiling, base * 2^(k-1)) * jitter, jitter in [0.5, 1.0)
   */
  computeDelay(attempt: number): number {
    const exponential = Math.min(this.policy.maxDelayMs, this.policy.baseDelayMs * Math.pow(2, attempt - 1));
    const jitter = 0.5 + this.random() * 0.5;
    return exponential * jitter;
  }

  async execute<T>(attemptFn: AttemptFn<T>, options: ExecuteOptions = {}): Promise<Result<T>> {
    const { signal, resource } = options;
    const label = options.label ?? 'request';
    const { maxAttempts, maxDelayMs } = this.policy;
    const started = performance.now();

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return this.fail(cancelledError(signal.reason), attempt - 1);
      }

      let error: TaskSyncError;
      try {
        const value = await attemptFn(attempt, signal);
        return { ok: true, value, attempts: attempt };
      } catch (err) {
        error = signal?.aborted ? cancelledError(signal.reason) : this.classifier.classifyThrown(err, resource);
      }

      if (error.kind === 'Cancelled' || !error.retryable) {
        return this.fail(error, attempt);
      }

      if (attempt >= maxAttempts) {
        const elapsed = Math.round(performance.now() - started);
        this.bus.emitLog('warn', `${label}: gave up after ${attempt} attempts in ${elapsed}ms (${error.kind})`, 'retrier');
        return this.fail(
          new TaskSyncError('RetryBudgetExceeded', `Retry budget exceeded after ${attempt} attempts: ${error.message}`, {
            retriesExhausted: true,
            status: error.status,
            code: error.code,
            resource: error.resource,
            underlyingKind: error.kind,
            cause: error,
          }),
          attempt,
        );
      }

      const retryAfterMs = error.retryAfterMs;
      const fromRetryAfter = retryAfterMs !== undefined;
      const delayMs = retryAfterMs !== undefined ? Math.min(retryAfterMs, maxDelayMs) : this.computeDelay(attempt);

      this.bus.emitRetry(attempt, error.kind, delayMs, fromRetryAfter);
      this.bus.emitLog(
        'debug',
        `${label}: attempt ${attempt}/${maxAttempts} failed (${error.kind}), retrying in ${Math.round(delayMs)}ms`,
        'retrier',
      );

      try {
        await this.sleepFn(delayMs, signal);
      } catch (err) {
        return this.fail(cancelledError(signal?.reason ?? err), attempt);
      }
    }
  }

  private fail<T>(error: TaskSyncError, attempts: number): Result<T> {
    return { ok: false, error: error.withAttempts(attempts), attempts };
  }
}
