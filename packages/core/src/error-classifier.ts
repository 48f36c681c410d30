import type { ErrorKind, ResourceKind, ServiceFailure } from '@tasksync/protocol';
import { ServiceResponseError, TaskSyncError, cancelledError } from './errors.js';

export interface ClassificationRule {
  kind: ErrorKind;
  /** Defaults to true for RateLimited and Transport, false otherwise */
  retryable?: boolean;
  /** Fixed resource for NotFound rules that name one */
  resource?: ResourceKind;
}

const RETRYABLE_BY_DEFAULT: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['RateLimited', 'Transport']);

// ──────────────────────────────────────────────
// Rule tables
// ──────────────────────────────────────────────

/** Service envelope codes of the Open Platform task API */
export const DEFAULT_CODE_RULES: Readonly<Record<number, ClassificationRule>> = {
  1470400: { kind: 'InvalidParameter' },
  1470403: { kind: 'PermissionDenied' },
  1470404: { kind: 'NotFound' },
  1470500: { kind: 'Transport' },
  99991400: { kind: 'RateLimited' },
  99991663: { kind: 'NotFound', resource: 'task' },
  99991672: { kind: 'PermissionDenied' },
  99991679: { kind: 'PermissionDenied' },
};

export const DEFAULT_STATUS_RULES: Readonly<Record<number, ClassificationRule>> = {
  400: { kind: 'InvalidParameter' },
  401: { kind: 'PermissionDenied' },
  403: { kind: 'PermissionDenied' },
  404: { kind: 'NotFound' },
  408: { kind: 'Transport' },
  422: { kind: 'InvalidParameter' },
  429: { kind: 'RateLimited' },
};

/**
 * Parse a server-suggested delay into milliseconds.
 *
 * Accepts delta-seconds (number or numeric string) or an HTTP date.
 * Returns undefined for anything else so callers fall back to backoff.
 */
export function parseRetryAfter(value: string | number | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

/**
 * Error Classifier — maps a service response to an ErrorKind and a retry
 * disposition. Pure: no I/O, no shared state beyond its own rule tables.
 *
 * Lookup order: service code table, then HTTP status table (any 5xx is
 * Transport), then Unknown with the service message kept verbatim.
 */
export class ErrorClassifier {
  private codeRules: Map<number, ClassificationRule>;
  private statusRules: Map<number, ClassificationRule>;
  private now: () => number;

  constructor(options?: {
    codeRules?: Record<number, ClassificationRule>;
    statusRules?: Record<number, ClassificationRule>;
    now?: () => number;
  }) {
    this.codeRules = new Map(
      Object.entries({ ...DEFAULT_CODE_RULES, ...options?.codeRules }).map(([code, rule]) => [Number(code), rule]),
    );
    this.statusRules = new Map(
      Object.entries({ ...DEFAULT_STATUS_RULES, ...options?.statusRules }).map(([status, rule]) => [
        Number(status),
        rule,
      ]),
    );
    this.now = options?.now ?? Date.now;
  }

  /** Add or replace the rule for a service code */
  register(code: number, rule: ClassificationRule): void {
    this.codeRules.set(code, rule);
  }

  /** Add or replace the rule for an HTTP status */
  registerStatus(status: number, rule: ClassificationRule): void {
    this.statusRules.set(status, rule);
  }

  classify(failure: ServiceFailure): TaskSyncError {
    const rule = this.lookup(failure);
    const kind = rule?.kind ?? 'Unknown';
    const retryable = rule?.retryable ?? RETRYABLE_BY_DEFAULT.has(kind);
    const resource = kind === 'NotFound' ? rule?.resource ?? failure.resource : failure.resource;

    return new TaskSyncError(kind, failure.message, {
      retryable,
      status: failure.status,
      code: failure.code,
      resource,
      retryAfterMs: kind === 'RateLimited' ? parseRetryAfter(failure.retryAfter, this.now()) : undefined,
    });
  }

  /**
   * Classify anything an attempt threw. Already-classified errors pass
   * through; request timeouts and network failures are Transport.
   */
  classifyThrown(err: unknown, resource?: ResourceKind): TaskSyncError {
    if (err instanceof TaskSyncError) return err;
    if (err instanceof ServiceResponseError) {
      return this.classify({
        status: err.status,
        code: err.code,
        message: err.message,
        retryAfter: err.retryAfter,
        resource: err.resource ?? resource,
      });
    }
    if (isAbortError(err)) return cancelledError(err);

    const message = err instanceof Error ? err.message : String(err);
    return new TaskSyncError('Transport', isTimeoutError(err) ? `Request timed out: ${message}` : message, {
      retryable: true,
      resource,
      cause: err,
    });
  }

  private lookup(failure: ServiceFailure): ClassificationRule | undefined {
    if (failure.code !== undefined && failure.code !== 0) {
      const byCode = this.codeRules.get(failure.code);
      if (byCode) return byCode;
    }
    if (failure.status !== undefined) {
      const byStatus = this.statusRules.get(failure.status);
      if (byStatus) return byStatus;
      if (failure.status >= 500 && failure.status < 600) return { kind: 'Transport' };
    }
    return undefined;
  }
}
