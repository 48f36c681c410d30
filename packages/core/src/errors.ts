import type {
  ErrorDisposition,
  ErrorInfo,
  ErrorKind,
  ResourceKind,
  ServiceFailure,
} from '@tasksync/protocol';

export interface TaskSyncErrorOptions {
  retryable?: boolean;
  retriesExhausted?: boolean;
  attempts?: number;
  status?: number;
  code?: number;
  resource?: ResourceKind;
  underlyingKind?: ErrorKind;
  /** Server-suggested delay in milliseconds, already parsed */
  retryAfterMs?: number;
  cause?: unknown;
}

/**
 * Classified failure surfaced to callers of the client core.
 *
 * Carries the error kind, the service's own code and message for
 * diagnostics, and whether the retry budget was spent.
 */
export class TaskSyncError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly retriesExhausted: boolean;
  readonly attempts?: number;
  readonly status?: number;
  readonly code?: number;
  readonly resource?: ResourceKind;
  readonly underlyingKind?: ErrorKind;
  readonly retryAfterMs?: number;

  constructor(kind: ErrorKind, message: string, options: TaskSyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TaskSyncError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.retriesExhausted = options.retriesExhausted ?? false;
    this.attempts = options.attempts;
    this.status = options.status;
    this.code = options.code;
    this.resource = options.resource;
    this.underlyingKind = options.underlyingKind;
    this.retryAfterMs = options.retryAfterMs;
  }

  /** Copy with attempt bookkeeping filled in */
  withAttempts(attempts: number): TaskSyncError {
    return new TaskSyncError(this.kind, this.message, {
      retryable: this.retryable,
      retriesExhausted: this.retriesExhausted,
      attempts,
      status: this.status,
      code: this.code,
      resource: this.resource,
      underlyingKind: this.underlyingKind,
      retryAfterMs: this.retryAfterMs,
      cause: this.cause,
    });
  }

  toJSON(): ErrorInfo {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      retriesExhausted: this.retriesExhausted,
      attempts: this.attempts,
      status: this.status,
      code: this.code,
      resource: this.resource,
      underlyingKind: this.underlyingKind,
    };
  }
}

/**
 * Raw, unclassified failure thrown by RemoteTaskService implementations
 * when the service answered with an error.
 */
export class ServiceResponseError extends Error implements ServiceFailure {
  readonly status?: number;
  readonly code?: number;
  readonly retryAfter?: string | number;
  readonly resource?: ResourceKind;

  constructor(failure: ServiceFailure) {
    super(failure.message);
    this.name = 'ServiceResponseError';
    this.status = failure.status;
    this.code = failure.code;
    this.retryAfter = failure.retryAfter;
    this.resource = failure.resource;
  }
}

export function isTaskSyncError(err: unknown): err is TaskSyncError {
  return err instanceof TaskSyncError;
}

export function cancelledError(reason?: unknown): TaskSyncError {
  const detail = reason instanceof Error ? reason.message : typeof reason === 'string' ? reason : undefined;
  return new TaskSyncError('Cancelled', detail ? `Operation cancelled: ${detail}` : 'Operation cancelled', {
    cause: reason,
  });
}

/** Map an error to the reaction a presentation layer should offer */
export function describeError(err: TaskSyncError): ErrorDisposition {
  const kind = err.kind === 'RetryBudgetExceeded' ? err.underlyingKind ?? err.kind : err.kind;
  switch (kind) {
    case 'RateLimited':
    case 'Transport':
    case 'RetryBudgetExceeded':
    case 'AllCandidatesUnavailable':
      return 'try_later';
    case 'InvalidParameter':
    case 'NotFound':
      return 'fix_input';
    case 'PermissionDenied':
      return 'not_allowed';
    case 'Cancelled':
      return 'cancelled';
    case 'Unknown':
      return 'unknown';
  }
}
