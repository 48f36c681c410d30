/**
 * Error taxonomy shared by every component that talks to the service.
 */

export type ErrorKind =
  | 'PermissionDenied'
  | 'NotFound'
  | 'InvalidParameter'
  | 'RateLimited'
  | 'Transport'
  | 'RetryBudgetExceeded'
  | 'Cancelled'
  | 'AllCandidatesUnavailable'
  | 'Unknown';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'PermissionDenied',
  'NotFound',
  'InvalidParameter',
  'RateLimited',
  'Transport',
  'RetryBudgetExceeded',
  'Cancelled',
  'AllCandidatesUnavailable',
  'Unknown',
];

export type ResourceKind = 'task' | 'tasklist' | 'comment' | 'user';

/** Raw failure details as reported by the service */
export interface ServiceFailure {
  /** HTTP status, when a response was received */
  status?: number;
  /** Service-specific error code from the response envelope */
  code?: number;
  message: string;
  /** Server-suggested delay as received (seconds or HTTP date) */
  retryAfter?: string | number;
  /** Resource the failed call addressed, used to qualify NotFound */
  resource?: ResourceKind;
}

/** Serializable form of a classified error */
export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  retriesExhausted: boolean;
  attempts?: number;
  status?: number;
  code?: number;
  resource?: ResourceKind;
  underlyingKind?: ErrorKind;
}

/** How a presentation layer should react to an error */
export type ErrorDisposition = 'try_later' | 'fix_input' | 'not_allowed' | 'cancelled' | 'unknown';
