// Task model
export type {
  TaskId,
  TasklistId,
  CommentId,
  UserId,
  TaskStatus,
  CustomField,
  Task,
  CreateTaskInput,
  TaskPatch,
  TaskPatchField,
  TaskListFilters,
  Tasklist,
  CreateTasklistInput,
  TasklistPatch,
  TasklistPatchField,
  Comment,
  Page,
} from './task.js';

export {
  TASK_STATUSES,
  OPEN_STATUSES,
  TASK_PATCH_FIELDS,
  TASKLIST_PATCH_FIELDS,
} from './task.js';

// Errors
export type {
  ErrorKind,
  ResourceKind,
  ServiceFailure,
  ErrorInfo,
  ErrorDisposition,
} from './errors.js';

export { ERROR_KINDS } from './errors.js';

// Service contract
export type {
  RemoteTaskService,
  CredentialProvider,
  RefreshedToken,
  TokenRefresher,
} from './service.js';

// Batch
export type { BatchOutcome, BatchSummary, BatchResult } from './batch.js';
export { DEFAULT_ACCEPTABLE_SUCCESS_RATE } from './batch.js';

// Events
export type {
  LogLevel,
  LogPayload,
  RetryPayload,
  PagePayload,
  BatchItemPayload,
  BatchDonePayload,
  BalanceLoadPayload,
} from './events.js';

// Constants
export {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_API_BASE_URL,
  DEFAULT_DUE_OFFSET,
} from './constants.js';

// Helpers
export { presentFields, canonicalQueryKey, endOfDay } from './helpers.js';
