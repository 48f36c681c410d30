// Types
export type { TaskSyncConfig, Credentials } from './types.js';

// Config
export {
  DEFAULT_CONFIG,
  loadConfig,
  saveConfig,
  loadCredentials,
  saveCredentials,
  ensureConfigDir,
  type ConfigOverrides,
} from './config.js';

// Errors
export {
  TaskSyncError,
  ServiceResponseError,
  isTaskSyncError,
  cancelledError,
  describeError,
  type TaskSyncErrorOptions,
} from './errors.js';

// Error Classifier
export {
  ErrorClassifier,
  DEFAULT_CODE_RULES,
  DEFAULT_STATUS_RULES,
  parseRetryAfter,
  type ClassificationRule,
} from './error-classifier.js';

// Retrier
export {
  Retrier,
  DEFAULT_RETRY_POLICY,
  sleep,
  unwrap,
  type Result,
  type RetryPolicy,
  type RetrierOptions,
  type ExecuteOptions,
  type AttemptFn,
  type SleepFn,
} from './retrier.js';

// Paginator
export {
  PageStream,
  paginate,
  type FetchPage,
  type PaginateOptions,
  type Traversal,
  type CountTraversal,
} from './paginator.js';

// Batch Executor
export {
  executeBatch,
  summarize,
  isAcceptable,
  type BatchOp,
  type BatchOptions,
  type SyncBatchOutcome,
  type SyncBatchResult,
} from './batch-executor.js';

// Concurrency
export { ConcurrencyLimiter } from './concurrency-limiter.js';

// Workload Balancer
export {
  selectLeastLoaded,
  measureLoads,
  type CountOpenTasks,
  type CandidateLoad,
  type BalanceOptions,
} from './workload-balancer.js';

// Credentials
export { StaticTokenProvider, CachedTokenProvider } from './token-provider.js';

// Events & logging
export { SyncBus, type SyncEvents } from './events.js';
export { attachConsoleLogger, formatLogLine, type ConsoleLoggerOptions } from './logger.js';
