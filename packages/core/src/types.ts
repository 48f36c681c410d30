import type { LogLevel } from '@tasksync/protocol';
import type { RetryPolicy } from './retrier.js';

/** Client configuration, merged from defaults, config.json and environment */
export interface TaskSyncConfig {
  configDir: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  batchConcurrency: number;
  pageSize: number;
  /** UTC offset for bare YYYY-MM-DD due dates, e.g. '+08:00' */
  dueOffset: string;
  logLevel: LogLevel;
}

/** Stored credentials (credentials.json) */
export interface Credentials {
  accessToken?: string;
  appId?: string;
  appSecret?: string;
}
