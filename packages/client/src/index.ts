export {
  TaskSyncClient,
  type TaskSyncClientOptions,
  type ConfiguredClientOptions,
  type ListOptions,
  type ListCursor,
  type PageOptions,
  type CursorPage,
  type BatchCallOptions,
  type DeleteOptions,
  type ImportRecord,
  type ImportOptions,
  type ImportedTask,
  type BalanceCallOptions,
  type ReportOptions,
  type ExportOptions,
} from './client.js';
export { HttpTaskService, type HttpTaskServiceOptions } from './http-service.js';
export { InMemoryTaskService, type InMemoryTaskServiceOptions, type ServiceOperation } from './memory-service.js';
export {
  buildReport,
  isOverdue,
  toExportRow,
  formatCsv,
  EXPORT_COLUMNS,
  type TaskReport,
  type TaskExportRow,
} from './report.js';
