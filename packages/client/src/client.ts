import {
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_DUE_OFFSET,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  OPEN_STATUSES,
  canonicalQueryKey,
  endOfDay,
  type Comment,
  type CommentId,
  type CreateTaskInput,
  type CreateTasklistInput,
  type CredentialProvider,
  type Page,
  type RemoteTaskService,
  type ResourceKind,
  type Task,
  type TaskId,
  type TaskListFilters,
  type TaskPatch,
  type TaskStatus,
  type Tasklist,
  type TasklistId,
  type TasklistPatch,
  type UserId,
} from '@tasksync/protocol';
import {
  ErrorClassifier,
  PageStream,
  Retrier,
  StaticTokenProvider,
  SyncBus,
  TaskSyncError,
  attachConsoleLogger,
  executeBatch,
  isTaskSyncError,
  loadConfig,
  loadCredentials,
  measureLoads,
  paginate,
  selectLeastLoaded,
  unwrap,
  type BalanceOptions,
  type CandidateLoad,
  type FetchPage,
  type RetryPolicy,
  type SyncBatchResult,
  type TaskSyncConfig,
} from '@tasksync/core';
import { HttpTaskService } from './http-service.js';
import { buildReport, toExportRow, type TaskExportRow, type TaskReport } from './report.js';

export interface TaskSyncClientOptions {
  service: RemoteTaskService;
  /** Shared retrier; built from `retry` and `classifier` when absent */
  retrier?: Retrier;
  retry?: Partial<RetryPolicy>;
  classifier?: ErrorClassifier;
  batchConcurrency?: number;
  pageSize?: number;
  /** UTC offset applied to bare YYYY-MM-DD due dates */
  dueOffset?: string;
  bus?: SyncBus;
}

export interface ListOptions {
  pageSize?: number;
  signal?: AbortSignal;
}

/** Opaque continuation bound to the query that issued it */
export interface ListCursor {
  token: string;
  queryKey: string;
}

export interface PageOptions extends ListOptions {
  cursor?: ListCursor;
}

export interface CursorPage<T> {
  items: T[];
  hasMore: boolean;
  cursor?: ListCursor;
}

export interface BatchCallOptions {
  signal?: AbortSignal;
  concurrency?: number;
}

export interface DeleteOptions {
  /** Treat an already-deleted task as success (returns false) */
  ignoreNotFound?: boolean;
  signal?: AbortSignal;
}

export interface ImportRecord {
  title: string;
  description?: string;
  assignee?: UserId;
  /** YYYY-MM-DD or a full RFC 3339 timestamp */
  due?: string;
  status?: TaskStatus;
}

export interface ImportOptions extends BatchCallOptions {
  tasklistId?: TasklistId;
  /** Assignee for records that name none */
  defaultAssignee?: UserId;
}

export interface ImportedTask {
  task: Task;
  /** Set when the task was created but its requested status could not be applied */
  statusError?: TaskSyncError;
  /** Set when the task was created but could not be added to the tasklist */
  membershipError?: TaskSyncError;
}

export interface BalanceCallOptions {
  openStatuses?: readonly TaskStatus[];
  signal?: AbortSignal;
}

export interface ReportOptions {
  tasklistId?: TasklistId;
  now?: Date;
  signal?: AbortSignal;
}

export interface ExportOptions {
  tasklistId?: TasklistId;
  pageSize?: number;
  signal?: AbortSignal;
}

export interface ConfiguredClientOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Overrides the token from credentials.json / TASKSYNC_ACCESS_TOKEN */
  credentials?: CredentialProvider;
  fetch?: typeof fetch;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * TaskSyncClient — the public surface over a Remote Task Service.
 *
 * Every service call runs through one Retrier, listings come back as
 * restartable PageStreams, and bulk operations go through the Batch
 * Executor with per-identifier outcomes. Errors surface as
 * TaskSyncError.
 */
export class TaskSyncClient {
  readonly service: RemoteTaskService;
  readonly retrier: Retrier;
  readonly bus: SyncBus;
  private batchConcurrency: number;
  private pageSize: number;
  private dueOffset: string;

  constructor(options: TaskSyncClientOptions) {
    this.service = options.service;
    this.bus = options.bus ?? new SyncBus();
    this.retrier =
      options.retrier ??
      new Retrier({ ...options.retry, classifier: options.classifier ?? new ErrorClassifier(), bus: this.bus });
    this.batchConcurrency = Math.max(1, Math.floor(options.batchConcurrency ?? DEFAULT_BATCH_CONCURRENCY));
    this.pageSize = this.checkPageSize(options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.dueOffset = options.dueOffset ?? DEFAULT_DUE_OFFSET;
    if (endOfDay('2000-01-01', this.dueOffset) === null) {
      throw new TaskSyncError('InvalidParameter', `Invalid UTC offset: ${this.dueOffset}`);
    }
  }

  static fromConfig(config: TaskSyncConfig, service: RemoteTaskService, bus?: SyncBus): TaskSyncClient {
    return new TaskSyncClient({
      service,
      retry: config.retry,
      batchConcurrency: config.batchConcurrency,
      pageSize: config.pageSize,
      dueOffset: config.dueOffset,
      bus,
    });
  }

  /**
   * Client over the HTTP service, configured from the config directory
   * and environment, with console logging at the configured level.
   */
  static async fromConfigDir(options: ConfiguredClientOptions = {}): Promise<TaskSyncClient> {
    const config = await loadConfig(options.configDir, options.env);
    let credentials = options.credentials;
    if (!credentials) {
      const stored = await loadCredentials(config.configDir, options.env);
      if (!stored.accessToken) {
        throw new TaskSyncError('PermissionDenied', 'No access token configured (set TASKSYNC_ACCESS_TOKEN)');
      }
      credentials = new StaticTokenProvider(stored.accessToken);
    }
    const service = new HttpTaskService({
      credentials,
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch: options.fetch,
    });
    const bus = SyncBus.create('tasksync');
    attachConsoleLogger(bus, { level: config.logLevel });
    return TaskSyncClient.fromConfig(config, service, bus);
  }

  /** Detach every listener from the client's bus */
  close(): void {
    this.bus.dispose();
  }

  // ──────────────────────────────────────────────
  // Tasks
  // ──────────────────────────────────────────────

  async createTask(input: CreateTaskInput, signal?: AbortSignal): Promise<Task> {
    const resolved: CreateTaskInput =
      input.dueTime === undefined ? input : { ...input, dueTime: this.resolveDueTime(input.dueTime) };
    return this.call('createTask', 'task', (s) => this.service.createTask(resolved, s), signal);
  }

  async getTask(taskId: TaskId, signal?: AbortSignal): Promise<Task> {
    return this.call('getTask', 'task', (s) => this.service.getTask(taskId, s), signal);
  }

  /** Only fields set on the patch are sent; `null` clears a nullable field */
  async updateTask(taskId: TaskId, patch: TaskPatch, signal?: AbortSignal): Promise<Task> {
    const resolved = this.resolvePatch(patch);
    return this.call('updateTask', 'task', (s) => this.service.updateTask(taskId, resolved, s), signal);
  }

  async completeTask(taskId: TaskId, signal?: AbortSignal): Promise<Task> {
    return this.updateTask(taskId, { status: 'completed' }, signal);
  }

  /** Resolves true when the task was deleted, false when it was already gone */
  async deleteTask(taskId: TaskId, options: DeleteOptions = {}): Promise<boolean> {
    try {
      await this.call('deleteTask', 'task', (s) => this.service.deleteTask(taskId, s), options.signal);
      return true;
    } catch (err) {
      if (options.ignoreNotFound && isTaskSyncError(err) && err.kind === 'NotFound') return false;
      throw err;
    }
  }

  listTasks(filters: TaskListFilters = {}, options: ListOptions = {}): PageStream<Task> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.stream(
      'listTasks',
      'task',
      (cursor, s) => this.service.listTasks(filters, pageSize, cursor, s),
      options.signal,
    );
  }

  /** One page of a task listing; the returned cursor only works with the same filters */
  async listTasksPage(filters: TaskListFilters = {}, options: PageOptions = {}): Promise<CursorPage<Task>> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.fetchCursorPage(
      'listTasks',
      canonicalQueryKey({ op: 'listTasks', ...filters }),
      options,
      'task',
      (token, s) => this.service.listTasks(filters, pageSize, token, s),
    );
  }

  /** Number of tasks matching the filters, by a count query where the service has one */
  async countTasks(filters: TaskListFilters = {}, signal?: AbortSignal, resource: ResourceKind = 'task'): Promise<number> {
    const { countTasks } = this.service;
    if (countTasks) {
      return this.call('countTasks', resource, (s) => countTasks.call(this.service, filters, s), signal);
    }
    const pageSize = MAX_PAGE_SIZE;
    const traversal = await this.stream(
      'countTasks',
      resource,
      (cursor, s) => this.service.listTasks(filters, pageSize, cursor, s),
      signal,
    ).count();
    if (traversal.error) throw traversal.error;
    return traversal.count;
  }

  /** Open tasks assigned to me that fall due within the next `days` days, overdue ones included */
  async tasksDueSoon(days: number, options: { now?: Date; signal?: AbortSignal } = {}): Promise<Task[]> {
    if (!Number.isFinite(days) || days < 0) {
      throw new TaskSyncError('InvalidParameter', `days must be a non-negative number, got ${days}`);
    }
    const now = options.now ?? new Date();
    const filters: TaskListFilters = {
      assignedToMe: true,
      statuses: [...OPEN_STATUSES],
      dueBefore: new Date(now.getTime() + days * DAY_MS).toISOString(),
    };
    return this.drain(this.listTasks(filters, { signal: options.signal }));
  }

  // ──────────────────────────────────────────────
  // Subtasks
  // ──────────────────────────────────────────────

  listSubtasks(taskId: TaskId, options: ListOptions = {}): PageStream<Task> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.stream(
      'listSubtasks',
      'task',
      (cursor, s) => this.service.listSubtasks(taskId, pageSize, cursor, s),
      options.signal,
    );
  }

  /**
   * Every descendant of `rootId`, breadth-first. A task reached twice
   * (the parent relation can loop) is visited once.
   */
  async listSubtaskTree(rootId: TaskId, signal?: AbortSignal): Promise<Task[]> {
    const visited = new Set<TaskId>([rootId]);
    const queue: TaskId[] = [rootId];
    const descendants: Task[] = [];

    for (let parentId = queue.shift(); parentId !== undefined; parentId = queue.shift()) {
      for await (const child of this.listSubtasks(parentId, { signal })) {
        if (visited.has(child.id)) continue;
        visited.add(child.id);
        descendants.push(child);
        queue.push(child.id);
      }
    }
    return descendants;
  }

  /** Parent chain of a task, nearest first; stops where the chain loops */
  async getAncestors(taskId: TaskId, signal?: AbortSignal): Promise<Task[]> {
    const visited = new Set<TaskId>([taskId]);
    const ancestors: Task[] = [];
    let current = await this.getTask(taskId, signal);

    while (current.parentTaskId !== null && !visited.has(current.parentTaskId)) {
      visited.add(current.parentTaskId);
      current = await this.getTask(current.parentTaskId, signal);
      ancestors.push(current);
    }
    return ancestors;
  }

  // ──────────────────────────────────────────────
  // Tasklists
  // ──────────────────────────────────────────────

  async createTasklist(input: CreateTasklistInput, signal?: AbortSignal): Promise<Tasklist> {
    return this.call('createTasklist', 'tasklist', (s) => this.service.createTasklist(input, s), signal);
  }

  async getTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<Tasklist> {
    return this.call('getTasklist', 'tasklist', (s) => this.service.getTasklist(tasklistId, s), signal);
  }

  async updateTasklist(tasklistId: TasklistId, patch: TasklistPatch, signal?: AbortSignal): Promise<Tasklist> {
    return this.call('updateTasklist', 'tasklist', (s) => this.service.updateTasklist(tasklistId, patch, s), signal);
  }

  /** Member tasks are not deleted */
  async deleteTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<void> {
    return this.call('deleteTasklist', 'tasklist', (s) => this.service.deleteTasklist(tasklistId, s), signal);
  }

  listTasklists(options: ListOptions = {}): PageStream<Tasklist> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.stream(
      'listTasklists',
      'tasklist',
      (cursor, s) => this.service.listTasklists(pageSize, cursor, s),
      options.signal,
    );
  }

  async addTaskToTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void> {
    return this.call(
      'addTaskToTasklist',
      'tasklist',
      (s) => this.service.addTaskToTasklist(tasklistId, taskId, s),
      signal,
    );
  }

  async removeTaskFromTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void> {
    return this.call(
      'removeTaskFromTasklist',
      'tasklist',
      (s) => this.service.removeTaskFromTasklist(tasklistId, taskId, s),
      signal,
    );
  }

  listTasksInTasklist(tasklistId: TasklistId, options: ListOptions = {}): PageStream<Task> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.stream(
      'listTasksInTasklist',
      'tasklist',
      (cursor, s) => this.service.listTasksInTasklist(tasklistId, pageSize, cursor, s),
      options.signal,
    );
  }

  async listTasksInTasklistPage(tasklistId: TasklistId, options: PageOptions = {}): Promise<CursorPage<Task>> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.fetchCursorPage(
      'listTasksInTasklist',
      canonicalQueryKey({ op: 'listTasksInTasklist', tasklistId }),
      options,
      'tasklist',
      (token, s) => this.service.listTasksInTasklist(tasklistId, pageSize, token, s),
    );
  }

  // ──────────────────────────────────────────────
  // Comments
  // ──────────────────────────────────────────────

  async createComment(taskId: TaskId, content: string, signal?: AbortSignal): Promise<Comment> {
    return this.call('createComment', 'task', (s) => this.service.createComment(taskId, content, s), signal);
  }

  listComments(taskId: TaskId, options: ListOptions = {}): PageStream<Comment> {
    const pageSize = this.checkPageSize(options.pageSize ?? this.pageSize);
    return this.stream(
      'listComments',
      'task',
      (cursor, s) => this.service.listComments(taskId, pageSize, cursor, s),
      options.signal,
    );
  }

  async deleteComment(taskId: TaskId, commentId: CommentId, signal?: AbortSignal): Promise<void> {
    return this.call('deleteComment', 'comment', (s) => this.service.deleteComment(taskId, commentId, s), signal);
  }

  // ──────────────────────────────────────────────
  // Bulk operations
  // ──────────────────────────────────────────────

  async bulkUpdate(taskIds: readonly TaskId[], patch: TaskPatch, options: BatchCallOptions = {}): Promise<SyncBatchResult<Task>> {
    const resolved = this.resolvePatch(patch);
    return this.batch('bulkUpdate', taskIds, (id, s) => this.service.updateTask(id, resolved, s), options);
  }

  async bulkAssign(
    taskIds: readonly TaskId[],
    assignee: UserId | null,
    options: BatchCallOptions = {},
  ): Promise<SyncBatchResult<Task>> {
    return this.bulkUpdate(taskIds, { assignee }, options);
  }

  async bulkUpdateStatus(
    taskIds: readonly TaskId[],
    status: TaskStatus,
    options: BatchCallOptions = {},
  ): Promise<SyncBatchResult<Task>> {
    return this.bulkUpdate(taskIds, { status }, options);
  }

  /** `due` may be a bare date; it then means the end of that day */
  async bulkSetDueDate(
    taskIds: readonly TaskId[],
    due: string | null,
    options: BatchCallOptions = {},
  ): Promise<SyncBatchResult<Task>> {
    return this.bulkUpdate(taskIds, { dueTime: due }, options);
  }

  /** Outcome value is false for tasks that were already gone when `ignoreNotFound` is set */
  async bulkDelete(
    taskIds: readonly TaskId[],
    options: BatchCallOptions & { ignoreNotFound?: boolean } = {},
  ): Promise<SyncBatchResult<boolean>> {
    return this.batch(
      'bulkDelete',
      taskIds,
      async (id, s) => {
        try {
          await this.service.deleteTask(id, s);
          return true;
        } catch (err) {
          if (!options.ignoreNotFound) throw err;
          const error = this.retrier.classifier.classifyThrown(err, 'task');
          if (error.kind === 'NotFound') return false;
          throw error;
        }
      },
      options,
    );
  }

  /**
   * Create one task per record. A requested status is applied after
   * creation and, with a tasklist, each created task is then added to it.
   * Either follow-up step failing is reported on that outcome's value
   * and never re-creates the task.
   */
  async importTasks(records: readonly ImportRecord[], options: ImportOptions = {}): Promise<SyncBatchResult<ImportedTask>> {
    const ids = records.map((_record, index) => String(index));

    return this.batch(
      'importTasks',
      ids,
      async (id, s): Promise<ImportedTask> => {
        const record = records[Number(id)];
        if (!record) throw new TaskSyncError('InvalidParameter', `No import record at index ${id}`);
        const input = this.toCreateInput(record, options.defaultAssignee);
        const status = record.status;

        let task = await this.service.createTask(input, s);
        const imported: ImportedTask = { task };
        if (status !== undefined && status !== task.status) {
          const taskId = task.id;
          const updated = await this.retrier.execute((_a, inner) => this.service.updateTask(taskId, { status }, inner), {
            signal: s,
            resource: 'task',
            label: `importTasks status ${taskId}`,
          });
          if (updated.ok) {
            task = updated.value;
            imported.task = task;
          } else {
            this.bus.emitLog('warn', `created ${task.id} but could not set status: ${updated.error.message}`, 'import');
            imported.statusError = updated.error;
          }
        }
        if (options.tasklistId === undefined) return imported;

        const tasklistId = options.tasklistId;
        const taskId = task.id;
        const added = await this.retrier.execute(
          (_a, inner) => this.service.addTaskToTasklist(tasklistId, taskId, inner),
          { signal: s, resource: 'tasklist', label: `importTasks add ${taskId}` },
        );
        if (!added.ok) {
          this.bus.emitLog('warn', `created ${taskId} but could not add it to ${tasklistId}: ${added.error.message}`, 'import');
          imported.membershipError = added.error;
        }
        return imported;
      },
      options,
    );
  }

  // ──────────────────────────────────────────────
  // Workload balancing
  // ──────────────────────────────────────────────

  /** Open-task counts per distinct candidate, in candidate order */
  async measureLoads(candidates: readonly UserId[], options: BalanceCallOptions = {}): Promise<CandidateLoad[]> {
    return measureLoads(candidates, options.openStatuses ?? OPEN_STATUSES, this.balanceOptions(options.signal));
  }

  async selectLeastLoaded(candidates: readonly UserId[], options: BalanceCallOptions = {}): Promise<UserId> {
    return selectLeastLoaded(candidates, options.openStatuses ?? OPEN_STATUSES, this.balanceOptions(options.signal));
  }

  /**
   * Pick the least-loaded candidate, then create the task assigned to
   * them. Two separate calls: concurrent callers may pick the same user.
   */
  async createBalancedTask(
    input: Omit<CreateTaskInput, 'assignee'>,
    candidates: readonly UserId[],
    options: BalanceCallOptions = {},
  ): Promise<Task> {
    const assignee = await this.selectLeastLoaded(candidates, options);
    return this.createTask({ ...input, assignee }, options.signal);
  }

  // ──────────────────────────────────────────────
  // Reporting
  // ──────────────────────────────────────────────

  /** Status breakdown of a tasklist, or of the tasks assigned to me */
  async generateReport(options: ReportOptions = {}): Promise<TaskReport> {
    const stream =
      options.tasklistId === undefined
        ? this.listTasks({ assignedToMe: true }, { pageSize: MAX_PAGE_SIZE, signal: options.signal })
        : this.listTasksInTasklist(options.tasklistId, { pageSize: MAX_PAGE_SIZE, signal: options.signal });
    const tasks = await this.drain(stream);
    return buildReport(tasks, options.now ?? new Date());
  }

  /**
   * Flat rows for every task of a tasklist, or of my assigned tasks
   * without one. Draws on every page; a failed page fails the export.
   */
  async exportTasks(options: ExportOptions = {}): Promise<TaskExportRow[]> {
    const list: ListOptions = { pageSize: options.pageSize ?? MAX_PAGE_SIZE, signal: options.signal };
    const stream =
      options.tasklistId === undefined
        ? this.listTasks({ assignedToMe: true }, list)
        : this.listTasksInTasklist(options.tasklistId, list);
    const tasks = await this.drain(stream);
    return tasks.map(toExportRow);
  }

  /** Full due timestamp for a bare date or an RFC 3339 value */
  resolveDueTime(value: string): string {
    const expanded = endOfDay(value, this.dueOffset);
    if (expanded !== null) return expanded;
    if (!/^\d{4}-\d{2}-\d{2}T/.test(value) || Number.isNaN(Date.parse(value))) {
      throw new TaskSyncError('InvalidParameter', `Invalid due date: ${value}`);
    }
    return value;
  }

  // ──────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────

  private async call<T>(
    label: string,
    resource: ResourceKind,
    fn: (signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const result = await this.retrier.execute((_attempt, attemptSignal) => fn(attemptSignal), { signal, resource, label });
    return unwrap(result);
  }

  private stream<T>(label: string, resource: ResourceKind, fetchPage: FetchPage<T>, signal?: AbortSignal): PageStream<T> {
    return paginate(fetchPage, { retrier: this.retrier, signal, bus: this.bus, label, resource });
  }

  private async batch<T>(
    label: string,
    ids: readonly string[],
    op: (id: string, signal?: AbortSignal) => Promise<T>,
    options: BatchCallOptions,
  ): Promise<SyncBatchResult<T>> {
    return executeBatch(ids, op, {
      retrier: this.retrier,
      concurrency: options.concurrency ?? this.batchConcurrency,
      signal: options.signal,
      bus: this.bus,
      resource: 'task',
      label,
    });
  }

  private async fetchCursorPage<T>(
    label: string,
    queryKey: string,
    options: PageOptions,
    resource: ResourceKind,
    fetchPage: (token: string | undefined, signal?: AbortSignal) => Promise<Page<T>>,
  ): Promise<CursorPage<T>> {
    const { cursor } = options;
    if (cursor && cursor.queryKey !== queryKey) {
      throw new TaskSyncError('InvalidParameter', `${label}: cursor was issued for a different query`, { resource });
    }
    const page = await this.call(label, resource, (s) => fetchPage(cursor?.token, s), options.signal);
    if (page.hasMore && page.pageToken) {
      return { items: page.items, hasMore: true, cursor: { token: page.pageToken, queryKey } };
    }
    return { items: page.items, hasMore: false };
  }

  private async drain<T>(stream: PageStream<T>): Promise<T[]> {
    const traversal = await stream.collect();
    if (traversal.error) throw traversal.error;
    return traversal.items;
  }

  private balanceOptions(signal?: AbortSignal): BalanceOptions {
    return {
      countOpenTasks: (candidate: UserId, statuses: readonly TaskStatus[], s?: AbortSignal) =>
        this.countTasks({ assignee: candidate, statuses: [...statuses] }, s, 'user'),
      concurrency: this.batchConcurrency,
      signal,
      bus: this.bus,
      classifier: this.retrier.classifier,
    };
  }

  private resolvePatch(patch: TaskPatch): TaskPatch {
    if (patch.dueTime === undefined || patch.dueTime === null) return patch;
    return { ...patch, dueTime: this.resolveDueTime(patch.dueTime) };
  }

  private toCreateInput(record: ImportRecord, defaultAssignee?: UserId): CreateTaskInput {
    const input: CreateTaskInput = { summary: record.title };
    if (record.description !== undefined) input.description = record.description;
    const assignee = record.assignee ?? defaultAssignee;
    if (assignee !== undefined) input.assignee = assignee;
    if (record.due !== undefined && record.due.length > 0) input.dueTime = this.resolveDueTime(record.due);
    return input;
  }

  private checkPageSize(pageSize: number): number {
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new TaskSyncError('InvalidParameter', `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    return pageSize;
  }
}
