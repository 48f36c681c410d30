import { nanoid } from 'nanoid';
import {
  MAX_PAGE_SIZE,
  canonicalQueryKey,
  type Comment,
  type CommentId,
  type CreateTaskInput,
  type CreateTasklistInput,
  type Page,
  type RemoteTaskService,
  type ResourceKind,
  type ServiceFailure,
  type Task,
  type TaskId,
  type TaskListFilters,
  type TaskPatch,
  type Tasklist,
  type TasklistId,
  type TasklistPatch,
  type UserId,
} from '@tasksync/protocol';
import { ServiceResponseError } from '@tasksync/core';

export type ServiceOperation = keyof RemoteTaskService;

export interface InMemoryTaskServiceOptions {
  /** User the service treats as "me" for createdByMe / assignedToMe */
  currentUser?: UserId;
  /** Offer the optional count-only query */
  supportsCount?: boolean;
  now?: () => Date;
}

function notFound(resource: ResourceKind, id: string): ServiceResponseError {
  return new ServiceResponseError({ status: 404, code: 1470404, message: `${resource} not found: ${id}`, resource });
}

function invalidParameter(message: string): ServiceResponseError {
  return new ServiceResponseError({ status: 400, code: 1470400, message });
}

/**
 * In-memory Remote Task Service — same contract as the HTTP service,
 * for tests and local development.
 *
 * Cursors encode the query they were issued for and are refused by any
 * other query. Failures can be queued per operation to exercise retry
 * and partial-failure paths, and every call is counted.
 */
export class InMemoryTaskService implements RemoteTaskService {
  readonly currentUser: UserId;
  readonly calls = new Map<ServiceOperation, number>();
  countTasks?: (filters: TaskListFilters, signal?: AbortSignal) => Promise<number>;

  private tasks = new Map<TaskId, Task>();
  private creators = new Map<TaskId, UserId>();
  private tasklists = new Map<TasklistId, Tasklist>();
  private members = new Map<TasklistId, TaskId[]>();
  private comments = new Map<TaskId, Comment[]>();
  private faults = new Map<ServiceOperation, Array<ServiceFailure | Error>>();
  private now: () => Date;

  constructor(options: InMemoryTaskServiceOptions = {}) {
    this.currentUser = options.currentUser ?? 'ou_self';
    this.now = options.now ?? (() => new Date());
    if (options.supportsCount) {
      this.countTasks = async (filters) => {
        this.enter('countTasks');
        return this.filterTasks(filters).length;
      };
    }
  }

  // ──────────────────────────────────────────────
  // Test hooks
  // ──────────────────────────────────────────────

  /** Make the next `times` calls of an operation fail */
  injectFailure(operation: ServiceOperation, failure: ServiceFailure | Error, times = 1): void {
    const queue = this.faults.get(operation) ?? [];
    for (let i = 0; i < times; i++) queue.push(failure);
    this.faults.set(operation, queue);
  }

  callCount(operation: ServiceOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  // ──────────────────────────────────────────────
  // Tasks
  // ──────────────────────────────────────────────

  async createTask(input: CreateTaskInput): Promise<Task> {
    this.enter('createTask');
    if (input.summary.trim().length === 0) throw invalidParameter('summary is required');
    const timestamp = this.timestamp();
    const id = `task_${nanoid(12)}`;
    const task: Task = {
      id,
      summary: input.summary,
      description: input.description ?? '',
      status: 'todo',
      assignee: input.assignee ?? null,
      followers: [...new Set(input.followers ?? [])],
      dueTime: input.dueTime ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
      completedAt: null,
      parentTaskId: input.parentTaskId ?? null,
      customFields: (input.customFields ?? []).map((field) => ({ ...field })),
      url: `https://tasks.local/${id}`,
    };
    this.tasks.set(id, task);
    this.creators.set(id, this.currentUser);
    return this.copy(task);
  }

  async getTask(taskId: TaskId): Promise<Task> {
    this.enter('getTask');
    return this.copy(this.requireTask(taskId));
  }

  async updateTask(taskId: TaskId, patch: TaskPatch): Promise<Task> {
    this.enter('updateTask');
    const task = this.requireTask(taskId);
    if (patch.summary !== undefined && patch.summary.trim().length === 0) {
      throw invalidParameter('summary must not be empty');
    }
    const timestamp = this.timestamp();
    const updated: Task = {
      ...task,
      summary: patch.summary ?? task.summary,
      description: patch.description ?? task.description,
      status: patch.status ?? task.status,
      assignee: patch.assignee === undefined ? task.assignee : patch.assignee,
      followers: patch.followers === undefined ? task.followers : [...new Set(patch.followers)],
      dueTime: patch.dueTime === undefined ? task.dueTime : patch.dueTime,
      parentTaskId: patch.parentTaskId === undefined ? task.parentTaskId : patch.parentTaskId,
      customFields: patch.customFields === undefined ? task.customFields : patch.customFields.map((f) => ({ ...f })),
      updatedAt: timestamp,
    };
    if (patch.status !== undefined && patch.status !== task.status) {
      updated.completedAt = patch.status === 'completed' ? timestamp : null;
    }
    this.tasks.set(taskId, updated);
    return this.copy(updated);
  }

  async deleteTask(taskId: TaskId): Promise<void> {
    this.enter('deleteTask');
    this.requireTask(taskId);
    this.tasks.delete(taskId);
    this.creators.delete(taskId);
    this.comments.delete(taskId);
    for (const [tasklistId, ids] of this.members) {
      this.members.set(
        tasklistId,
        ids.filter((id) => id !== taskId),
      );
    }
  }

  async listTasks(filters: TaskListFilters, pageSize: number, pageToken?: string): Promise<Page<Task>> {
    this.enter('listTasks');
    const key = canonicalQueryKey({ op: 'listTasks', ...filters });
    return this.page(this.filterTasks(filters), key, pageSize, pageToken);
  }

  async listSubtasks(taskId: TaskId, pageSize: number, pageToken?: string): Promise<Page<Task>> {
    this.enter('listSubtasks');
    this.requireTask(taskId);
    const children = [...this.tasks.values()].filter((task) => task.parentTaskId === taskId);
    return this.page(children, canonicalQueryKey({ op: 'listSubtasks', taskId }), pageSize, pageToken);
  }

  // ──────────────────────────────────────────────
  // Tasklists
  // ──────────────────────────────────────────────

  async createTasklist(input: CreateTasklistInput): Promise<Tasklist> {
    this.enter('createTasklist');
    if (input.name.trim().length === 0) throw invalidParameter('name is required');
    const timestamp = this.timestamp();
    const tasklist: Tasklist = {
      id: `tasklist_${nanoid(12)}`,
      name: input.name,
      description: input.description ?? '',
      owner: this.currentUser,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.tasklists.set(tasklist.id, tasklist);
    this.members.set(tasklist.id, []);
    return { ...tasklist };
  }

  async getTasklist(tasklistId: TasklistId): Promise<Tasklist> {
    this.enter('getTasklist');
    return { ...this.requireTasklist(tasklistId) };
  }

  async updateTasklist(tasklistId: TasklistId, patch: TasklistPatch): Promise<Tasklist> {
    this.enter('updateTasklist');
    const tasklist = this.requireTasklist(tasklistId);
    const updated: Tasklist = {
      ...tasklist,
      name: patch.name ?? tasklist.name,
      description: patch.description ?? tasklist.description,
      updatedAt: this.timestamp(),
    };
    this.tasklists.set(tasklistId, updated);
    return { ...updated };
  }

  async deleteTasklist(tasklistId: TasklistId): Promise<void> {
    this.enter('deleteTasklist');
    this.requireTasklist(tasklistId);
    this.tasklists.delete(tasklistId);
    this.members.delete(tasklistId);
  }

  async listTasklists(pageSize: number, pageToken?: string): Promise<Page<Tasklist>> {
    this.enter('listTasklists');
    const all = [...this.tasklists.values()].map((tasklist) => ({ ...tasklist }));
    return this.page(all, canonicalQueryKey({ op: 'listTasklists' }), pageSize, pageToken);
  }

  async addTaskToTasklist(tasklistId: TasklistId, taskId: TaskId): Promise<void> {
    this.enter('addTaskToTasklist');
    this.requireTasklist(tasklistId);
    this.requireTask(taskId);
    const ids = this.members.get(tasklistId) ?? [];
    if (!ids.includes(taskId)) ids.push(taskId);
    this.members.set(tasklistId, ids);
  }

  async removeTaskFromTasklist(tasklistId: TasklistId, taskId: TaskId): Promise<void> {
    this.enter('removeTaskFromTasklist');
    this.requireTasklist(tasklistId);
    this.members.set(
      tasklistId,
      (this.members.get(tasklistId) ?? []).filter((id) => id !== taskId),
    );
  }

  async listTasksInTasklist(tasklistId: TasklistId, pageSize: number, pageToken?: string): Promise<Page<Task>> {
    this.enter('listTasksInTasklist');
    this.requireTasklist(tasklistId);
    const tasks = (this.members.get(tasklistId) ?? []).flatMap((id) => {
      const task = this.tasks.get(id);
      return task ? [this.copy(task)] : [];
    });
    return this.page(tasks, canonicalQueryKey({ op: 'listTasksInTasklist', tasklistId }), pageSize, pageToken);
  }

  // ──────────────────────────────────────────────
  // Comments
  // ──────────────────────────────────────────────

  async createComment(taskId: TaskId, content: string): Promise<Comment> {
    this.enter('createComment');
    this.requireTask(taskId);
    if (content.trim().length === 0) throw invalidParameter('content is required');
    const comment: Comment = {
      id: `comment_${nanoid(12)}`,
      taskId,
      content,
      creator: this.currentUser,
      createdAt: this.timestamp(),
    };
    this.comments.set(taskId, [...(this.comments.get(taskId) ?? []), comment]);
    return { ...comment };
  }

  async listComments(taskId: TaskId, pageSize: number, pageToken?: string): Promise<Page<Comment>> {
    this.enter('listComments');
    this.requireTask(taskId);
    const all = (this.comments.get(taskId) ?? []).map((comment) => ({ ...comment }));
    return this.page(all, canonicalQueryKey({ op: 'listComments', taskId }), pageSize, pageToken);
  }

  async deleteComment(taskId: TaskId, commentId: CommentId): Promise<void> {
    this.enter('deleteComment');
    this.requireTask(taskId);
    const existing = this.comments.get(taskId) ?? [];
    if (!existing.some((comment) => comment.id === commentId)) throw notFound('comment', commentId);
    this.comments.set(
      taskId,
      existing.filter((comment) => comment.id !== commentId),
    );
  }

  // ──────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────

  private enter(operation: ServiceOperation): void {
    this.calls.set(operation, this.callCount(operation) + 1);
    const fault = this.faults.get(operation)?.shift();
    if (fault === undefined) return;
    throw fault instanceof Error ? fault : new ServiceResponseError(fault);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private copy(task: Task): Task {
    return {
      ...task,
      followers: [...task.followers],
      customFields: task.customFields.map((field) => ({ ...field })),
    };
  }

  private requireTask(taskId: TaskId): Task {
    const task = this.tasks.get(taskId);
    if (!task) throw notFound('task', taskId);
    return task;
  }

  private requireTasklist(tasklistId: TasklistId): Tasklist {
    const tasklist = this.tasklists.get(tasklistId);
    if (!tasklist) throw notFound('tasklist', tasklistId);
    return tasklist;
  }

  private filterTasks(filters: TaskListFilters): Task[] {
    const dueBefore = filters.dueBefore === undefined ? undefined : Date.parse(filters.dueBefore);
    const dueAfter = filters.dueAfter === undefined ? undefined : Date.parse(filters.dueAfter);

    return [...this.tasks.values()]
      .filter((task) => {
        if (filters.createdByMe && this.creators.get(task.id) !== this.currentUser) return false;
        if (filters.assignedToMe && task.assignee !== this.currentUser) return false;
        if (filters.assignee !== undefined && task.assignee !== filters.assignee) return false;
        if (filters.statuses && filters.statuses.length > 0 && !filters.statuses.includes(task.status)) return false;
        if (dueBefore !== undefined || dueAfter !== undefined) {
          if (task.dueTime === null) return false;
          const due = Date.parse(task.dueTime);
          if (dueBefore !== undefined && !(due <= dueBefore)) return false;
          if (dueAfter !== undefined && !(due >= dueAfter)) return false;
        }
        return true;
      })
      .map((task) => this.copy(task));
  }

  private page<T>(all: T[], queryKey: string, pageSize: number, pageToken?: string): Page<T> {
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw invalidParameter(`page_size must be between 1 and ${MAX_PAGE_SIZE}`);
    }
    const offset = pageToken === undefined ? 0 : this.decodeToken(pageToken, queryKey);
    const items = all.slice(offset, offset + pageSize);
    const next = offset + items.length;
    if (next < all.length) {
      return { items, hasMore: true, pageToken: this.encodeToken(queryKey, next) };
    }
    return { items, hasMore: false };
  }

  private encodeToken(queryKey: string, offset: number): string {
    return Buffer.from(JSON.stringify({ q: queryKey, o: offset }), 'utf-8').toString('base64url');
  }

  private decodeToken(token: string, queryKey: string): number {
    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(token, 'base64url').toString('utf-8'));
    } catch {
      throw invalidParameter('page_token is malformed');
    }
    if (
      typeof decoded !== 'object' ||
      decoded === null ||
      !('q' in decoded) ||
      !('o' in decoded) ||
      typeof decoded.o !== 'number' ||
      decoded.o < 0
    ) {
      throw invalidParameter('page_token is malformed');
    }
    if (decoded.q !== queryKey) {
      throw invalidParameter('page_token was issued for a different query');
    }
    return decoded.o;
  }
}
