import {
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  TASKLIST_PATCH_FIELDS,
  TASK_PATCH_FIELDS,
  presentFields,
  type Comment,
  type CommentId,
  type CreateTaskInput,
  type CreateTasklistInput,
  type CredentialProvider,
  type CustomField,
  type Page,
  type RemoteTaskService,
  type ResourceKind,
  type Task,
  type TaskId,
  type TaskListFilters,
  type TaskPatch,
  type TaskPatchField,
  type TaskStatus,
  type Tasklist,
  type TasklistId,
  type TasklistPatch,
} from '@tasksync/protocol';
import { ServiceResponseError } from '@tasksync/core';

export interface HttpTaskServiceOptions {
  credentials: CredentialProvider;
  /** Open Platform base URL, without the /task/v2 suffix */
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

type Json = Record<string, unknown>;

interface RequestOptions {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  path: string;
  query?: Record<string, string | undefined>;
  body?: Json;
  resource: ResourceKind;
  signal?: AbortSignal;
}

const WIRE_TASK_FIELDS: Record<TaskPatchField, string> = {
  summary: 'summary',
  description: 'description',
  status: 'status',
  assignee: 'assignee',
  followers: 'followers',
  dueTime: 'due_time',
  parentTaskId: 'parent_task_guid',
  customFields: 'custom_fields',
};

// ──────────────────────────────────────────────
// Wire decoding
// ──────────────────────────────────────────────

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string): ServiceResponseError {
  return new ServiceResponseError({ message: `Malformed ${what} in service response` });
}

function text(raw: Json, key: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : '';
}

function nullableText(raw: Json, key: string): string | null {
  const value = raw[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function stringList(raw: Json, key: string): string[] {
  const value = raw[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function toStatus(value: unknown): TaskStatus {
  if (value === 'completed' || value === 'done') return 'completed';
  if (value === 'in_progress') return 'in_progress';
  return 'todo';
}

function toCustomFields(value: unknown): CustomField[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((field) => ({
    name: text(field, 'name'),
    value: text(field, 'value'),
    type: text(field, 'type'),
  }));
}

function toTask(raw: unknown): Task {
  if (!isRecord(raw) || typeof raw.guid !== 'string') throw malformed('task');
  return {
    id: raw.guid,
    summary: text(raw, 'summary'),
    description: text(raw, 'description'),
    status: toStatus(raw.status),
    assignee: nullableText(raw, 'assignee'),
    followers: stringList(raw, 'followers'),
    dueTime: nullableText(raw, 'due_time'),
    createdAt: text(raw, 'created_at'),
    updatedAt: text(raw, 'updated_at'),
    completedAt: nullableText(raw, 'completed_at'),
    parentTaskId: nullableText(raw, 'parent_task_guid'),
    customFields: toCustomFields(raw.custom_fields),
    url: text(raw, 'url'),
  };
}

function toTasklist(raw: unknown): Tasklist {
  if (!isRecord(raw) || typeof raw.guid !== 'string') throw malformed('tasklist');
  return {
    id: raw.guid,
    name: text(raw, 'name'),
    description: text(raw, 'description'),
    owner: nullableText(raw, 'owner'),
    createdAt: text(raw, 'created_at'),
    updatedAt: text(raw, 'updated_at'),
  };
}

function toComment(raw: unknown): Comment {
  if (!isRecord(raw) || typeof raw.id !== 'string') throw malformed('comment');
  return {
    id: raw.id,
    taskId: text(raw, 'resource_id'),
    content: text(raw, 'content'),
    creator: nullableText(raw, 'creator'),
    createdAt: text(raw, 'created_at'),
  };
}

function toPage<T>(data: Json, decode: (raw: unknown) => T): Page<T> {
  const items = Array.isArray(data.items) ? data.items.map(decode) : [];
  const hasMore = data.has_more === true;
  const token = data.page_token;
  if (hasMore && typeof token === 'string' && token.length > 0) {
    return { items, hasMore, pageToken: token };
  }
  return { items, hasMore };
}

// ──────────────────────────────────────────────
// Wire encoding
// ──────────────────────────────────────────────

function taskPatchBody(patch: TaskPatch): { task: Json; update_fields: string[] } {
  const fields = presentFields(patch, TASK_PATCH_FIELDS);
  const task: Json = {};
  for (const field of fields) {
    task[WIRE_TASK_FIELDS[field]] = patch[field];
  }
  return { task, update_fields: fields.map((field) => WIRE_TASK_FIELDS[field]) };
}

function createTaskBody(input: CreateTaskInput): Json {
  const body: Json = { summary: input.summary };
  if (input.description !== undefined) body.description = input.description;
  if (input.assignee !== undefined) body.assignee = input.assignee;
  if (input.followers !== undefined) body.followers = input.followers;
  if (input.dueTime !== undefined) body.due_time = input.dueTime;
  if (input.parentTaskId !== undefined) body.parent_task_guid = input.parentTaskId;
  if (input.customFields !== undefined) body.custom_fields = input.customFields;
  return body;
}

function filterQuery(filters: TaskListFilters): Record<string, string | undefined> {
  return {
    created_by_me: filters.createdByMe ? 'true' : undefined,
    assigned_to_me: filters.assignedToMe ? 'true' : undefined,
    status: filters.statuses && filters.statuses.length > 0 ? filters.statuses.join(',') : undefined,
    assignee: filters.assignee,
    due_before: filters.dueBefore,
    due_after: filters.dueAfter,
  };
}

/**
 * Remote Task Service over the Open Platform task v2 HTTP API.
 *
 * Every method is exactly one request. Responses use the `{ code, msg,
 * data }` envelope; a non-zero code or a non-2xx status is thrown as a
 * ServiceResponseError carrying status, code and any retry-after hint.
 * A 401 drops the cached token and repeats the request once with a
 * fresh one; a second 401 is thrown.
 */
export class HttpTaskService implements RemoteTaskService {
  private credentials: CredentialProvider;
  private apiBase: string;
  private timeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(options: HttpTaskServiceOptions) {
    this.credentials = options.credentials;
    this.apiBase = `${(options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '')}/task/v2`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  // ── Tasks ──────────────────────────────────────

  async createTask(input: CreateTaskInput, signal?: AbortSignal): Promise<Task> {
    const data = await this.request({ method: 'POST', path: '/tasks', body: createTaskBody(input), resource: 'task', signal });
    return toTask(data.task);
  }

  async getTask(taskId: TaskId, signal?: AbortSignal): Promise<Task> {
    const data = await this.request({ method: 'GET', path: `/tasks/${encodeURIComponent(taskId)}`, resource: 'task', signal });
    return toTask(data.task);
  }

  async updateTask(taskId: TaskId, patch: TaskPatch, signal?: AbortSignal): Promise<Task> {
    const data = await this.request({
      method: 'PATCH',
      path: `/tasks/${encodeURIComponent(taskId)}`,
      body: taskPatchBody(patch),
      resource: 'task',
      signal,
    });
    return toTask(data.task);
  }

  async deleteTask(taskId: TaskId, signal?: AbortSignal): Promise<void> {
    await this.request({ method: 'DELETE', path: `/tasks/${encodeURIComponent(taskId)}`, resource: 'task', signal });
  }

  async listTasks(
    filters: TaskListFilters,
    pageSize: number,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<Page<Task>> {
    const data = await this.request({
      method: 'GET',
      path: '/tasks',
      query: { ...filterQuery(filters), page_size: String(pageSize), page_token: pageToken },
      resource: 'task',
      signal,
    });
    return toPage(data, toTask);
  }

  async listSubtasks(taskId: TaskId, pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Task>> {
    const data = await this.request({
      method: 'GET',
      path: `/tasks/${encodeURIComponent(taskId)}/subtasks`,
      query: { page_size: String(pageSize), page_token: pageToken },
      resource: 'task',
      signal,
    });
    return toPage(data, toTask);
  }

  // ── Tasklists ──────────────────────────────────

  async createTasklist(input: CreateTasklistInput, signal?: AbortSignal): Promise<Tasklist> {
    const body: Json = { name: input.name };
    if (input.description !== undefined) body.description = input.description;
    const data = await this.request({ method: 'POST', path: '/tasklists', body, resource: 'tasklist', signal });
    return toTasklist(data.tasklist);
  }

  async getTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<Tasklist> {
    const data = await this.request({
      method: 'GET',
      path: `/tasklists/${encodeURIComponent(tasklistId)}`,
      resource: 'tasklist',
      signal,
    });
    return toTasklist(data.tasklist);
  }

  async updateTasklist(tasklistId: TasklistId, patch: TasklistPatch, signal?: AbortSignal): Promise<Tasklist> {
    const fields = presentFields(patch, TASKLIST_PATCH_FIELDS);
    const tasklist: Json = {};
    for (const field of fields) tasklist[field] = patch[field];
    const data = await this.request({
      method: 'PATCH',
      path: `/tasklists/${encodeURIComponent(tasklistId)}`,
      body: { tasklist, update_fields: fields },
      resource: 'tasklist',
      signal,
    });
    return toTasklist(data.tasklist);
  }

  async deleteTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<void> {
    await this.request({
      method: 'DELETE',
      path: `/tasklists/${encodeURIComponent(tasklistId)}`,
      resource: 'tasklist',
      signal,
    });
  }

  async listTasklists(pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Tasklist>> {
    const data = await this.request({
      method: 'GET',
      path: '/tasklists',
      query: { page_size: String(pageSize), page_token: pageToken },
      resource: 'tasklist',
      signal,
    });
    return toPage(data, toTasklist);
  }

  async addTaskToTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void> {
    await this.request({
      method: 'POST',
      path: `/tasks/${encodeURIComponent(taskId)}/add_tasklist`,
      body: { tasklist_guid: tasklistId },
      resource: 'tasklist',
      signal,
    });
  }

  async removeTaskFromTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void> {
    await this.request({
      method: 'POST',
      path: `/tasks/${encodeURIComponent(taskId)}/remove_tasklist`,
      body: { tasklist_guid: tasklistId },
      resource: 'tasklist',
      signal,
    });
  }

  async listTasksInTasklist(
    tasklistId: TasklistId,
    pageSize: number,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<Page<Task>> {
    const data = await this.request({
      method: 'GET',
      path: `/tasklists/${encodeURIComponent(tasklistId)}/tasks`,
      query: { page_size: String(pageSize), page_token: pageToken },
      resource: 'tasklist',
      signal,
    });
    return toPage(data, toTask);
  }

  // ── Comments ───────────────────────────────────

  async createComment(taskId: TaskId, content: string, signal?: AbortSignal): Promise<Comment> {
    const data = await this.request({
      method: 'POST',
      path: '/comments',
      body: { content, resource_type: 'task', resource_id: taskId },
      resource: 'task',
      signal,
    });
    return toComment(data.comment);
  }

  async listComments(taskId: TaskId, pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Comment>> {
    const data = await this.request({
      method: 'GET',
      path: '/comments',
      query: { resource_type: 'task', resource_id: taskId, page_size: String(pageSize), page_token: pageToken },
      resource: 'task',
      signal,
    });
    return toPage(data, toComment);
  }

  async deleteComment(_taskId: TaskId, commentId: CommentId, signal?: AbortSignal): Promise<void> {
    await this.request({
      method: 'DELETE',
      path: `/comments/${encodeURIComponent(commentId)}`,
      resource: 'comment',
      signal,
    });
  }

  // ── Transport ──────────────────────────────────

  private buildUrl(path: string, query?: Record<string, string | undefined>): string {
    const url = new URL(`${this.apiBase}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request(req: RequestOptions, reauthenticated = false): Promise<Json> {
    const token = await this.credentials.getToken(req.signal);
    const { res, payload } = await this.send(req, token);

    const envelope = isRecord(payload) ? payload : {};
    const code = typeof envelope.code === 'number' ? envelope.code : undefined;

    if (!res.ok || (code !== undefined && code !== 0)) {
      if (res.status === 401) {
        this.credentials.invalidate();
        if (!reauthenticated) return this.request(req, true);
      }
      const msg = typeof envelope.msg === 'string' && envelope.msg.length > 0 ? envelope.msg : `HTTP ${res.status}`;
      throw new ServiceResponseError({
        status: res.status,
        code,
        message: `${req.method} ${req.path}: ${msg}`,
        retryAfter: res.headers.get('retry-after') ?? res.headers.get('x-ogw-ratelimit-reset') ?? undefined,
        resource: req.resource,
      });
    }

    if (!isRecord(payload)) throw malformed('envelope');
    return isRecord(envelope.data) ? envelope.data : {};
  }

  /** One fetch bounded by the request timeout and the caller's signal */
  private async send(req: RequestOptions, token: string): Promise<{ res: Response; payload: unknown }> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(new DOMException(`No response within ${this.timeoutMs}ms`, 'TimeoutError')),
      this.timeoutMs,
    );
    const forwardAbort = () => controller.abort(req.signal?.reason);
    if (req.signal?.aborted) forwardAbort();
    req.signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const res = await this.fetchFn(this.buildUrl(req.path, req.query), {
        method: req.method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json; charset=utf-8',
        },
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: controller.signal,
      });
      const payload: unknown = await res.json().catch(() => undefined);
      return { res, payload };
    } finally {
      clearTimeout(timeout);
      req.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
