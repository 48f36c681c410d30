import type {
  Comment,
  CreateTaskInput,
  CreateTasklistInput,
  Page,
  Task,
  TaskId,
  TaskListFilters,
  TaskPatch,
  Tasklist,
  TasklistId,
  TasklistPatch,
  CommentId,
} from './task.js';

/**
 * Remote Task Service — the operations the client core consumes.
 *
 * Each method performs exactly one network call. Failures are thrown
 * unclassified (a service error carrying status/code, or a transport
 * error); classification and retry happen in the core.
 *
 * Implementations: HttpTaskService (Open Platform task v2 API),
 * InMemoryTaskService (tests and local development)
 */
export interface RemoteTaskService {
  createTask(input: CreateTaskInput, signal?: AbortSignal): Promise<Task>;
  getTask(taskId: TaskId, signal?: AbortSignal): Promise<Task>;
  updateTask(taskId: TaskId, patch: TaskPatch, signal?: AbortSignal): Promise<Task>;
  deleteTask(taskId: TaskId, signal?: AbortSignal): Promise<void>;
  listTasks(
    filters: TaskListFilters,
    pageSize: number,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<Page<Task>>;
  /** Direct children of a task */
  listSubtasks(taskId: TaskId, pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Task>>;
  /** Count-only query; optional because not every backend offers one */
  countTasks?(filters: TaskListFilters, signal?: AbortSignal): Promise<number>;

  createTasklist(input: CreateTasklistInput, signal?: AbortSignal): Promise<Tasklist>;
  getTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<Tasklist>;
  updateTasklist(tasklistId: TasklistId, patch: TasklistPatch, signal?: AbortSignal): Promise<Tasklist>;
  deleteTasklist(tasklistId: TasklistId, signal?: AbortSignal): Promise<void>;
  listTasklists(pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Tasklist>>;
  addTaskToTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void>;
  removeTaskFromTasklist(tasklistId: TasklistId, taskId: TaskId, signal?: AbortSignal): Promise<void>;
  listTasksInTasklist(
    tasklistId: TasklistId,
    pageSize: number,
    pageToken?: string,
    signal?: AbortSignal,
  ): Promise<Page<Task>>;

  createComment(taskId: TaskId, content: string, signal?: AbortSignal): Promise<Comment>;
  listComments(taskId: TaskId, pageSize: number, pageToken?: string, signal?: AbortSignal): Promise<Page<Comment>>;
  deleteComment(taskId: TaskId, commentId: CommentId, signal?: AbortSignal): Promise<void>;
}

/** Supplies the bearer token for each request */
export interface CredentialProvider {
  getToken(signal?: AbortSignal): Promise<string>;
  /** Drop any cached token so the next getToken() refreshes */
  invalidate(): void;
}

export interface RefreshedToken {
  token: string;
  expiresInSeconds: number;
}

/** Collaborator that obtains a fresh token; the acquisition flow lives outside this repo */
export interface TokenRefresher {
  refresh(): Promise<RefreshedToken>;
}
