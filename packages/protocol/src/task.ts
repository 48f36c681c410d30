/**
 * Task, Tasklist and Comment types as seen by the sync client.
 *
 * Identifiers are opaque strings. The service documents prefixes
 * (`task_`, `tasklist_`, `ou_`) but nothing here parses them.
 * Timestamps are RFC 3339 strings with a timezone offset.
 */

export type TaskId = string;
export type TasklistId = string;
export type CommentId = string;
export type UserId = string;

export type TaskStatus = 'todo' | 'in_progress' | 'completed';

export const TASK_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress', 'completed'];

/** Statuses counted as "open" by workload balancing and reports */
export const OPEN_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress'];

export interface CustomField {
  name: string;
  value: string;
  type: string;
}

// ──────────────────────────────────────────────
// Task
// ──────────────────────────────────────────────

export interface Task {
  id: TaskId;
  summary: string;
  description: string;
  status: TaskStatus;
  assignee: UserId | null;
  followers: UserId[];
  dueTime: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  /** May point anywhere, including back into its own subtree */
  parentTaskId: TaskId | null;
  customFields: CustomField[];
  url: string;
}

export interface CreateTaskInput {
  summary: string;
  description?: string;
  assignee?: UserId;
  dueTime?: string;
  followers?: UserId[];
  parentTaskId?: TaskId;
  customFields?: CustomField[];
}

/**
 * Partial task update.
 *
 * A field is sent only when it is not `undefined`. `null` on a nullable
 * field clears it on the service.
 */
export interface TaskPatch {
  summary?: string;
  description?: string;
  status?: TaskStatus;
  assignee?: UserId | null;
  followers?: UserId[];
  dueTime?: string | null;
  parentTaskId?: TaskId | null;
  customFields?: CustomField[];
}

export type TaskPatchField = keyof TaskPatch;

export const TASK_PATCH_FIELDS: readonly TaskPatchField[] = [
  'summary',
  'description',
  'status',
  'assignee',
  'followers',
  'dueTime',
  'parentTaskId',
  'customFields',
];

export interface TaskListFilters {
  createdByMe?: boolean;
  assignedToMe?: boolean;
  statuses?: TaskStatus[];
  assignee?: UserId;
  dueBefore?: string;
  dueAfter?: string;
}

// ──────────────────────────────────────────────
// Tasklist
// ──────────────────────────────────────────────

export interface Tasklist {
  id: TasklistId;
  name: string;
  description: string;
  owner: UserId | null;
  createdAt: string;
  updatedAt: string;
}

export interface CreateTasklistInput {
  name: string;
  description?: string;
}

export interface TasklistPatch {
  name?: string;
  description?: string;
}

export type TasklistPatchField = keyof TasklistPatch;

export const TASKLIST_PATCH_FIELDS: readonly TasklistPatchField[] = ['name', 'description'];

// ──────────────────────────────────────────────
// Comment
// ──────────────────────────────────────────────

export interface Comment {
  id: CommentId;
  taskId: TaskId;
  content: string;
  creator: UserId | null;
  createdAt: string;
}

// ──────────────────────────────────────────────
// Page
// ──────────────────────────────────────────────

export interface Page<T> {
  items: T[];
  hasMore: boolean;
  /** Cursor for the next page; absent at the end */
  pageToken?: string;
}
