import { OPEN_STATUSES, type Task, type TaskStatus } from '@tasksync/protocol';

export interface TaskReport {
  total: number;
  byStatus: Record<TaskStatus, Task[]>;
  /** Open tasks whose due time is before `generatedAt` */
  overdue: Task[];
  generatedAt: string;
}

export function isOverdue(task: Task, now: Date): boolean {
  if (task.dueTime === null || !OPEN_STATUSES.includes(task.status)) return false;
  const due = Date.parse(task.dueTime);
  return !Number.isNaN(due) && due < now.getTime();
}

/** Group tasks by status and pick out overdue open tasks */
export function buildReport(tasks: readonly Task[], now: Date = new Date()): TaskReport {
  const byStatus: Record<TaskStatus, Task[]> = { todo: [], in_progress: [], completed: [] };
  const overdue: Task[] = [];

  for (const task of tasks) {
    byStatus[task.status].push(task);
    if (isOverdue(task, now)) overdue.push(task);
  }

  return { total: tasks.length, byStatus, overdue, generatedAt: now.toISOString() };
}

/** One flat row per task, in export column order */
export interface TaskExportRow {
  task_id: string;
  summary: string;
  description: string;
  status: TaskStatus;
  assignee: string;
  due_time: string;
  created_time: string;
  url: string;
}

export const EXPORT_COLUMNS: readonly (keyof TaskExportRow)[] = [
  'task_id',
  'summary',
  'description',
  'status',
  'assignee',
  'due_time',
  'created_time',
  'url',
];

export function toExportRow(task: Task): TaskExportRow {
  return {
    task_id: task.id,
    summary: task.summary,
    description: task.description,
    status: task.status,
    assignee: task.assignee ?? '',
    due_time: task.dueTime ?? '',
    created_time: task.createdAt,
    url: task.url,
  };
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180 text with a header line; lines end in CRLF */
export function formatCsv(rows: readonly TaskExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map((column) => csvField(row[column])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
