import { describe, it, expect, vi } from 'vitest';
import type { CredentialProvider, RefreshedToken } from '@tasksync/protocol';
import { CachedTokenProvider, ErrorClassifier, ServiceResponseError, StaticTokenProvider } from '@tasksync/core';
import { HttpTaskService } from '../http-service.js';

const BASE = 'https://open.example.test/open-apis';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

const wireTask = {
  guid: 'task_1',
  summary: 'Ship v2',
  description: '',
  status: 'todo',
  assignee: 'ou_1',
  followers: ['ou_2'],
  due_time: '2025-06-30T23:59:59+08:00',
  created_at: '2025-06-01T09:00:00+08:00',
  updated_at: '2025-06-01T09:00:00+08:00',
  completed_at: '',
  parent_task_guid: '',
  custom_fields: [{ name: 'priority', value: 'high', type: 'text' }],
  url: 'https://tasks.example.test/task_1',
};

function makeService(fetchImpl: typeof fetch, credentials: CredentialProvider = new StaticTokenProvider('test-secret')) {
  return new HttpTaskService({ credentials, baseUrl: `${BASE}/`, timeoutMs: 1000, fetch: fetchImpl });
}

describe('HttpTaskService', () => {
  it('sends the bearer token and decodes the task envelope', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ code: 0, msg: 'success', data: { task: wireTask } }));
    const service = makeService(fetchMock);

    const task = await service.getTask('task_1');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE}/task/v2/tasks/task_1`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(task).toEqual({
      id: 'task_1',
      summary: 'Ship v2',
      description: '',
      status: 'todo',
      assignee: 'ou_1',
      followers: ['ou_2'],
      dueTime: '2025-06-30T23:59:59+08:00',
      createdAt: '2025-06-01T09:00:00+08:00',
      updatedAt: '2025-06-01T09:00:00+08:00',
      completedAt: null,
      parentTaskId: null,
      customFields: [{ name: 'priority', value: 'high', type: 'text' }],
      url: 'https://tasks.example.test/task_1',
    });
  });

  it('sends only the fields a patch sets, listing them in update_fields', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ code: 0, data: { task: wireTask } }));
    const service = makeService(fetchMock);

    await service.updateTask('task_1', { status: 'completed', assignee: null, description: undefined });

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe('PATCH');
    expect(JSON.parse(String(init?.body))).toEqual({
      task: { status: 'completed', assignee: null },
      update_fields: ['status', 'assignee'],
    });
  });

  it('passes list filters and the page cursor as query parameters', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ code: 0, data: { items: [wireTask], has_more: true, page_token: 'next-1' } }),
    );
    const service = makeService(fetchMock);

    const page = await service.listTasks({ assignedToMe: true, statuses: ['todo', 'in_progress'] }, 20, 'cursor-0');

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/open-apis/task/v2/tasks');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      assigned_to_me: 'true',
      status: 'todo,in_progress',
      page_size: '20',
      page_token: 'cursor-0',
    });
    expect(page.hasMore).toBe(true);
    expect(page.pageToken).toBe('next-1');
    expect(page.items.map((t) => t.id)).toEqual(['task_1']);
  });

  it('ends a listing when has_more is false', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ code: 0, data: { items: [], has_more: false, page_token: 'stale' } }),
    );
    const page = await makeService(fetchMock).listTasksInTasklist('tasklist_1', 50);
    expect(page).toEqual({ items: [], hasMore: false });
  });

  it('throws a ServiceResponseError carrying the envelope code and retry hint', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ code: 99991400, msg: 'request trigger frequency limit' }, { status: 429, headers: { 'Retry-After': '2' } }),
    );
    const service = makeService(fetchMock);

    const error = await service.getTask('task_1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceResponseError);
    expect(error).toMatchObject({ status: 429, code: 99991400, retryAfter: '2', resource: 'task' });
    const classified = new ErrorClassifier().classifyThrown(error);
    expect(classified.kind).toBe('RateLimited');
    expect(classified.retryAfterMs).toBe(2000);
  });

  it('treats a non-zero code in a 200 response as a failure', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ code: 1470404, msg: 'tasklist not found' }));
    const error = await makeService(fetchMock).getTasklist('tasklist_x').catch((err: unknown) => err);
    expect(error).toMatchObject({ status: 200, code: 1470404, resource: 'tasklist' });
  });

  it('gives up after a second 401, dropping the token each time', async () => {
    const credentials = new StaticTokenProvider('test-secret');
    const invalidate = vi.spyOn(credentials, 'invalidate');
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ code: 99991672, msg: 'token expired' }, { status: 401 }));

    await expect(makeService(fetchMock, credentials).deleteTask('task_1')).rejects.toBeInstanceOf(ServiceResponseError);
    expect(invalidate).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('repeats a request once with a refreshed token after a 401', async () => {
    const refresh = vi
      .fn<() => Promise<RefreshedToken>>()
      .mockResolvedValueOnce({ token: 'stale-token', expiresInSeconds: 7200 })
      .mockResolvedValueOnce({ token: 'fresh-token', expiresInSeconds: 7200 });
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ code: 99991672, msg: 'token expired' }, { status: 401 }))
      .mockResolvedValueOnce(jsonResponse({ code: 0, data: { task: wireTask } }));

    const task = await makeService(fetchMock, new CachedTokenProvider({ refresh })).getTask('task_1');

    expect(task.id).toBe('task_1');
    expect(fetchMock.mock.calls.map(([, init]) => init?.headers)).toEqual([
      { Authorization: 'Bearer stale-token', 'Content-Type': 'application/json; charset=utf-8' },
      { Authorization: 'Bearer fresh-token', 'Content-Type': 'application/json; charset=utf-8' },
    ]);
  });

  it('reports a non-JSON error body by HTTP status', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('<html>bad gateway</html>', { status: 502 }));
    const error = await makeService(fetchMock).getTask('task_1').catch((err: unknown) => err);
    expect(error).toMatchObject({ status: 502, message: 'GET /tasks/task_1: HTTP 502' });
  });

  it('aborts a request that outlives the timeout', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }),
    );
    const service = new HttpTaskService({
      credentials: new StaticTokenProvider('test-secret'),
      baseUrl: BASE,
      timeoutMs: 10,
      fetch: fetchMock,
    });

    const error = await service.getTask('task_1').catch((err: unknown) => err);

    expect(error instanceof Error && error.name).toBe('TimeoutError');
    expect(new ErrorClassifier().classifyThrown(error).kind).toBe('Transport');
  });

  it('posts comments against the task resource', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        code: 0,
        data: { comment: { id: 'c1', resource_id: 'task_1', content: 'hello', creator: 'ou_1', created_at: '2025-06-01' } },
      }),
    );

    const comment = await makeService(fetchMock).createComment('task_1', 'hello');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE}/task/v2/comments`);
    expect(JSON.parse(String(init?.body))).toEqual({ content: 'hello', resource_type: 'task', resource_id: 'task_1' });
    expect(comment).toEqual({ id: 'c1', taskId: 'task_1', content: 'hello', creator: 'ou_1', createdAt: '2025-06-01' });
  });
});
