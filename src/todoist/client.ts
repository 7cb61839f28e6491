import type { z } from 'zod';

import { RoadmapError } from '../core/errors';
import type { EventBus } from '../events/bus';
import { createEnvelope, type EmitContext } from '../events/emit';
import { withRetry } from '../utils/retry';
import { truncateText } from '../utils/text';
import { isTransientTodoistError, TodoistRequestError } from './errors';
import {
  completedItemsResponseSchema,
  projectSchema,
  taskSchema,
  type TodoistCompletedItem,
  type TodoistProject,
  type TodoistTask,
} from './schemas';

export const DEFAULT_REST_BASE_URL = 'https://api.todoist.com/rest/v2';
export const DEFAULT_SYNC_BASE_URL = 'https://api.todoist.com/sync/v9';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type TodoistClientOptions = {
  token: string;
  restBaseUrl?: string;
  syncBaseUrl?: string;
  retry?: { maxAttempts?: number; initialDelayMs?: number; maxDelayMs?: number };
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  bus?: EventBus;
  context?: EmitContext;
};

export type TodoistClient = {
  getProject: (projectId: string) => Promise<TodoistProject>;
  getTasks: (projectId: string) => Promise<TodoistTask[]>;
  /** Rejects with a 404 `TodoistRequestError` when the task no longer exists. */
  getTask: (taskId: string) => Promise<TodoistTask>;
  getCompletedItems: (projectId: string) => Promise<TodoistCompletedItem[]>;
};

type Method = 'GET' | 'POST';

export function createTodoistClient(options: TodoistClientOptions): TodoistClient {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const restBaseUrl = trimTrailingSlash(options.restBaseUrl ?? DEFAULT_REST_BASE_URL);
  const syncBaseUrl = trimTrailingSlash(options.syncBaseUrl ?? DEFAULT_SYNC_BASE_URL);
  const context = options.context ?? { runId: 'todoist' };

  const emit = async (event: Parameters<EventBus['emit']>[0]): Promise<void> => {
    if (options.bus) {
      await options.bus.emit(event);
    }
  };

  const request = async <S extends z.ZodTypeAny>(
    method: Method,
    baseUrl: string,
    path: string,
    schema: S,
    form?: URLSearchParams,
  ): Promise<z.output<S>> => {
    let attempt = 0;
    return withRetry(
      async () => {
        attempt += 1;
        const start = Date.now();
        const response = await fetchImpl(`${baseUrl}${path}`, {
          method,
          headers: {
            Authorization: `Bearer ${options.token}`,
            ...(form ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
          },
          ...(form ? { body: form.toString() } : {}),
        });
        await emit(
          createEnvelope({
            type: 'todoist.request',
            source: 'todoist',
            level: 'debug',
            context,
            message: `Todoist ${method} ${path} -> ${response.status}`,
            payload: {
              method,
              path,
              status: response.status,
              attempt,
              durationMs: Date.now() - start,
            },
          }),
        );

        if (!response.ok) {
          const body = await response.text().catch(() => '');
          throw new TodoistRequestError({
            method,
            path,
            status: response.status,
            ...(body ? { body: truncateText(body, 500) } : {}),
          });
        }

        const json: unknown = await response.json();
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new RoadmapError({
            code: 'todoist.invalid_response',
            message: `Unexpected Todoist response for ${method} ${path}: ${parsed.error.message}`,
            userMessage: 'Todoist returned a response in an unexpected shape.',
            kind: 'internal',
            details: { method, path },
          });
        }
        return parsed.data;
      },
      {
        maxAttempts: options.retry?.maxAttempts ?? 5,
        initialDelayMs: options.retry?.initialDelayMs ?? 500,
        maxDelayMs: options.retry?.maxDelayMs ?? 8000,
        shouldRetry: (error) => isTransientTodoistError(error),
        onRetry: async ({ error, attempt: failedAttempt, delayMs }) => {
          const status = error instanceof TodoistRequestError ? error.status : 0;
          await emit(
            createEnvelope({
              type: 'todoist.retry',
              source: 'todoist',
              level: 'warn',
              context,
              payload: { method, path, status, attempt: failedAttempt, delayMs },
            }),
          );
        },
        ...(options.sleep ? { sleep: options.sleep } : {}),
      },
    );
  };

  return {
    getProject: (projectId) =>
      request('GET', restBaseUrl, `/projects/${encodeURIComponent(projectId)}`, projectSchema),
    getTasks: (projectId) =>
      request(
        'GET',
        restBaseUrl,
        `/tasks?project_id=${encodeURIComponent(projectId)}`,
        taskSchema.array(),
      ),
    getTask: (taskId) =>
      request('GET', restBaseUrl, `/tasks/${encodeURIComponent(taskId)}`, taskSchema),
    getCompletedItems: async (projectId) => {
      const response = await request(
        'POST',
        syncBaseUrl,
        '/completed/get_all',
        completedItemsResponseSchema,
        new URLSearchParams({ project_id: projectId }),
      );
      return response.items;
    },
  };
}

function trimTrailingSlash(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value;
}
