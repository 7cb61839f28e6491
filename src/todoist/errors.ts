import { type ErrorKind, RoadmapError } from '../core/errors';

export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([502, 503, 504]);

function kindForStatus(status: number): ErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 409) return 'conflict';
  return 'expected';
}

export class TodoistRequestError extends RoadmapError {
  readonly status: number;

  constructor(options: { method: string; path: string; status: number; body?: string }) {
    const kind = kindForStatus(options.status);
    super({
      code: kind === 'auth' ? 'todoist.unauthorized' : 'todoist.request_failed',
      message: `Todoist ${options.method} ${options.path} failed with HTTP ${options.status}`,
      userMessage:
        kind === 'auth'
          ? 'Todoist rejected the API token.'
          : `Todoist request failed (HTTP ${options.status}).`,
      kind,
      details: {
        method: options.method,
        path: options.path,
        status: options.status,
        ...(options.body ? { body: options.body } : {}),
      },
      ...(kind === 'auth' ? { nextSteps: ['Check todoistToken or TODOIST_TOKEN.'] } : {}),
    });
    this.name = 'TodoistRequestError';
    this.status = options.status;
  }
}

export function isTransientTodoistError(error: unknown): boolean {
  return error instanceof TodoistRequestError && TRANSIENT_STATUSES.has(error.status);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof TodoistRequestError && error.status === 404;
}
