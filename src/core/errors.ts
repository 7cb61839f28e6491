export type ErrorKind =
  | 'expected'
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'conflict'
  | 'internal';

export type ErrorContext = {
  runId?: string;
};

export type RoadmapErrorOptions = {
  code: string;
  message: string;
  userMessage?: string;
  kind?: ErrorKind;
  exitCode?: number;
  details?: Record<string, unknown>;
  nextSteps?: string[];
  cause?: unknown;
  context?: ErrorContext;
};

export class RoadmapError extends Error {
  code: string;
  kind: ErrorKind;
  userMessage: string;
  exitCode: number;
  details?: Record<string, unknown>;
  nextSteps?: string[];
  override cause?: unknown;
  runId?: string;

  constructor(options: RoadmapErrorOptions) {
    super(options.message);
    this.name = 'RoadmapError';
    this.code = options.code;
    this.kind = options.kind ?? 'expected';
    this.userMessage = options.userMessage ?? options.message;
    this.exitCode = options.exitCode ?? 1;
    if (options.details !== undefined) {
      this.details = options.details;
    }
    if (options.nextSteps !== undefined) {
      this.nextSteps = options.nextSteps;
    }
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    if (options.context?.runId) {
      this.runId = options.context.runId;
    }
  }
}

export function normalizeError(error: unknown, context?: ErrorContext): RoadmapError {
  if (error instanceof RoadmapError) {
    return attachContext(error, context);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RoadmapError({
    code: 'unexpected_error',
    message,
    userMessage: message || 'Unexpected error.',
    kind: 'internal',
    exitCode: 1,
    cause: error,
    ...(context ? { context } : {}),
  });
}

function attachContext(error: RoadmapError, context?: ErrorContext): RoadmapError {
  if (!context) return error;
  if (!error.runId && context.runId) {
    error.runId = context.runId;
  }
  return error;
}
