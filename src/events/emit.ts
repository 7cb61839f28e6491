import { randomUUID } from 'node:crypto';

import type { ErrorKind, EventEnvelope, EventLevel, EventMode, EventSource } from './schema';

const schemaVersion = '1.0.0' as const;
const schemaName = 'dev.roadmap-sync.events' as const;

export type EmitContext = {
  runId: string;
  projectId?: string;
  mode?: EventMode;
};

export function createEnvelope<TType extends string, TPayload>(options: {
  type: TType;
  payload: TPayload;
  level: EventLevel;
  source: EventSource;
  message?: string;
  context: EmitContext;
  error?: EventEnvelope<TType, TPayload>['error'];
  span?: EventEnvelope<TType, TPayload>['span'];
}): EventEnvelope<TType, TPayload> {
  const envelope: EventEnvelope<TType, TPayload> = {
    schema: schemaName,
    version: schemaVersion,
    id: randomUUID(),
    ts: new Date().toISOString(),
    level: options.level,
    source: options.source,
    runId: options.context.runId,
    type: options.type,
    payload: options.payload,
  };

  if (options.context.projectId) {
    envelope.projectId = options.context.projectId;
  }
  if (options.context.mode) {
    envelope.mode = options.context.mode;
  }
  if (options.message) {
    envelope.message = options.message;
  }
  if (options.error) {
    envelope.error = options.error;
  }
  if (options.span) {
    envelope.span = options.span;
  }

  return envelope;
}

export function toEventError(error: unknown): EventEnvelope<string, unknown>['error'] {
  if (error instanceof Error) {
    const { code, kind, details, userMessage } = readErrorFields(error);
    const message = userMessage && userMessage.length > 0 ? userMessage : error.message;
    const merged =
      userMessage && userMessage !== error.message
        ? { ...(details ?? {}), internalMessage: error.message }
        : details;
    return {
      name: error.name,
      message,
      ...(error.stack ? { stack: error.stack } : {}),
      ...(code ? { code } : {}),
      ...(kind ? { kind } : {}),
      ...(merged ? { details: merged } : {}),
      ...(error.cause ? { cause: toEventError(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  return { name: 'UnknownError', message: 'Unknown error' };
}

function readErrorFields(error: Error): {
  code?: string;
  kind?: ErrorKind;
  details?: Record<string, unknown>;
  userMessage?: string;
} {
  return {
    ...('code' in error && error.code ? { code: String(error.code) } : {}),
    ...('kind' in error && isErrorKind(error.kind) ? { kind: error.kind } : {}),
    ...('details' in error && isRecord(error.details) ? { details: error.details } : {}),
    ...('userMessage' in error && typeof error.userMessage === 'string'
      ? { userMessage: error.userMessage }
      : {}),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorKind(value: unknown): value is ErrorKind {
  return (
    value === 'expected' ||
    value === 'validation' ||
    value === 'auth' ||
    value === 'not_found' ||
    value === 'conflict' ||
    value === 'internal'
  );
}
