import { normalizeError } from '../core/errors';
import type { JsonError } from '../events/schema';

export type CliResult = {
  ok: boolean;
  command: string;
  data?: unknown;
  error?: JsonError;
};

export function buildJsonError(error: unknown): JsonError {
  const normalized = normalizeError(error);
  const details: Record<string, unknown> = { ...(normalized.details ?? {}) };
  if (normalized.runId) {
    details['runId'] = normalized.runId;
  }
  return {
    code: normalized.code,
    message: normalized.userMessage,
    kind: normalized.kind,
    ...(Object.keys(details).length > 0 ? { details } : {}),
    ...(normalized.nextSteps?.length ? { nextSteps: normalized.nextSteps } : {}),
  };
}

/** One line of JSON describing how a command ended. */
export function formatCliResult(result: CliResult): string {
  return JSON.stringify({ type: 'cli.result', ...result });
}
