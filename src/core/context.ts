import { randomUUID } from 'node:crypto';

import { type ConfigResult, loadConfig } from '../config/load';
import type { ConfigInput } from '../config/schema';
import type { EmitContext } from '../events/emit';
import { createEnvelope, toEventError } from '../events/emit';
import type { EventMode, RunFinished } from '../events/schema';
import { normalizeError } from './errors';
import { type EventOutput, type EventSystem, initEvents } from './events';
import { createLogger, type Logger } from './logger';

export type RunContext = {
  runId: string;
  config: ConfigResult['config'];
  configSource: ConfigResult['source'];
  projectRoot: string;
  events: EventSystem;
  emitContext: EmitContext;
  logger: Logger;
};

export type RunContextOptions = {
  cwd: string;
  mode: EventMode;
  command: string;
  configPath?: string;
  runId?: string;
  configOverrides?: ConfigInput;
  /** Where the renderer writes; defaults to stdout. */
  eventOutput?: EventOutput;
  /** Replaces the renderer-backed event system; used by tests. */
  events?: EventSystem;
};

export async function createRunContext(options: RunContextOptions): Promise<RunContext> {
  // Config errors surface before any event, network or git activity.
  const configResult = await loadConfig(options.configOverrides, {
    cwd: options.cwd,
    ...(options.configPath ? { configPath: options.configPath } : {}),
  });
  const runId = options.runId ?? randomUUID();
  const events = options.events ?? initEvents(options.mode, {
    ...(options.eventOutput ? { output: options.eventOutput } : {}),
  });
  const emitContext: EmitContext = {
    runId,
    projectId: configResult.config.todoistProjectId,
    mode: options.mode,
  };

  await events.bus.emit(
    createEnvelope({
      type: 'run.started',
      source: 'cli',
      level: 'info',
      context: emitContext,
      payload: {
        runId,
        command: options.command,
        cwd: options.cwd,
        ...(configResult.source ? { configPath: configResult.source.path } : {}),
      },
    }),
  );

  return {
    runId,
    config: configResult.config,
    configSource: configResult.source,
    projectRoot: configResult.projectRoot,
    events,
    emitContext,
    logger: createLogger({ bus: events.bus, context: emitContext, source: 'cli' }),
  };
}

export async function withRunContext<T>(
  options: RunContextOptions & {
    summarize?: (result: T) => RunFinished['summary'];
  },
  fn: (ctx: RunContext) => Promise<T>,
): Promise<T> {
  const start = Date.now();
  const ctx = await createRunContext(options);

  const emitRunFinished = async (
    status: RunFinished['status'],
    extra?: { summary?: RunFinished['summary']; error?: unknown },
  ): Promise<void> => {
    const payload: RunFinished = {
      status,
      durationMs: Date.now() - start,
      ...(extra?.summary ? { summary: extra.summary } : {}),
    };
    await ctx.events.bus.emit(
      createEnvelope({
        type: 'run.finished',
        source: 'cli',
        level: status === 'failed' ? 'error' : 'info',
        context: ctx.emitContext,
        payload,
        ...(extra?.error ? { error: toEventError(extra.error) } : {}),
      }),
    );
  };

  // A run either completes or fails; Ctrl-C is left to Node's default handling.
  try {
    const result = await fn(ctx);
    const summary = options.summarize?.(result);
    await emitRunFinished('success', summary ? { summary } : undefined);
    return result;
  } catch (error) {
    const normalized = normalizeError(error, { runId: ctx.runId });
    await emitRunFinished('failed', { error: normalized });
    process.exitCode = normalized.exitCode;
    throw normalized;
  }
}
