import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { cac } from 'cac';

import { loadConfig } from '../config/load';
import type { Config } from '../config/schema';
import type { RunContext } from '../core/context';
import { withRunContext } from '../core/context';
import { normalizeError, RoadmapError } from '../core/errors';
import type { EventMode } from '../events/schema';
import { buildRoadmap, type RoadmapSnapshot, runSync, type SyncResult } from '../sync/sync';
import { createTodoistClient, type TodoistClient } from '../todoist/client';
import { setEnvValue } from '../utils/env';
import { maskSecret, redactCredentials } from '../utils/text';
import { renderCliError } from './errors';
import { buildJsonError, formatCliResult } from './json-output';
import { formatStatusLabel, renderSuccessSummary } from './output';

const cli = cac('roadmap-sync');

type CliOptions = {
  json?: boolean;
  debug?: boolean;
  config?: string;
  output?: string;
};

const COMMAND_NAMES = ['sync', 'render', 'config'];

cli.option('--json', 'Output JSON event stream');
cli.option('--config <path>', 'Path to a config file');
cli.option('--debug', 'Show debug events and stack traces');

function eventMode(options: CliOptions): EventMode {
  return options.json ? 'json' : 'headless';
}

function buildClient(ctx: RunContext): TodoistClient {
  return createTodoistClient({
    token: ctx.config.todoistToken,
    restBaseUrl: ctx.config.todoist.restBaseUrl,
    syncBaseUrl: ctx.config.todoist.syncBaseUrl,
    retry: ctx.config.retry,
    bus: ctx.events.bus,
    context: ctx.emitContext,
  });
}

async function handleSync(options: CliOptions): Promise<void> {
  const mode = eventMode(options);
  const result = await withRunContext<SyncResult>(
    {
      cwd: process.cwd(),
      mode,
      command: 'sync',
      ...(options.config ? { configPath: options.config } : {}),
      summarize: (value) => ({
        outcome: value.status,
        completedTasks: value.completedCount,
        openTasks: value.openCount,
        skippedTasks: value.skippedCount,
        ...(value.commit ? { commit: value.commit } : {}),
      }),
    },
    (ctx) =>
      runSync({
        config: ctx.config,
        client: buildClient(ctx),
        bus: ctx.events.bus,
        context: ctx.emitContext,
        logger: ctx.logger,
      }),
  );

  if (mode === 'json') {
    console.log(formatCliResult({ ok: true, command: 'sync', data: result }));
    return;
  }
  const details: Array<[string, string]> = [
    ['Status', formatStatusLabel(result.status)],
    ['Document', result.path],
    ['Completed', String(result.completedCount)],
    ['Open', String(result.openCount)],
    ['Skipped', String(result.skippedCount)],
  ];
  if (result.commit) {
    details.push(['Commit', result.commit]);
  }
  console.log(renderSuccessSummary({ title: 'Roadmap sync', details }));
}

cli
  .command('[command]', 'Export the Todoist project and publish it (same as `sync`)')
  .action(async (command: string | undefined, options: CliOptions) => {
    if (command !== undefined) {
      throw new RoadmapError({
        code: 'unknown_command',
        message: `Unknown command: ${command}`,
        kind: 'validation',
      });
    }
    await handleSync(options);
  });

cli
  .command('sync', 'Export the Todoist project and publish it')
  .action((options: CliOptions) => handleSync(options));

cli
  .command('render', 'Render the roadmap without touching git')
  .option('--output <file>', 'Write the document to a file instead of stdout')
  .action(async (options: CliOptions) => {
    const mode = eventMode(options);
    const snapshot = await withRunContext<RoadmapSnapshot>(
      {
        cwd: process.cwd(),
        mode,
        command: 'render',
        eventOutput: options.output ? 'stdout' : 'stderr',
        ...(options.config ? { configPath: options.config } : {}),
        summarize: (value) => ({
          outcome: 'rendered',
          completedTasks: value.completed.length,
          openTasks: value.open.length,
          skippedTasks: value.skipped.length,
        }),
      },
      (ctx) =>
        buildRoadmap({
          config: ctx.config,
          client: buildClient(ctx),
          bus: ctx.events.bus,
          context: ctx.emitContext,
          logger: ctx.logger,
        }),
    );

    if (!options.output) {
      process.stdout.write(snapshot.markdown);
      return;
    }
    const target = resolve(process.cwd(), options.output);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, snapshot.markdown, 'utf8');
    if (mode === 'json') {
      console.log(
        formatCliResult({ ok: true, command: 'render', data: { path: target } }),
      );
    } else {
      console.log(`Wrote ${target}`);
    }
  });

export function summarizeConfig(config: Config): Array<[string, string]> {
  return [
    ['Todoist token', maskSecret(config.todoistToken)],
    ['Project', config.todoistProjectId],
    ['Repository', redactCredentials(config.gitRepositoryUrl)],
    ['Author', `${config.gitName} <${config.gitEmail}>`],
    ['Export path', config.exportPath],
    ['Commit message', config.commitMessage],
    ['Rate limit', `${config.rateLimit.calls} per ${config.rateLimit.intervalMs}ms`],
    [
      'Retry',
      `${config.retry.maxAttempts} attempts, ${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms`,
    ],
  ];
}

cli
  .command('config <action>', 'Configuration tools (actions: validate)')
  .action(async (action: string, options: CliOptions) => {
    if (action !== 'validate') {
      throw new RoadmapError({
        code: 'unknown_command',
        message: `Unknown command: config ${action}`,
        userMessage: `Unknown config action "${action}".`,
        kind: 'validation',
        nextSteps: ['Run `roadmap-sync config validate`.'],
      });
    }
    const result = await loadConfig(undefined, {
      cwd: process.cwd(),
      ...(options.config ? { configPath: options.config } : {}),
    });
    const summary = summarizeConfig(result.config);
    const source = result.source ? result.source.path : 'environment only';

    if (options.json) {
      console.log(
        formatCliResult({
          ok: true,
          command: 'config.validate',
          data: { source, settings: Object.fromEntries(summary) },
        }),
      );
      return;
    }
    console.log(
      renderSuccessSummary({
        title: 'Configuration is valid',
        details: [['Source', source], ...summary],
      }),
    );
  });

cli.help();
cli.version('0.1.0');

export async function run(argv: string[]): Promise<void> {
  let options: CliOptions = {};
  try {
    const parsed = cli.parse(argv, { run: false });
    options = {
      json: parsed.options['json'] === true,
      debug: parsed.options['debug'] === true,
    };
    if (options.debug) {
      setEnvValue('ROADMAP_DEBUG', '1');
    }
    if (parsed.options['help'] || parsed.options['version']) {
      return;
    }
    await cli.runMatchedCommand();
  } catch (error) {
    reportError(error, options);
  }
}

function reportError(error: unknown, options: CliOptions): void {
  if (options.json) {
    const jsonError = buildJsonError(error);
    console.log(formatCliResult({ ok: false, command: commandName(), error: jsonError }));
    process.exitCode = normalizeError(error).exitCode;
    return;
  }
  const rendered = renderCliError(error, {
    debug: options.debug ?? false,
    commandNames: COMMAND_NAMES,
  });
  console.error(rendered.message);
  process.exitCode = rendered.error.exitCode;
}

function commandName(): string {
  return cli.matchedCommandName || 'sync';
}
