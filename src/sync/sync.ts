import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, relative, resolve, sep } from 'node:path';

import type { Config } from '../config/schema';
import { RoadmapError } from '../core/errors';
import { type Logger, silentLogger } from '../core/logger';
import type { EventBus } from '../events/bus';
import { createEnvelope, type EmitContext } from '../events/emit';
import type { RunStep } from '../events/schema';
import { type OpenWorkingCopy, withWorkingCopy } from '../git/working-copy';
import { renderRoadmap } from '../roadmap/render';
import { loadCompletedTasks } from '../task/completed';
import { toProjectInfo, toTaskInfo } from '../task/normalize';
import type { ProjectInfo, TaskInfo } from '../task/types';
import type { TodoistClient } from '../todoist/client';
import { toNaiveLocal } from '../utils/time';

export type SyncDeps = {
  config: Config;
  client: TodoistClient;
  openWorkingCopy?: OpenWorkingCopy;
  bus?: EventBus;
  context: EmitContext;
  logger?: Logger;
  /** Wall clock used for the overdue/future split. */
  now?: () => Date;
};

export type RoadmapSnapshot = {
  project: ProjectInfo;
  completed: TaskInfo[];
  open: TaskInfo[];
  skipped: string[];
  markdown: string;
};

export type SyncResult = {
  status: 'unchanged' | 'published';
  path: string;
  completedCount: number;
  openCount: number;
  skippedCount: number;
  commit?: string;
};

type StepEmitter = <T>(
  stepId: string,
  title: string,
  fn: (progress: (current: number, total: number) => Promise<void>) => Promise<T>,
) => Promise<T>;

function createStepEmitter(bus: EventBus | undefined, context: EmitContext): StepEmitter {
  const emit = async (payload: RunStep): Promise<void> => {
    if (!bus) return;
    await bus.emit(
      createEnvelope({
        type: 'run.step',
        source: 'engine',
        level: payload.status === 'failed' ? 'error' : 'info',
        context,
        payload,
      }),
    );
  };

  return async (stepId, title, fn) => {
    await emit({ stepId, title, status: 'running' });
    try {
      const result = await fn((current, total) =>
        emit({ stepId, title, status: 'running', progress: { current, total, unit: 'tasks' } }),
      );
      await emit({ stepId, title, status: 'succeeded' });
      return result;
    } catch (error) {
      await emit({ stepId, title, status: 'failed' });
      throw error;
    }
  };
}

/** Fetches the project state and renders it. Touches no git state. */
export async function buildRoadmap(deps: SyncDeps): Promise<RoadmapSnapshot> {
  const { config, client } = deps;
  const logger = deps.logger ?? silentLogger;
  const step = createStepEmitter(deps.bus, deps.context);
  const projectId = config.todoistProjectId;

  const project = await step('todoist.project', 'Load project', async () =>
    toProjectInfo(await client.getProject(projectId)),
  );
  const open = await step('todoist.open_tasks', 'Load open tasks', async () =>
    (await client.getTasks(projectId)).map(toTaskInfo),
  );
  const loaded = await step('todoist.completed_tasks', 'Load completed tasks', (progress) =>
    loadCompletedTasks({
      client,
      projectId,
      rateLimit: config.rateLimit,
      logger,
      onProgress: progress,
    }),
  );

  // A recurring task is both open and completed; it is listed once, as open.
  const openIds = new Set(open.map((task) => task.id));
  const completed = loaded.tasks.filter((task) => !openIds.has(task.id));
  if (completed.length !== loaded.tasks.length) {
    await logger.debug('Dropped completed entries of tasks that are still open', {
      count: loaded.tasks.length - completed.length,
    });
  }

  const now = toNaiveLocal((deps.now ?? (() => new Date()))());
  const markdown = renderRoadmap({ project, completed, open, now });
  return { project, completed, open, skipped: loaded.skipped, markdown };
}

export function resolveExportPath(root: string, exportPath: string): string {
  const target = resolve(root, exportPath);
  const rel = relative(root, target);
  if (!rel || rel.startsWith('..') || rel.split(sep).includes('..')) {
    throw new RoadmapError({
      code: 'config.export_path_outside_repo',
      message: `exportPath ${exportPath} resolves outside the repository`,
      userMessage: 'exportPath must point to a file inside the repository.',
      kind: 'validation',
      details: { exportPath },
    });
  }
  return target;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readExisting(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

export async function runSync(deps: SyncDeps): Promise<SyncResult> {
  const { config } = deps;
  const logger = deps.logger ?? silentLogger;
  const openWorkingCopy = deps.openWorkingCopy ?? withWorkingCopy;
  const step = createStepEmitter(deps.bus, deps.context);

  return openWorkingCopy(
    {
      repositoryUrl: config.gitRepositoryUrl,
      authorName: config.gitName,
      authorEmail: config.gitEmail,
      ...(deps.bus ? { bus: deps.bus } : {}),
      context: deps.context,
    },
    async (copy) => {
      const snapshot = await buildRoadmap(deps);
      const target = resolveExportPath(copy.path, config.exportPath);

      const previous = await readExisting(target);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, snapshot.markdown, 'utf8');
      await emitDocumentWritten(deps, {
        path: config.exportPath,
        bytes: Buffer.byteLength(snapshot.markdown, 'utf8'),
        changed: previous !== snapshot.markdown,
      });

      const counts = {
        path: config.exportPath,
        completedCount: snapshot.completed.length,
        openCount: snapshot.open.length,
        skippedCount: snapshot.skipped.length,
      };

      if (!(await copy.isDirty())) {
        await logger.info('Roadmap unchanged; nothing to publish.');
        return { status: 'unchanged', ...counts };
      }

      const commit = await step('git.commit', 'Commit roadmap', () =>
        copy.commitFile(config.exportPath, config.commitMessage),
      );
      const push = await step('git.push', 'Push roadmap', () => copy.push());

      if (deps.bus) {
        await deps.bus.emit(
          createEnvelope({
            type: 'document.published',
            source: 'git',
            level: 'info',
            context: deps.context,
            payload: {
              path: config.exportPath,
              commit: push.commit || commit,
              remoteRef: push.to,
              summary: push.summary,
            },
          }),
        );
      }

      return { status: 'published', ...counts, commit: push.commit || commit };
    },
  );
}

async function emitDocumentWritten(
  deps: SyncDeps,
  payload: { path: string; bytes: number; changed: boolean },
): Promise<void> {
  if (!deps.bus) return;
  await deps.bus.emit(
    createEnvelope({
      type: 'document.written',
      source: 'engine',
      level: 'info',
      context: deps.context,
      payload,
    }),
  );
}
