import PQueue from 'p-queue';

import { type Logger, silentLogger } from '../core/logger';
import type { TodoistClient } from '../todoist/client';
import { isNotFound } from '../todoist/errors';
import type { TodoistCompletedItem } from '../todoist/schemas';
import { parseNaiveDateTime } from '../utils/time';
import { toTaskInfo } from './normalize';
import type { TaskInfo } from './types';

export type RateLimit = {
  /** Detail lookups allowed per window. */
  calls: number;
  intervalMs: number;
};

export type CompletedTasksResult = {
  tasks: TaskInfo[];
  skipped: string[];
};

/** Oldest completion first; items completed at the same instant keep API order. */
export function sortByCompletion(items: readonly TodoistCompletedItem[]): TodoistCompletedItem[] {
  return items
    .map((item, index) => ({ item, index, at: parseNaiveDateTime(item.completed_at).getTime() }))
    .sort((a, b) => a.at - b.at || a.index - b.index)
    .map((entry) => entry.item);
}

export async function loadCompletedTasks(options: {
  client: TodoistClient;
  projectId: string;
  rateLimit: RateLimit;
  logger?: Logger;
  onProgress?: (current: number, total: number) => Promise<void> | void;
}): Promise<CompletedTasksResult> {
  const logger = options.logger ?? silentLogger;
  const items = sortByCompletion(await options.client.getCompletedItems(options.projectId));
  const queue = new PQueue({
    concurrency: 1,
    interval: options.rateLimit.intervalMs,
    intervalCap: options.rateLimit.calls,
  });

  const tasks: TaskInfo[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();

  for (const [index, item] of items.entries()) {
    await options.onProgress?.(index, items.length);
    if (seen.has(item.task_id)) {
      // Recurring tasks show up once per completion; the roadmap lists them once.
      continue;
    }
    seen.add(item.task_id);

    try {
      const task = await queue.add(() => options.client.getTask(item.task_id), {
        throwOnTimeout: true,
      });
      tasks.push(toTaskInfo(task));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      skipped.push(item.task_id);
      await logger.debug(`Skipping completed task ${item.task_id}: no longer exists`, {
        taskId: item.task_id,
      });
    }
  }
  await options.onProgress?.(items.length, items.length);

  return { tasks, skipped };
}
