import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { run } from './cli/cli';

export type { CliResult } from './cli/json-output';
export type { Config, ConfigInput } from './config/schema';
export { defineConfig } from './config/define-config';
export { RoadmapError } from './core/errors';
export type { JsonError } from './events/schema';
export { renderRoadmap } from './roadmap/render';
export { buildRoadmap, runSync } from './sync/sync';
export type { RoadmapSnapshot, SyncResult } from './sync/sync';
export type { ProjectInfo, TaskInfo } from './task/types';
export { createTodoistClient } from './todoist/client';

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  await run(process.argv);
}
