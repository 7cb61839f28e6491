import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { config as loadDotenv } from 'dotenv';

import { isEnvFlagSet } from '../utils/env';

export type EnvLoadSummary = {
  path?: string;
  keys: string[];
};

function logDebug(message: string): void {
  if (!isEnvFlagSet('ROADMAP_DEBUG')) return;
  console.error(`[debug] ${message}`);
}

/**
 * Loads `.env` from `dir` into `process.env`. Values from the file win over
 * the shell so a checked-out project behaves the same everywhere.
 */
export function loadProjectEnv(dir: string): EnvLoadSummary {
  const envPath = join(dir, '.env');

  if (!existsSync(envPath)) {
    return { keys: [] };
  }

  logDebug(`Loading .env from ${envPath}`);
  const result = loadDotenv({ path: envPath, override: true, quiet: true });
  if (result.error) {
    logDebug(`Failed to load .env: ${result.error.message}`);
  }

  const keys = result.parsed ? Object.keys(result.parsed) : [];
  logDebug(`Loaded ${keys.length} environment variable${keys.length === 1 ? '' : 's'}`);

  return { path: envPath, keys };
}
