import { access, readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { RoadmapError } from '../core/errors';
import { readEnvValue } from '../utils/env';
import { loadProjectEnv } from './env';
import type { Config, ConfigInput } from './schema';
import { configFileSchema, configSchema } from './schema';

export type ConfigResult = {
  config: Config;
  source: { path: string; format: string } | null;
  projectRoot: string;
};

const MODULE_NAME = 'roadmap';

export const CONFIG_FILES = [
  'roadmap.config.json',
  'roadmap.config.yaml',
  'roadmap.config.yml',
  'roadmap.config.js',
  'roadmap.config.mjs',
  'config.yaml',
];

type EnvBackedKey =
  | 'todoistToken'
  | 'todoistProjectId'
  | 'gitRepositoryUrl'
  | 'gitName'
  | 'gitEmail'
  | 'exportPath'
  | 'commitMessage';

const ENV_KEYS: Array<[EnvBackedKey, string]> = [
  ['todoistToken', 'TODOIST_TOKEN'],
  ['todoistProjectId', 'TODOIST_PROJECT_ID'],
  ['gitRepositoryUrl', 'ROADMAP_GIT_REPOSITORY_URL'],
  ['gitName', 'ROADMAP_GIT_NAME'],
  ['gitEmail', 'ROADMAP_GIT_EMAIL'],
  ['exportPath', 'ROADMAP_EXPORT_PATH'],
  ['commitMessage', 'ROADMAP_COMMIT_MESSAGE'],
];

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function packageHasConfig(packagePath: string): Promise<boolean> {
  try {
    const parsed: unknown = JSON.parse(await readFile(packagePath, 'utf8'));
    return isRecord(parsed) && MODULE_NAME in parsed;
  } catch {
    // An unreadable package.json simply does not carry a config.
    return false;
  }
}

export async function findConfigPath(searchFrom: string): Promise<string | null> {
  let current = searchFrom;
  while (true) {
    for (const candidate of CONFIG_FILES) {
      const path = join(current, candidate);
      if (await pathExists(path)) {
        return path;
      }
    }

    const packagePath = join(current, 'package.json');
    if ((await pathExists(packagePath)) && (await packageHasConfig(packagePath))) {
      return packagePath;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

function mergeConfig(
  base: Record<string, unknown>,
  override?: Record<string, unknown>,
): Record<string, unknown> {
  if (!override) return base;
  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = output[key];
    output[key] = isRecord(value) && isRecord(baseValue) ? { ...baseValue, ...value } : value;
  }
  return output;
}

function configFromEnv(): ConfigInput {
  const override: ConfigInput = {};
  for (const [key, envKey] of ENV_KEYS) {
    const value = readEnvValue(envKey);
    if (value !== undefined) {
      override[key] = value;
    }
  }
  return override;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

function invalidConfig(issueLines: string[], path?: string): RoadmapError {
  return new RoadmapError({
    code: 'config.invalid',
    message: `Invalid config: ${issueLines.join('\n')}`,
    userMessage: 'Configuration is invalid.',
    kind: 'validation',
    details: {
      issues: issueLines,
      ...(path ? { path } : {}),
    },
    nextSteps: [
      'Run `roadmap-sync config validate` for a full report.',
      'Fix the settings in your config file or the matching environment variables.',
    ],
  });
}

export async function loadConfig(
  overrides?: ConfigInput,
  options?: { cwd?: string; configPath?: string },
): Promise<ConfigResult> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [...CONFIG_FILES, 'package.json'],
  });

  const searchFrom = options?.cwd ? resolve(options.cwd) : process.cwd();
  let configPath: string | null;
  if (options?.configPath) {
    configPath = resolve(searchFrom, options.configPath);
    if (!(await pathExists(configPath))) {
      throw new RoadmapError({
        code: 'config.not_found',
        message: `Config file not found: ${configPath}`,
        userMessage: `Config file not found: ${configPath}.`,
        kind: 'validation',
        details: { path: configPath },
      });
    }
  } else {
    configPath = await findConfigPath(searchFrom);
  }

  const projectRoot = configPath ? dirname(configPath) : searchFrom;
  loadProjectEnv(projectRoot);

  let result: CosmiconfigResult = null;
  if (configPath) {
    try {
      result = await explorer.load(configPath);
    } catch (error) {
      throw new RoadmapError({
        code: 'config.unreadable',
        message: `Unable to read config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        userMessage: `Unable to read config file ${configPath}.`,
        kind: 'validation',
        details: { path: configPath },
        cause: error,
      });
    }
  }

  const rawConfig: unknown = result && !result.isEmpty ? result.config : {};
  const parsedFile = configFileSchema.safeParse(rawConfig ?? {});
  if (!parsedFile.success) {
    throw invalidConfig(formatIssues(parsedFile.error.issues), result?.filepath);
  }

  const merged = mergeConfig(mergeConfig(parsedFile.data, configFromEnv()), overrides);
  const finalParsed = configSchema.safeParse(merged);
  if (!finalParsed.success) {
    const issueLines = formatIssues(finalParsed.error.issues);
    if (!configPath) {
      throw new RoadmapError({
        code: 'config.not_found',
        message: `No config file found from ${searchFrom} and the environment is incomplete:\n${issueLines.join('\n')}`,
        userMessage: 'No configuration found.',
        kind: 'validation',
        details: { issues: issueLines },
        nextSteps: [
          `Create one of ${CONFIG_FILES.join(', ')}.`,
          'Or set TODOIST_TOKEN, TODOIST_PROJECT_ID and the ROADMAP_* variables.',
        ],
      });
    }
    throw invalidConfig(issueLines, result?.filepath ?? configPath);
  }

  return {
    config: finalParsed.data,
    source: result ? { path: result.filepath, format: formatFromPath(result.filepath) } : null,
    projectRoot,
  };
}

function formatFromPath(path: string): string {
  if (path.endsWith('package.json')) return 'package.json';
  const dot = path.lastIndexOf('.');
  return dot >= 0 ? path.slice(dot + 1) : 'unknown';
}
