import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { RoadmapError } from '../core/errors';
import type { EventBus } from '../events/bus';
import type { EmitContext } from '../events/emit';
import { redactCredentials } from '../utils/text';
import { type GitResult, type GitRunner, runGit as defaultRunGit } from './exec';

export type PushFlag =
  | 'fast_forward'
  | 'forced'
  | 'deleted'
  | 'new_ref'
  | 'rejected'
  | 'up_to_date';

export type PushRefResult = {
  flag: PushFlag;
  from: string;
  to: string;
  summary: string;
};

export type PushResult = PushRefResult & { commit: string };

/** A disposable checkout of the target repository. */
export type WorkingCopy = {
  path: string;
  /** True when tracked or untracked files differ from HEAD. */
  isDirty: () => Promise<boolean>;
  commitFile: (relativePath: string, message: string) => Promise<string>;
  /** Pushes HEAD and resolves only for a fast-forward update. */
  push: () => Promise<PushResult>;
};

export type WorkingCopyOptions = {
  repositoryUrl: string;
  authorName: string;
  authorEmail: string;
  bus?: EventBus;
  context: EmitContext;
  runGit?: GitRunner;
};

export type OpenWorkingCopy = <T>(
  options: WorkingCopyOptions,
  fn: (copy: WorkingCopy) => Promise<T>,
) => Promise<T>;

const PORCELAIN_FLAGS: Record<string, PushFlag> = {
  ' ': 'fast_forward',
  '+': 'forced',
  '-': 'deleted',
  '*': 'new_ref',
  '!': 'rejected',
  '=': 'up_to_date',
};

/** Parses the ref lines of `git push --porcelain`. */
export function parsePushPorcelain(output: string): PushRefResult[] {
  const results: PushRefResult[] = [];
  for (const line of output.split('\n')) {
    const match = line.match(/^([ +\-*!=])\t([^\t]*)\t(.*)$/);
    if (!match) continue;
    const [, flagChar = '', refs = '', summary = ''] = match;
    const flag = PORCELAIN_FLAGS[flagChar];
    if (!flag) continue;
    const separator = refs.indexOf(':');
    results.push({
      flag,
      from: separator >= 0 ? refs.slice(0, separator) : refs,
      to: separator >= 0 ? refs.slice(separator + 1) : refs,
      summary: summary.trim(),
    });
  }
  return results;
}

function gitFailure(code: string, action: string, result: GitResult): RoadmapError {
  const output = redactCredentials((result.stderr || result.stdout).trim());
  return new RoadmapError({
    code,
    message: `git ${action} failed (exit ${result.exitCode})${output ? `: ${output}` : ''}`,
    userMessage: `git ${action} failed.`,
    kind: 'internal',
    details: { exitCode: result.exitCode, ...(output ? { output } : {}) },
  });
}

export const withWorkingCopy: OpenWorkingCopy = async (options, fn) => {
  const git = options.runGit ?? defaultRunGit;
  const base = await mkdtemp(join(tmpdir(), 'roadmap-sync-'));
  const path = join(base, 'repo');
  const run = (args: string[], cwd = path) =>
    git(args, { cwd, bus: options.bus, context: options.context });

  try {
    const clone = await run(['clone', '--depth', '1', options.repositoryUrl, path], base);
    if (clone.exitCode !== 0) {
      throw gitFailure('git.clone_failed', 'clone', clone);
    }
    for (const [key, value] of [
      ['user.name', options.authorName],
      ['user.email', options.authorEmail],
    ] as const) {
      const result = await run(['config', key, value]);
      if (result.exitCode !== 0) {
        throw gitFailure('git.config_failed', `config ${key}`, result);
      }
    }

    const copy: WorkingCopy = {
      path,
      isDirty: async () => {
        const status = await run(['status', '--porcelain', '--untracked-files=all']);
        if (status.exitCode !== 0) {
          throw gitFailure('git.status_failed', 'status', status);
        }
        return status.stdout.trim().length > 0;
      },
      commitFile: async (relativePath, message) => {
        const add = await run(['add', '--', relativePath]);
        if (add.exitCode !== 0) {
          throw gitFailure('git.add_failed', 'add', add);
        }
        const commit = await run(['commit', '-m', message]);
        if (commit.exitCode !== 0) {
          throw gitFailure('git.commit_failed', 'commit', commit);
        }
        const head = await run(['rev-parse', 'HEAD']);
        if (head.exitCode !== 0) {
          throw gitFailure('git.rev_parse_failed', 'rev-parse', head);
        }
        return head.stdout.trim();
      },
      push: async () => {
        const result = await run(['push', '--porcelain', 'origin', 'HEAD']);
        const refs = parsePushPorcelain(result.stdout);
        const ref = refs[0];
        if (!ref) {
          throw gitFailure('git.push_failed', 'push', result);
        }
        if (ref.flag === 'rejected') {
          throw new RoadmapError({
            code: 'git.push_rejected',
            message: `Push to ${ref.to} was rejected: ${ref.summary}`,
            userMessage: 'The remote rejected the roadmap commit.',
            kind: 'conflict',
            details: { ref: ref.to, summary: ref.summary },
            nextSteps: ['Re-run the sync; a fresh clone picks up the new remote history.'],
          });
        }
        if (ref.flag !== 'fast_forward' || result.exitCode !== 0) {
          throw new RoadmapError({
            code: 'git.push_not_fast_forward',
            message: `Push to ${ref.to} was not a fast-forward (${ref.flag}: ${ref.summary})`,
            userMessage: 'The roadmap push did not land as a fast-forward.',
            kind: 'conflict',
            details: { ref: ref.to, flag: ref.flag, summary: ref.summary },
          });
        }
        const head = await run(['rev-parse', 'HEAD']);
        return { ...ref, commit: head.stdout.trim() };
      },
    };

    return await fn(copy);
  } finally {
    await rm(base, { recursive: true, force: true });
  }
};
