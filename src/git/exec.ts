import { spawn } from 'node:child_process';

import type { EventBus } from '../events/bus';
import type { EmitContext } from '../events/emit';
import { createEnvelope } from '../events/emit';
import { redactCredentials } from '../utils/text';

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
};

export type GitRunner = (
  args: string[],
  options: { cwd: string; bus?: EventBus | undefined; context: EmitContext },
) => Promise<GitResult>;

function spawnGit(args: string[], cwd: string): Promise<Omit<GitResult, 'durationMs'>> {
  const env: NodeJS.ProcessEnv = { ...process.env, GIT_TERMINAL_PROMPT: '0' };
  delete env['GIT_DIR'];
  delete env['GIT_WORK_TREE'];
  delete env['GIT_INDEX_FILE'];

  return new Promise((resolve, reject) => {
    const child = spawn('git', args, { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.once('error', reject);
    child.once('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode: code ?? 1,
      });
    });
  });
}

export const runGit: GitRunner = async (args, options) => {
  const start = performance.now();
  const safeArgs = args.map(redactCredentials);

  if (options.bus) {
    await options.bus.emit(
      createEnvelope({
        type: 'git.command_started',
        source: 'git',
        level: 'debug',
        context: options.context,
        message: `git ${safeArgs.join(' ')}`,
        payload: { cmd: 'git', args: safeArgs, cwd: options.cwd },
      }),
    );
  }

  const { stdout, stderr, exitCode } = await spawnGit(args, options.cwd);
  const durationMs = Math.round(performance.now() - start);

  if (options.bus) {
    await options.bus.emit(
      createEnvelope({
        type: 'git.command_finished',
        source: 'git',
        level: exitCode === 0 ? 'debug' : 'error',
        context: options.context,
        payload: {
          cmd: 'git',
          args: safeArgs,
          cwd: options.cwd,
          exitCode,
          durationMs,
          stdout: redactCredentials(stdout.trim()),
          stderr: redactCredentials(stderr.trim()),
        },
      }),
    );
  }

  return { stdout, stderr, exitCode, durationMs };
};
