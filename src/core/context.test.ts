import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EventBus } from '../events/bus';
import type { Event } from '../events/schema';
import { withRunContext } from './context';
import { RoadmapError } from './errors';

const config = {
  todoistToken: 'test-token',
  todoistProjectId: '7',
  gitRepositoryUrl: 'https://example.com/roadmap.git',
  gitName: 'Roadmap Bot',
  gitEmail: 'bot@example.com',
  exportPath: 'docs/ROADMAP.md',
  commitMessage: 'Update roadmap',
};

describe('withRunContext', () => {
  let dir: string;
  let previousExitCode: typeof process.exitCode;
  let events: Event[];
  let bus: EventBus;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'roadmap-context-'));
    await writeFile(join(dir, 'roadmap.config.json'), JSON.stringify(config));
    previousExitCode = process.exitCode;
    events = [];
    bus = new EventBus();
    bus.subscribe((event) => {
      events.push(event);
    });
  });

  afterEach(async () => {
    process.exitCode = previousExitCode;
    await rm(dir, { recursive: true, force: true });
  });

  it('brackets the run with started and finished events', async () => {
    const result = await withRunContext(
      {
        cwd: dir,
        mode: 'headless',
        command: 'sync',
        runId: 'run-1',
        events: { bus, mode: 'headless' },
        summarize: (value: string) => ({ outcome: value === 'done' ? 'unchanged' : 'published' }),
      },
      async (ctx) => {
        expect(ctx.config.todoistProjectId).toBe('7');
        expect(ctx.emitContext).toEqual({ runId: 'run-1', projectId: '7', mode: 'headless' });
        await ctx.logger.info('working');
        return 'done';
      },
    );

    expect(result).toBe('done');
    expect(events.map((event) => event.type)).toEqual([
      'run.started',
      'log.message',
      'run.finished',
    ]);
    const started = events[0];
    expect(started?.payload).toEqual({
      runId: 'run-1',
      command: 'sync',
      cwd: dir,
      configPath: join(dir, 'roadmap.config.json'),
    });
    const finished = events[2];
    expect(finished?.type === 'run.finished' && finished.payload.status).toBe('success');
    expect(finished?.type === 'run.finished' && finished.payload.summary).toEqual({
      outcome: 'unchanged',
    });
  });

  it('normalizes failures, tags them with the run id and sets the exit code', async () => {
    const error = await withRunContext(
      { cwd: dir, mode: 'headless', command: 'sync', runId: 'run-2', events: { bus, mode: 'headless' } },
      async () => {
        throw new Error('exploded');
      },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RoadmapError);
    if (error instanceof RoadmapError) {
      expect(error.code).toBe('unexpected_error');
      expect(error.runId).toBe('run-2');
    }
    expect(process.exitCode).toBe(1);
    const finished = events.at(-1);
    expect(finished?.type).toBe('run.finished');
    expect(finished?.level).toBe('error');
    expect(finished?.error?.message).toBe('exploded');
  });

  it('leaves SIGINT alone and reports only after the work settles', async () => {
    const listenersBefore = process.listenerCount('SIGINT');
    let listenersDuringRun = -1;
    let pushed = false;

    await withRunContext(
      { cwd: dir, mode: 'headless', command: 'sync', events: { bus, mode: 'headless' } },
      async () => {
        listenersDuringRun = process.listenerCount('SIGINT');
        await new Promise((resolve) => setTimeout(resolve, 20));
        pushed = true;
        return 'done';
      },
    );

    expect(listenersDuringRun).toBe(listenersBefore);
    expect(pushed).toBe(true);
    const finished = events.at(-1);
    expect(finished?.type === 'run.finished' && finished.payload.status).toBe('success');
  });

  it('fails before emitting anything when the config is invalid', async () => {
    await writeFile(join(dir, 'roadmap.config.json'), JSON.stringify({ ...config, gitEmail: 'x' }));

    await expect(
      withRunContext(
        { cwd: dir, mode: 'headless', command: 'sync', events: { bus, mode: 'headless' } },
        async () => 'never',
      ),
    ).rejects.toMatchObject({ code: 'config.invalid' });
    expect(events).toEqual([]);
  });
});
