import { describe, expect, it } from 'vitest';

import { RoadmapError } from '../core/errors';
import { taskSchema } from '../todoist/schemas';
import { parseDue, toProjectInfo, toTaskInfo } from './normalize';

function rawTask(overrides: Record<string, unknown> = {}) {
  return taskSchema.parse({
    id: '101',
    content: 'Ship the exporter',
    description: 'Details',
    is_completed: false,
    priority: 3,
    due: null,
    url: 'https://todoist.example/showTask?id=101',
    ...overrides,
  });
}

describe('toTaskInfo', () => {
  it('maps the Todoist payload onto TaskInfo', () => {
    expect(toTaskInfo(rawTask())).toEqual({
      id: '101',
      url: 'https://todoist.example/showTask?id=101',
      title: 'Ship the exporter',
      description: 'Details',
      dueAt: null,
      isCompleted: false,
      priority: 3,
    });
  });

  it('turns empty and whitespace-only descriptions into null', () => {
    expect(toTaskInfo(rawTask({ description: '' })).description).toBeNull();
    expect(toTaskInfo(rawTask({ description: '  \n ' })).description).toBeNull();
    expect(toTaskInfo(rawTask({ description: undefined })).description).toBeNull();
  });

  it('coerces numeric ids to strings', () => {
    expect(toTaskInfo(rawTask({ id: 42 })).id).toBe('42');
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(toTaskInfo(rawTask()))).toBe(true);
  });

  it('prefers the due datetime and keeps its wall clock', () => {
    const task = toTaskInfo(
      rawTask({ due: { date: '2024-05-06', datetime: '2024-05-06T18:45:00Z' } }),
    );
    expect(task.dueAt?.toISOString()).toBe('2024-05-06T18:45:00.000Z');
  });

  it('falls back to the due date at midnight', () => {
    const task = toTaskInfo(rawTask({ due: { date: '2024-05-06' } }));
    expect(task.dueAt?.toISOString()).toBe('2024-05-06T00:00:00.000Z');
  });
});

describe('parseDue', () => {
  it('returns null without a due object', () => {
    expect(parseDue(null)).toBeNull();
    expect(parseDue(undefined)).toBeNull();
  });

  it('raises a validation error for malformed timestamps', () => {
    expect(() => parseDue({ date: '2024-05-06', datetime: 'tomorrow' })).toThrow(RoadmapError);
  });
});

describe('toProjectInfo', () => {
  it('keeps id, name and url', () => {
    expect(toProjectInfo({ id: '7', name: 'Demo', url: 'https://x/demo' })).toEqual({
      id: '7',
      name: 'Demo',
      url: 'https://x/demo',
    });
  });
});
