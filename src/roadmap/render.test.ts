import { describe, expect, it } from 'vitest';

import type { ProjectInfo, TaskInfo } from '../task/types';
import { parseNaiveDateTime } from '../utils/time';
import {
  formatDescription,
  groupByWeek,
  priorityMarker,
  renderRoadmap,
  renderTaskLine,
} from './render';

const project: ProjectInfo = { id: 'p', name: 'Demo', url: 'https://x/demo' };
const now = parseNaiveDateTime('2024-05-15T12:00:00');

function task(id: string, title: string, overrides: Partial<TaskInfo> = {}): TaskInfo {
  return {
    id,
    url: `https://x/${id}`,
    title,
    description: null,
    dueAt: null,
    isCompleted: false,
    priority: 1,
    ...overrides,
  };
}

function due(id: string, title: string, at: string): TaskInfo {
  return task(id, title, { dueAt: parseNaiveDateTime(at) });
}

function section(output: string, from: string, to: string): string {
  return output.slice(output.indexOf(from), output.indexOf(to));
}

describe('renderRoadmap', () => {
  it('renders a project with one completed and one backlog task', () => {
    const output = renderRoadmap({
      project,
      completed: [task('1', 'Write outline', { isCompleted: true })],
      open: [task('2', 'Plan')],
      now,
    });

    expect(output).toBe(
      '# Roadmap\n\n' +
        'Tasks automatically exported from Todoist project [Demo](https://x/demo).\n\n' +
        'Jump to [future tasks](#future-tasks) or to the [backlog](#backlog).\n\n' +
        '## Completed tasks\n\n' +
        '<details>\n<summary>Show completed tasks</summary>\n\n' +
        '- [x] Write outline [🔗][1]\n' +
        '\n' +
        '</details>\n\n' +
        '## Overdue tasks\n\n' +
        '## Future tasks\n\n' +
        '## Backlog\n\n' +
        '- [ ] Plan [🔗][2]\n' +
        '\n\n' +
        '[1]: https://x/1\n' +
        '[2]: https://x/2\n',
    );
  });

  it('splits scheduled tasks into overdue and future week groups', () => {
    const output = renderRoadmap({
      project,
      completed: [],
      open: [
        due('a', 'A', '2024-05-07T10:00:00'),
        due('b', 'B', '2024-05-20'),
        due('c', 'C', '2024-05-16'),
        due('d', 'D', '2024-05-09'),
        task('e', 'E'),
      ],
      now,
    });

    expect(section(output, '## Overdue tasks', '## Backlog')).toBe(
      '## Overdue tasks\n\n' +
        '### From 2024/05/06 to 2024/05/12\n\n' +
        '- [ ] A [🔗][a]\n' +
        '- [ ] D [🔗][d]\n' +
        '\n' +
        '## Future tasks\n\n' +
        '### From 2024/05/20 to 2024/05/26\n\n' +
        '- [ ] B [🔗][b]\n' +
        '\n' +
        '### From 2024/05/13 to 2024/05/19\n\n' +
        '- [ ] C [🔗][c]\n' +
        '\n',
    );
    expect(output.endsWith(
      '- [ ] E [🔗][e]\n\n\n' +
        '[a]: https://x/a\n[b]: https://x/b\n[c]: https://x/c\n[d]: https://x/d\n[e]: https://x/e\n',
    )).toBe(true);
  });

  it('files a late-December week as future once the year rolls over', () => {
    const output = renderRoadmap({
      project,
      completed: [],
      open: [due('1', 'Year-end review', '2024-12-30T09:00:00')],
      now: parseNaiveDateTime('2025-01-02T12:00:00'),
    });

    expect(section(output, '## Overdue tasks', '## Future tasks')).toBe('## Overdue tasks\n\n');
    expect(section(output, '## Future tasks', '## Backlog')).toBe(
      '## Future tasks\n\n' +
        '### From 2024/12/30 to 2025/01/05\n\n' +
        '- [ ] Year-end review [🔗][1]\n\n',
    );
  });

  it('always checks completed tasks', () => {
    const output = renderRoadmap({
      project,
      completed: [task('9', 'Reopened later', { isCompleted: false })],
      open: [],
      now,
    });
    expect(output).toContain('- [x] Reopened later [🔗][9]\n');
  });

  it('is deterministic for the same input', () => {
    const input = {
      project,
      completed: [task('1', 'Done', { isCompleted: true, description: 'Notes' })],
      open: [due('2', 'Soon', '2024-05-17'), task('3', 'Later', { priority: 4 })],
      now,
    };
    expect(renderRoadmap(input)).toBe(renderRoadmap(input));
  });

  it('lists completed references before open ones', () => {
    const output = renderRoadmap({
      project,
      completed: [task('c1', 'Old', { isCompleted: true })],
      open: [due('o1', 'Next', '2024-05-16'), task('o2', 'Someday')],
      now,
    });
    expect(output.slice(output.indexOf('[c1]: '))).toBe(
      '[c1]: https://x/c1\n[o1]: https://x/o1\n[o2]: https://x/o2\n',
    );
  });
});

describe('groupByWeek', () => {
  it('keeps Monday through Sunday together and starts a new group next Monday', () => {
    const groups = groupByWeek([
      due('mon', 'Mon', '2024-05-06'),
      due('sun', 'Sun', '2024-05-12T23:00:00'),
      due('next', 'Next', '2024-05-13'),
    ]);
    expect(groups.map((group) => [group.week, group.tasks.map((t) => t.id)])).toEqual([
      [19, ['mon', 'sun']],
      [20, ['next']],
    ]);
  });

  it('merges a week that reappears after another week', () => {
    const groups = groupByWeek([
      due('a', 'A', '2024-05-06'),
      due('b', 'B', '2024-05-13'),
      due('c', 'C', '2024-05-08'),
    ]);
    expect(groups.map((group) => group.tasks.map((t) => t.id))).toEqual([['a', 'c'], ['b']]);
  });

  it('ignores backlog tasks', () => {
    expect(groupByWeek([task('x', 'X')])).toEqual([]);
  });
});

describe('renderTaskLine', () => {
  it('adds priority markers', () => {
    expect(priorityMarker(4)).toBe(' ❗');
    expect(priorityMarker(3)).toBe(' ❕');
    expect(priorityMarker(2)).toBe(' ❕');
    expect(priorityMarker(1)).toBe('');
    expect(renderTaskLine(task('1', 'Urgent', { priority: 4 }))).toBe('- [ ] Urgent ❗ [🔗][1]\n');
  });

  it('omits the description block when there is no description', () => {
    expect(renderTaskLine(task('1', 'Plain'))).toBe('- [ ] Plain [🔗][1]\n');
  });

  it('nests the description under a hard break', () => {
    const line = renderTaskLine(
      task('1', 'T', { description: 'First line\n\nSecond para\nthird line  \n\n\n' }),
    );
    expect(line).toBe(
      '- [ ] T [🔗][1]  \n    First line  \n    Second para\n    third line\n',
    );
  });
});

describe('formatDescription', () => {
  it('collapses runs of blank lines into one hard break', () => {
    expect(formatDescription('a\r\n \r\n\r\nb')).toBe('    a  \n    b');
  });
});
