import type { ProjectInfo, TaskInfo } from '../task/types';
import { formatSlashDate, weekBounds, weekOfYear } from '../utils/time';

export const HIGH_PRIORITY_MARKER = '❗';
export const MEDIUM_PRIORITY_MARKER = '❕';
export const LINK_ICON = '🔗';

const HARD_BREAK = '  \n';
const DESCRIPTION_INDENT = '    ';

export type WeekGroup = {
  week: number;
  tasks: TaskInfo[];
};

export type RoadmapInput = {
  project: ProjectInfo;
  /** Completed tasks, oldest completion first. */
  completed: readonly TaskInfo[];
  /** Open tasks in the order Todoist returned them. */
  open: readonly TaskInfo[];
  /** Naive wall-clock "now"; decides which weeks are overdue. */
  now: Date;
};

export function priorityMarker(priority: number): string {
  if (priority >= 4) return ` ${HIGH_PRIORITY_MARKER}`;
  if (priority >= 2) return ` ${MEDIUM_PRIORITY_MARKER}`;
  return '';
}

/**
 * Collapses blank-line paragraph breaks into hard line breaks and indents the
 * result so it stays nested under its list item.
 */
export function formatDescription(description: string): string {
  const collapsed = description
    .replace(/\r\n?/g, '\n')
    .replace(/\s+$/, '')
    .split(/\n(?:[ \t]*\n)+/)
    .join(HARD_BREAK);
  return collapsed
    .split('\n')
    .map((line) => (line.trim().length > 0 ? `${DESCRIPTION_INDENT}${line}` : line))
    .join('\n');
}

export function renderTaskLine(task: TaskInfo, options?: { checked?: boolean }): string {
  const checked = options?.checked ?? task.isCompleted;
  const description =
    task.description !== null ? `${HARD_BREAK}${formatDescription(task.description)}` : '';
  return `- [${checked ? 'x' : ' '}] ${task.title}${priorityMarker(task.priority)} [${LINK_ICON}][${task.id}]${description}\n`;
}

export function renderReference(task: TaskInfo): string {
  return `[${task.id}]: ${task.url}\n`;
}

/**
 * Groups tasks by week number in order of first appearance. Tasks of a week
 * that shows up again later join the group created for it.
 */
export function groupByWeek(tasks: readonly TaskInfo[]): WeekGroup[] {
  const groups = new Map<number, WeekGroup>();
  for (const task of tasks) {
    if (task.dueAt === null) continue;
    const week = weekOfYear(task.dueAt);
    const group = groups.get(week);
    if (group) {
      group.tasks.push(task);
    } else {
      groups.set(week, { week, tasks: [task] });
    }
  }
  return [...groups.values()];
}

export function partitionOpenTasks(open: readonly TaskInfo[]): {
  backlog: TaskInfo[];
  scheduled: TaskInfo[];
} {
  return {
    backlog: open.filter((task) => task.dueAt === null),
    scheduled: open.filter((task) => task.dueAt !== null),
  };
}

export function splitByCurrentWeek(
  groups: readonly WeekGroup[],
  now: Date,
): { overdue: WeekGroup[]; future: WeekGroup[] } {
  const currentWeek = weekOfYear(now);
  return {
    overdue: groups.filter((group) => group.week < currentWeek),
    future: groups.filter((group) => group.week >= currentWeek),
  };
}

function renderWeekGroup(group: WeekGroup): string {
  const first = group.tasks[0];
  if (!first?.dueAt) return '';
  const { start, end } = weekBounds(first.dueAt);
  const lines = group.tasks.map((task) => renderTaskLine(task)).join('');
  return `### From ${formatSlashDate(start)} to ${formatSlashDate(end)}\n\n${lines}\n`;
}

export function renderRoadmap(input: RoadmapInput): string {
  const { project, completed, open, now } = input;
  const { backlog, scheduled } = partitionOpenTasks(open);
  const { overdue, future } = splitByCurrentWeek(groupByWeek(scheduled), now);

  const parts: string[] = [
    '# Roadmap\n\n',
    `Tasks automatically exported from Todoist project [${project.name}](${project.url}).\n\n`,
    'Jump to [future tasks](#future-tasks) or to the [backlog](#backlog).\n\n',
    '## Completed tasks\n\n',
    '<details>\n<summary>Show completed tasks</summary>\n\n',
    ...completed.map((task) => renderTaskLine(task, { checked: true })),
    '\n',
    '</details>\n\n',
    '## Overdue tasks\n\n',
    ...overdue.map(renderWeekGroup),
    '## Future tasks\n\n',
    ...future.map(renderWeekGroup),
    '## Backlog\n\n',
    ...backlog.map((task) => renderTaskLine(task)),
    '\n\n',
    ...completed.map(renderReference),
    ...open.map(renderReference),
  ];

  return parts.join('');
}
