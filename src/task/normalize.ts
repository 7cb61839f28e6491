import type { TodoistDue, TodoistProject, TodoistTask } from '../todoist/schemas';
import { parseNaiveDateTime } from '../utils/time';
import type { ProjectInfo, TaskInfo } from './types';

export function parseDue(due: TodoistDue | null | undefined): Date | null {
  if (!due) return null;
  if (due.datetime) {
    return parseNaiveDateTime(due.datetime);
  }
  return parseNaiveDateTime(due.date);
}

export function toTaskInfo(task: TodoistTask): TaskInfo {
  const description = task.description ?? '';
  return Object.freeze({
    id: task.id,
    url: task.url,
    title: task.content,
    description: description.trim().length > 0 ? description : null,
    dueAt: parseDue(task.due),
    isCompleted: task.is_completed,
    priority: task.priority,
  });
}

export function toProjectInfo(project: TodoistProject): ProjectInfo {
  return Object.freeze({ id: project.id, name: project.name, url: project.url });
}
