/**
 * A task as the roadmap sees it, independent of the Todoist payload shape.
 *
 * `dueAt` is a naive wall-clock value: its UTC fields hold the local date and
 * time the task is due, with no timezone attached. `null` marks a backlog item.
 */
export type TaskInfo = Readonly<{
  id: string;
  url: string;
  title: string;
  description: string | null;
  dueAt: Date | null;
  isCompleted: boolean;
  priority: number;
}>;

export type ProjectInfo = Readonly<{
  id: string;
  name: string;
  url: string;
}>;
