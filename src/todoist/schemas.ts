import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform(String);

export const dueSchema = z.object({
  date: z.string(),
  datetime: z.string().nullish(),
  string: z.string().nullish(),
  timezone: z.string().nullish(),
  is_recurring: z.boolean().optional(),
});

export const taskSchema = z.object({
  id: idSchema,
  project_id: idSchema.nullish(),
  content: z.string(),
  description: z.string().nullish(),
  is_completed: z.boolean().default(false),
  priority: z.number().int().default(1),
  due: dueSchema.nullish(),
  url: z.string(),
});

export const projectSchema = z.object({
  id: idSchema,
  name: z.string(),
  url: z.string(),
});

export const completedItemSchema = z.object({
  task_id: idSchema,
  completed_at: z.string(),
  content: z.string().optional(),
});

export const completedItemsResponseSchema = z.object({
  items: z.array(completedItemSchema),
});

export type TodoistDue = z.output<typeof dueSchema>;
export type TodoistTask = z.output<typeof taskSchema>;
export type TodoistProject = z.output<typeof projectSchema>;
export type TodoistCompletedItem = z.output<typeof completedItemSchema>;
