import { z } from 'zod';

const requiredString = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} must not be empty`);

export const exportPathSchema = requiredString('exportPath').superRefine((value, ctx) => {
  const segments = value.split(/[/\\]/);
  if (value.startsWith('/') || /^[a-zA-Z]:[/\\]/.test(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exportPath must be relative to the repository root',
    });
  }
  if (segments.includes('..')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exportPath must not leave the repository',
    });
  }
  if (segments.includes('.git')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exportPath must not point inside .git',
    });
  }
});

export const configSchema = z
  .object({
    todoistToken: requiredString('todoistToken'),
    todoistProjectId: requiredString('todoistProjectId'),
    gitRepositoryUrl: requiredString('gitRepositoryUrl'),
    gitName: requiredString('gitName'),
    gitEmail: requiredString('gitEmail').email('gitEmail must be an email address'),
    exportPath: exportPathSchema,
    commitMessage: requiredString('commitMessage'),
    rateLimit: z
      .object({
        calls: z.number().int().positive().default(2),
        intervalMs: z.number().int().positive().default(1000),
      })
      .strict()
      .default({ calls: 2, intervalMs: 1000 }),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(5),
        initialDelayMs: z.number().int().nonnegative().default(500),
        maxDelayMs: z.number().int().positive().default(8000),
      })
      .strict()
      .default({ maxAttempts: 5, initialDelayMs: 500, maxDelayMs: 8000 }),
    todoist: z
      .object({
        restBaseUrl: z.string().url().default('https://api.todoist.com/rest/v2'),
        syncBaseUrl: z.string().url().default('https://api.todoist.com/sync/v9'),
      })
      .strict()
      .default({
        restBaseUrl: 'https://api.todoist.com/rest/v2',
        syncBaseUrl: 'https://api.todoist.com/sync/v9',
      }),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.retry.maxDelayMs < value.retry.initialDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'retry.maxDelayMs must be at least retry.initialDelayMs',
        path: ['retry', 'maxDelayMs'],
      });
    }
  });

/** Shape accepted from a config file, before environment overrides are applied. */
export const configFileSchema = z
  .object({
    todoistToken: z.string().optional(),
    todoistProjectId: z.union([z.string(), z.number()]).transform(String).optional(),
    gitRepositoryUrl: z.string().optional(),
    gitName: z.string().optional(),
    gitEmail: z.string().optional(),
    exportPath: z.string().optional(),
    commitMessage: z.string().optional(),
    rateLimit: z
      .object({ calls: z.number().optional(), intervalMs: z.number().optional() })
      .strict()
      .optional(),
    retry: z
      .object({
        maxAttempts: z.number().optional(),
        initialDelayMs: z.number().optional(),
        maxDelayMs: z.number().optional(),
      })
      .strict()
      .optional(),
    todoist: z
      .object({ restBaseUrl: z.string().optional(), syncBaseUrl: z.string().optional() })
      .strict()
      .optional(),
  })
  .strict();

export type Config = z.output<typeof configSchema>;
export type ConfigInput = z.output<typeof configFileSchema>;
/** What a config file may contain, before normalization. */
export type ConfigFileInput = z.input<typeof configFileSchema>;
