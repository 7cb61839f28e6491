import { normalizeError, RoadmapError } from '../core/errors';
import { colors, formatKeyValues, renderNextSteps } from './output';

export type CliErrorRenderOptions = {
  debug?: boolean;
  trace?: boolean;
  commandNames?: string[];
};

export function renderCliError(
  error: unknown,
  options?: CliErrorRenderOptions,
): { error: RoadmapError; message: string } {
  const normalized = normalizeError(error);
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${normalized.userMessage}`));

  const meta: Array<[string, string]> = [];
  if (normalized.code) {
    meta.push(['Code', normalized.code]);
  }
  if (normalized.runId) {
    meta.push(['Run ID', normalized.runId]);
  }
  if (meta.length > 0) {
    lines.push(...formatKeyValues(meta, { labelWidth: 10 }));
  }

  const details = formatDetails(normalized.details);
  if (details.length > 0) {
    lines.push('Details:');
    for (const detail of details) {
      lines.push(`  - ${detail}`);
    }
  }

  const didYouMean = buildDidYouMean(normalized, options?.commandNames);
  if (didYouMean.length > 0) {
    lines.push('Did you mean?');
    for (const suggestion of didYouMean) {
      lines.push(`  ${suggestion}`);
    }
  }

  const nextSteps = normalized.nextSteps ? [...normalized.nextSteps] : [];
  for (const step of buildDefaultRecoverySteps(normalized)) {
    if (!nextSteps.includes(step)) {
      nextSteps.push(step);
    }
  }
  const nextStepsBlock = renderNextSteps(nextSteps);
  if (nextStepsBlock) {
    lines.push(nextStepsBlock);
  }

  if (options?.debug || options?.trace) {
    lines.push('');
    lines.push('Debug:');
    lines.push(normalized.stack ?? 'No stack available.');
    if (options.trace && normalized.cause) {
      lines.push('');
      lines.push(`Cause: ${formatCause(normalized.cause)}`);
    }
  }

  return { error: normalized, message: lines.join('\n') };
}

export function buildDefaultRecoverySteps(error: RoadmapError): string[] {
  const steps: string[] = [];
  switch (error.kind) {
    case 'auth':
      steps.push('Check that TODOIST_TOKEN holds a valid API token.');
      break;
    case 'validation':
      steps.push('Run `roadmap-sync config validate` to check your settings.');
      break;
    case 'not_found':
      steps.push('Check that todoistProjectId names an existing project.');
      break;
    case 'conflict':
      steps.push('The remote moved during the run; run `roadmap-sync sync` again.');
      break;
    case 'internal':
      steps.push('Re-run with `--debug` for more context.');
      break;
    default:
      break;
  }
  if (steps.length === 0) {
    steps.push('Run `roadmap-sync --help` for usage details.');
  }
  return steps;
}

function buildDidYouMean(error: RoadmapError, commandNames: string[] | undefined): string[] {
  if (error.code !== 'unknown_command' || !commandNames) return [];
  const unknown = extractUnknownCommand(error.message);
  if (!unknown) return [];
  return suggestCommands(unknown, commandNames).map((command) => `roadmap-sync ${command}`);
}

function extractUnknownCommand(message: string): string | null {
  const match = message.match(/Unknown command:\s*(.+)$/i);
  return match?.[1]?.trim() ?? null;
}

export function suggestCommands(input: string, commands: string[]): string[] {
  const normalized = input.toLowerCase();
  const prefixMatches = commands.filter(
    (command) =>
      command.startsWith(normalized) || normalized.startsWith(command.toLowerCase()),
  );
  if (prefixMatches.length > 0) {
    return prefixMatches.slice(0, 3);
  }

  return commands
    .map((command) => ({ command, score: levenshtein(normalized, command.toLowerCase()) }))
    .sort((a, b) => a.score - b.score)
    .filter((entry) => entry.score <= 3)
    .slice(0, 3)
    .map((entry) => entry.command);
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

function formatDetails(details: Record<string, unknown> | undefined): string[] {
  if (!details) return [];
  const lines: string[] = [];
  const path = details['path'];
  if (typeof path === 'string') {
    lines.push(`Path: ${path}`);
  }
  const issues = details['issues'];
  if (Array.isArray(issues) && issues.every((issue) => typeof issue === 'string')) {
    lines.push(...issues);
  }
  if (lines.length === 0) {
    lines.push(JSON.stringify(details));
  }
  return lines;
}

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  return typeof cause === 'string' ? cause : JSON.stringify(cause);
}
