import chalk from 'chalk';

const RULE_WIDTH = 60;
const LABEL_WIDTH = 14;

const isTty = (): boolean => Boolean(process.stdout.isTTY);
const paint =
  (style: (text: string) => string) =>
  (text: string): string =>
    isTty() ? style(text) : text;

export const colors = {
  success: paint(chalk.green),
  error: paint(chalk.red),
  info: paint(chalk.blue),
  dim: paint(chalk.gray),
  header: paint(chalk.bold),
};

type Tone = keyof typeof colors;

const statusTones: Record<string, Tone> = {
  published: 'success',
  valid: 'success',
  unchanged: 'dim',
  rendered: 'info',
  failed: 'error',
};

export function formatKeyValues(
  entries: Array<[string, string]>,
  options?: { labelWidth?: number },
): string[] {
  const width = options?.labelWidth ?? LABEL_WIDTH;
  return entries.map(([label, value]) => `${label.padEnd(width)} ${value}`);
}

export function renderNextSteps(steps: string[]): string {
  if (steps.length === 0) return '';
  return ['', 'Next steps:', ...steps.map((step) => `  ${step}`)].join('\n');
}

/** `published` -> "Published", colored by outcome. */
export function formatStatusLabel(status: string): string {
  const key = status.trim().toLowerCase();
  const label = key.replace(/_/g, ' ').replace(/\b\w/g, (char) => char.toUpperCase());
  return colors[statusTones[key] ?? 'info'](label);
}

export function renderSuccessSummary(options: {
  title: string;
  details: Array<[string, string]>;
}): string {
  return [
    colors.header(options.title),
    '-'.repeat(RULE_WIDTH),
    ...formatKeyValues(options.details),
  ].join('\n');
}
