import chalk from 'chalk';

import { isEnvFlagSet } from '../../utils/env';
import { formatDurationClock, formatDurationShort } from '../../utils/time';
import type { Event } from '../schema';

const SPINNER_FRAMES = ['-', '\\', '|', '/'];
const SPINNER_INTERVAL_MS = 80;

type StepState = {
  title: string;
  startedAtMs: number;
};

type Output = {
  isTTY?: boolean;
  write: (chunk: string) => unknown;
};

class Spinner {
  private timer: ReturnType<typeof setInterval> | undefined;
  private frameIndex = 0;
  private lineLength = 0;
  private text = '';

  constructor(private readonly stdout: Output) {}

  start(text: string): void {
    if (!this.stdout.isTTY) return;
    this.stop();
    this.text = text;
    this.render();
    this.timer = setInterval(() => this.render(), SPINNER_INTERVAL_MS);
    this.timer.unref?.();
  }

  update(text: string): void {
    if (!this.timer) return;
    this.text = text;
  }

  stop(finalLine?: string): void {
    if (!this.stdout.isTTY) return;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (finalLine !== undefined) {
      const clear = ' '.repeat(Math.max(this.lineLength, finalLine.length));
      this.stdout.write(`\r${clear}\r${finalLine}\n`);
    } else if (this.lineLength > 0) {
      this.stdout.write(`\r${' '.repeat(this.lineLength)}\r`);
    }
    this.lineLength = 0;
    this.text = '';
  }

  isActive(): boolean {
    return Boolean(this.timer);
  }

  getText(): string {
    return this.text;
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
    this.frameIndex += 1;
    const line = `${frame} ${this.text}`;
    this.stdout.write(`\r${line}`);
    this.lineLength = line.length;
  }
}

export class HeadlessRenderer {
  private stepStates = new Map<string, StepState>();
  private spinner: Spinner;
  private activeStepId: string | null = null;
  private runStartedAtMs: number | null = null;
  private readonly stdout: Output;
  private readonly stderr: Output;

  constructor(streams?: { stdout?: Output; stderr?: Output }) {
    this.stdout = streams?.stdout ?? process.stdout;
    this.stderr = streams?.stderr ?? process.stderr;
    this.spinner = new Spinner(this.stdout);
  }

  render(event: Event): void {
    switch (event.type) {
      case 'log.message': {
        if (event.level === 'debug' && !isEnvFlagSet('ROADMAP_DEBUG')) {
          return;
        }
        const message = event.message ?? event.payload.message;
        if (event.level === 'error') {
          this.printLine(chalk.red(message), 'stderr');
          return;
        }
        if (event.level === 'warn') {
          this.printLine(chalk.yellow(message), 'stderr');
          return;
        }
        this.printLine(event.level === 'debug' ? chalk.dim(message) : message);
        return;
      }
      case 'run.started':
        this.setRunStart(event.ts);
        this.printLine(chalk.dim(`Starting ${event.payload.command} in ${event.payload.cwd}`));
        return;
      case 'run.step':
        this.renderStep(event);
        return;
      case 'todoist.retry':
        this.printLine(
          chalk.yellow(
            `Todoist ${event.payload.method} ${event.payload.path} returned ${event.payload.status}, retrying in ${formatDurationShort(event.payload.delayMs)}`,
          ),
          'stderr',
        );
        return;
      case 'document.written':
        this.printLine(
          event.payload.changed
            ? `Wrote ${event.payload.path} (${event.payload.bytes} bytes)`
            : `${event.payload.path} is up to date`,
        );
        return;
      case 'document.published':
        this.printLine(
          `Published ${event.payload.path} as ${event.payload.commit.slice(0, 7)} (${event.payload.summary})`,
        );
        return;
      case 'run.finished':
        this.spinner.stop();
        this.printLine(
          chalk.dim(`Run ${event.payload.status} (${formatDurationShort(event.payload.durationMs)})`),
        );
        return;
      case 'git.command_started':
      case 'git.command_finished':
      case 'todoist.request':
        if (isEnvFlagSet('ROADMAP_DEBUG') && event.message) {
          this.printLine(chalk.dim(event.message));
        }
        return;
    }
  }

  private renderStep(event: Extract<Event, { type: 'run.step' }>): void {
    const { stepId, title, status, progress } = event.payload;
    if (status === 'running') {
      const known = this.stepStates.get(stepId);
      const lineText = progress
        ? `${title}... ${progress.current}/${progress.total}${progress.unit ? ` ${progress.unit}` : ''}`
        : `${title}...`;
      if (known) {
        // Progress update for a step that is already on screen.
        if (this.stdout.isTTY) {
          this.spinner.update(lineText);
        }
        return;
      }
      this.stepStates.set(stepId, { title, startedAtMs: Date.now() });
      if (this.activeStepId && this.activeStepId !== stepId) {
        this.spinner.stop();
      }
      this.activeStepId = stepId;
      if (this.stdout.isTTY) {
        this.spinner.start(lineText);
      } else {
        this.printLine(lineText);
      }
      return;
    }

    const state = this.stepStates.get(stepId);
    const durationMs = state ? Date.now() - state.startedAtMs : undefined;
    const durationText = durationMs !== undefined ? ` (${formatDurationShort(durationMs)})` : '';
    const suffix =
      status === 'succeeded'
        ? chalk.green(`done${durationText}`)
        : status === 'failed'
          ? chalk.red('failed')
          : status;
    const line = `${title}... ${suffix}`;

    if (this.activeStepId === stepId && this.spinner.isActive()) {
      this.spinner.stop(line);
    } else {
      this.printLine(line);
    }
    this.stepStates.delete(stepId);
    if (this.activeStepId === stepId) {
      this.activeStepId = null;
    }
  }

  private printLine(line: string, stream: 'stdout' | 'stderr' = 'stdout'): void {
    const hadSpinner = this.spinner.isActive();
    const spinnerText = this.spinner.getText();
    if (hadSpinner) {
      this.spinner.stop();
    }

    const withPrefix = this.stdout.isTTY ? line : `${this.linePrefix()}${line}`;
    if (stream === 'stderr') {
      this.stderr.write(`${withPrefix}\n`);
    } else {
      this.stdout.write(`${withPrefix}\n`);
    }

    if (hadSpinner && spinnerText) {
      this.spinner.start(spinnerText);
    }
  }

  private linePrefix(): string {
    if (!this.runStartedAtMs) {
      this.runStartedAtMs = Date.now();
    }
    return `[${formatDurationClock(Date.now() - this.runStartedAtMs)}] `;
  }

  private setRunStart(ts: string): void {
    const parsed = Date.parse(ts);
    this.runStartedAtMs = Number.isNaN(parsed) ? Date.now() : parsed;
  }
}
