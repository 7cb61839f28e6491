export type IsoTimestamp = string;

export type EventLevel = 'debug' | 'info' | 'warn' | 'error';
export type EventMode = 'headless' | 'json';

export type EventSource = 'cli' | 'engine' | 'git' | 'todoist';

export type ErrorKind =
  | 'expected'
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'conflict'
  | 'internal';

export type EventEnvelope<TType extends string, TPayload> = {
  schema: 'dev.roadmap-sync.events';
  version: '1.0.0';

  id: string;
  ts: IsoTimestamp;
  level: EventLevel;
  source: EventSource;

  runId: string;
  projectId?: string;

  mode?: EventMode;
  message?: string;

  type: TType;
  payload: TPayload;

  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
    kind?: ErrorKind;
    details?: Record<string, unknown>;
    cause?: unknown;
  };

  span?: {
    spanId: string;
    parentSpanId?: string;
    startTs?: IsoTimestamp;
    endTs?: IsoTimestamp;
    durationMs?: number;
  };
};

export type StepStatus = 'running' | 'succeeded' | 'failed' | 'skipped';

export type RunStarted = {
  runId: string;
  command: string;
  cwd: string;
  configPath?: string;
};

export type RunStep = {
  stepId: string;
  title: string;
  status: StepStatus;
  progress?: { current: number; total: number; unit?: string };
};

export type RunFinished = {
  status: 'success' | 'failed';
  durationMs: number;
  summary?: {
    outcome?: 'unchanged' | 'published' | 'rendered';
    completedTasks?: number;
    openTasks?: number;
    skippedTasks?: number;
    commit?: string;
  };
};

export type LogMessage = {
  message: string;
  details?: Record<string, unknown>;
};

export type GitCommand = {
  cmd: string;
  args: string[];
  cwd: string;
  exitCode?: number;
  durationMs?: number;
  stdout?: string;
  stderr?: string;
};

export type TodoistRequest = {
  method: 'GET' | 'POST';
  path: string;
  status?: number;
  attempt: number;
  durationMs?: number;
};

export type TodoistRetry = {
  method: 'GET' | 'POST';
  path: string;
  status: number;
  attempt: number;
  delayMs: number;
};

export type DocumentWritten = {
  path: string;
  bytes: number;
  changed: boolean;
};

export type DocumentPublished = {
  path: string;
  commit: string;
  remoteRef: string;
  summary: string;
};

export type Event =
  | EventEnvelope<'run.started', RunStarted>
  | EventEnvelope<'run.step', RunStep>
  | EventEnvelope<'run.finished', RunFinished>
  | EventEnvelope<'log.message', LogMessage>
  | EventEnvelope<
      'git.command_started',
      Omit<GitCommand, 'exitCode' | 'durationMs' | 'stdout' | 'stderr'>
    >
  | EventEnvelope<'git.command_finished', GitCommand>
  | EventEnvelope<'todoist.request', TodoistRequest>
  | EventEnvelope<'todoist.retry', TodoistRetry>
  | EventEnvelope<'document.written', DocumentWritten>
  | EventEnvelope<'document.published', DocumentPublished>;

export type JsonError = {
  code: string;
  message: string;
  kind: ErrorKind;
  details?: Record<string, unknown>;
  nextSteps?: string[];
};
