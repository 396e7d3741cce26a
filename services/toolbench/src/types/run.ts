/**
 * Run messages and panel views shared by the server and the browser.
 *
 * The server publishes RunMessages; every consumer folds them with
 * applyRunMessage, so the server's view and each browser's view agree.
 * This module must stay free of Node.js imports.
 */

export type PanelId = 'bom' | 'kicad';

export const PANEL_IDS: readonly PanelId[] = ['bom', 'kicad'] as const;

export type RunState = 'idle' | 'running';

export type OutputStream = 'stdout' | 'stderr';

export interface RunRequest {
  panel: PanelId;
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

export type RunOutcome =
  | { status: 'success'; exitCode: 0 }
  | { status: 'failed'; exitCode: number | null; signal: string | null }
  | { status: 'launch-failed'; message: string; code?: string };

export interface RunStartedMessage {
  kind: 'started';
  panel: PanelId;
  runId: string;
  command: string;
  args: string[];
  cwd: string;
  startedAt: string;
}

export interface RunLineMessage {
  kind: 'line';
  panel: PanelId;
  runId: string;
  seq: number;
  stream: OutputStream;
  text: string;
}

export interface RunFinishedMessage {
  kind: 'finished';
  panel: PanelId;
  runId: string;
  outcome: RunOutcome;
  statusLine: string;
  finishedAt: string;
  durationMs: number;
}

/** Log cleared while idle */
export interface RunLogClearedMessage {
  kind: 'cleared';
  panel: PanelId;
  runId: string | null;
}

export type RunMessage = RunStartedMessage | RunLineMessage | RunFinishedMessage | RunLogClearedMessage;

export interface LogEntry {
  id: string;
  kind: 'command' | 'output' | 'status';
  text: string;
  stream?: OutputStream;
  /** Set on status entries */
  ok?: boolean;
}

export interface PanelRunView {
  panel: PanelId;
  state: RunState;
  runId: string | null;
  log: LogEntry[];
  lastOutcome: RunOutcome | null;
}

export function isPanelId(value: unknown): value is PanelId {
  return value === 'bom' || value === 'kicad';
}

export function createPanelRunView(panel: PanelId): PanelRunView {
  return { panel, state: 'idle', runId: null, log: [], lastOutcome: null };
}

/**
 * Quote an argument for display only. Runs never go through a shell.
 */
function displayArg(arg: string): string {
  return /^[\w@%+=:,./\\-]+$/.test(arg) ? arg : `"${arg.replace(/"/g, '\\"')}"`;
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map(displayArg).join(' ');
}

export function formatStatusLine(command: string, outcome: RunOutcome): string {
  switch (outcome.status) {
    case 'success':
      return '✓ Finished successfully (exit code 0)';
    case 'failed':
      if (outcome.exitCode === null && outcome.signal) {
        return `✗ Terminated by signal ${outcome.signal}`;
      }
      return `✗ Failed with exit code ${outcome.exitCode ?? 'unknown'}`;
    case 'launch-failed':
      return `✗ Could not launch ${command}: ${outcome.message}`;
  }
}

function appendBounded(log: LogEntry[], entry: LogEntry, limit: number): LogEntry[] {
  const next = [...log, entry];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

/**
 * Fold one message into a panel view. Messages for another panel or for a
 * stale run leave the view untouched.
 */
export function applyRunMessage(
  view: PanelRunView,
  message: RunMessage,
  historyLimit: number = Number.POSITIVE_INFINITY
): PanelRunView {
  if (message.panel !== view.panel) return view;

  switch (message.kind) {
    case 'started':
      return {
        ...view,
        state: 'running',
        runId: message.runId,
        lastOutcome: null,
        log: [
          {
            id: `${message.runId}:cmd`,
            kind: 'command',
            text: `$ ${formatCommandLine(message.command, message.args)}`,
          },
        ],
      };

    case 'line':
      if (message.runId !== view.runId) return view;
      return {
        ...view,
        log: appendBounded(
          view.log,
          {
            id: `${message.runId}:${message.seq}`,
            kind: 'output',
            text: message.text,
            stream: message.stream,
          },
          historyLimit
        ),
      };

    case 'finished':
      if (message.runId !== view.runId) return view;
      return {
        ...view,
        state: 'idle',
        lastOutcome: message.outcome,
        log: appendBounded(
          view.log,
          {
            id: `${message.runId}:status`,
            kind: 'status',
            text: message.statusLine,
            ok: message.outcome.status === 'success',
          },
          historyLimit
        ),
      };

    case 'cleared':
      return { ...view, log: [] };
  }
}
