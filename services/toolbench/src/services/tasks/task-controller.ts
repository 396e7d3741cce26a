/**
 * Background Task Controller
 *
 * Owns the Idle/Running state of each panel. A run is started off the
 * caller's path; every state change and output line is published on the
 * RunChannel, and the controller folds the same messages into its own view.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  PANEL_IDS,
  applyRunMessage,
  createPanelRunView,
  formatStatusLine,
  type PanelId,
  type PanelRunView,
  type RunMessage,
  type RunOutcome,
  type RunRequest,
} from '../../types/run.js';
import { InternalError, RunInProgressError } from '../../utils/errors.js';
import { log, type Logger } from '../../utils/logger.js';
import type { ProcessResult, ProcessRunner } from '../process-runner/index.js';
import type { RunChannel } from './run-channel.js';

export type RunDispatch =
  | { accepted: true; runId: string; request: RunRequest; completion: Promise<RunOutcome> }
  | { accepted: false; reason: 'busy'; runId: string | null };

export interface TaskControllerOptions {
  /** Entries kept per panel log; oldest are dropped first */
  historyLimit?: number;
  idFactory?: () => string;
  logger?: Logger;
}

export function toRunOutcome(result: ProcessResult): RunOutcome {
  if (result.kind === 'launch-failed') {
    return { status: 'launch-failed', message: result.error.message, code: result.error.errno };
  }
  if (result.exitCode === 0) {
    return { status: 'success', exitCode: 0 };
  }
  return { status: 'failed', exitCode: result.exitCode, signal: result.signal };
}

export class BackgroundTaskController {
  private readonly views = new Map<PanelId, PanelRunView>();
  private readonly historyLimit: number;
  private readonly idFactory: () => string;
  private readonly logger: Logger;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly channel: RunChannel,
    options: TaskControllerOptions = {}
  ) {
    this.historyLimit = options.historyLimit ?? Number.POSITIVE_INFINITY;
    this.idFactory = options.idFactory ?? (() => uuidv4());
    this.logger = (options.logger ?? log).child({ service: 'task-controller' });
    for (const panel of PANEL_IDS) {
      this.views.set(panel, createPanelRunView(panel));
    }
  }

  getView(panel: PanelId): PanelRunView {
    return this.views.get(panel) ?? createPanelRunView(panel);
  }

  getViews(): PanelRunView[] {
    return PANEL_IDS.map((panel) => this.getView(panel));
  }

  /**
   * Start a run for a panel. While the panel is running the builder is not
   * called and nothing is started. Errors thrown by the builder propagate
   * and leave the panel idle.
   */
  run(panel: PanelId, buildRequest: () => RunRequest): RunDispatch {
    const current = this.getView(panel);
    if (current.state === 'running') {
      this.logger.info('Run rejected, panel busy', { panel, runId: current.runId ?? undefined });
      return { accepted: false, reason: 'busy', runId: current.runId };
    }

    const request = buildRequest();
    if (request.panel !== panel) {
      throw new InternalError(`Request built for ${request.panel} submitted to ${panel}`, {
        operation: 'run',
        panel,
      });
    }

    const runId = this.idFactory();
    const runLogger = this.logger.forRun(panel, runId);
    let seq = 0;

    let resolveOutcome: (outcome: RunOutcome) => void = () => undefined;
    const completion = new Promise<RunOutcome>((resolve) => {
      resolveOutcome = resolve;
    });

    this.publish({
      kind: 'started',
      panel,
      runId,
      command: request.command,
      args: request.args,
      cwd: request.cwd,
      startedAt: new Date().toISOString(),
    });
    runLogger.info('Run started', { command: request.command, cwd: request.cwd });

    const handle = this.runner.start(
      { command: request.command, args: request.args, cwd: request.cwd, env: request.env },
      {
        onLine: (line) => {
          seq += 1;
          this.publish({ kind: 'line', panel, runId, seq, stream: line.stream, text: line.text });
        },
        onExit: (result) => {
          const outcome = toRunOutcome(result);
          this.publish({
            kind: 'finished',
            panel,
            runId,
            outcome,
            statusLine: formatStatusLine(request.command, outcome),
            finishedAt: new Date().toISOString(),
            durationMs: result.durationMs,
          });
          runLogger.info('Run finished', { status: outcome.status, lines: seq, duration: result.durationMs });
          resolveOutcome(outcome);
        },
      }
    );
    if (handle.pid !== undefined) {
      runLogger.debug('Run process attached', { pid: handle.pid });
    }

    return { accepted: true, runId, request, completion };
  }

  /**
   * Empty a panel's log. Refused while a run is in progress.
   */
  clearLog(panel: PanelId): PanelRunView {
    const view = this.getView(panel);
    if (view.state === 'running') {
      throw new RunInProgressError(panel, { operation: 'clearLog' });
    }
    this.publish({ kind: 'cleared', panel, runId: view.runId });
    return this.getView(panel);
  }

  private publish(message: RunMessage): void {
    this.views.set(message.panel, applyRunMessage(this.getView(message.panel), message, this.historyLimit));
    this.channel.publish(message);
  }
}
