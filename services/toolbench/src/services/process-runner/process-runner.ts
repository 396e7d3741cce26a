/**
 * Process Runner
 *
 * Launches a collaborator script or executable and streams its merged
 * stdout/stderr to a sink line by line while it runs.
 */

import { spawn, type ChildProcess } from 'child_process';
import type { Readable } from 'stream';
import { LaunchError, errnoOf } from '../../utils/errors.js';
import { log as logger } from '../../utils/logger.js';
import type { OutputStream } from '../../types/run.js';

export interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

export interface OutputLine {
  stream: OutputStream;
  text: string;
}

export type ProcessResult =
  | { kind: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null; durationMs: number }
  | { kind: 'launch-failed'; error: LaunchError; durationMs: number };

export interface ProcessSink {
  onLine(line: OutputLine): void;
  onExit(result: ProcessResult): void;
}

export interface ProcessHandle {
  pid?: number;
  /** Resolves once the process has exited or failed to launch. Never rejects. */
  completion: Promise<ProcessResult>;
}

export interface ProcessRunner {
  start(request: ProcessRequest, sink: ProcessSink): ProcessHandle;
}

const runnerLogger = logger.child({ service: 'process-runner' });

/**
 * Splits a text stream into lines, holding back the trailing partial line.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split('\n');
    this.buffer = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  flush(): string[] {
    if (!this.buffer) return [];
    const rest = stripCarriageReturn(this.buffer);
    this.buffer = '';
    return [rest];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Runner backed by child_process.spawn (no shell).
 */
export class SpawnProcessRunner implements ProcessRunner {
  start(request: ProcessRequest, sink: ProcessSink): ProcessHandle {
    const startTime = Date.now();
    let settled = false;
    let spawned = false;
    let launchFailure: Error | null = null;

    let resolveCompletion: (result: ProcessResult) => void = () => undefined;
    const completion = new Promise<ProcessResult>((resolve) => {
      resolveCompletion = resolve;
    });

    const settle = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      try {
        sink.onExit(result);
      } finally {
        resolveCompletion(result);
      }
    };

    const launchFailed = (error: Error): void => {
      const launchError = new LaunchError(request.command, error.message, errnoOf(error), {
        operation: 'spawn',
        cwd: request.cwd,
      });
      runnerLogger.warn('Process failed to launch', {
        command: request.command,
        cwd: request.cwd,
        errno: launchError.errno,
        error: error.message,
      });
      settle({ kind: 'launch-failed', error: launchError, durationMs: Date.now() - startTime });
    };

    const env = {
      ...process.env,
      ...request.env,
      PYTHONUNBUFFERED: '1',
      PYTHONIOENCODING: 'utf-8',
    };

    let proc: ChildProcess;
    try {
      proc = spawn(request.command, request.args, {
        cwd: request.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      // Synchronous spawn failures (e.g. invalid arguments)
      launchFailed(error instanceof Error ? error : new Error(String(error)));
      return { completion };
    }

    runnerLogger.info('Process started', {
      command: request.command,
      args: request.args,
      cwd: request.cwd,
      pid: proc.pid,
    });

    const splitters: Record<OutputStream, LineSplitter> = {
      stdout: new LineSplitter(),
      stderr: new LineSplitter(),
    };

    const deliver = (stream: OutputStream, lines: string[]): void => {
      for (const text of lines) {
        sink.onLine({ stream, text });
      }
    };

    const attach = (stream: OutputStream, readable: Readable | null): void => {
      if (!readable) return;
      readable.setEncoding('utf8');
      readable.on('data', (chunk: string) => {
        deliver(stream, splitters[stream].push(chunk));
      });
    };

    attach('stdout', proc.stdout);
    attach('stderr', proc.stderr);

    proc.on('spawn', () => {
      spawned = true;
    });

    proc.on('error', (error: Error) => {
      if (!spawned) {
        launchFailure = error;
        launchFailed(error);
        return;
      }
      runnerLogger.warn('Process error after launch', { command: request.command, error: error.message });
    });

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      if (!spawned) {
        launchFailed(launchFailure ?? new Error(`spawn ${request.command} failed`));
        return;
      }

      deliver('stdout', splitters.stdout.flush());
      deliver('stderr', splitters.stderr.flush());

      const durationMs = Date.now() - startTime;
      runnerLogger.info('Process exited', { command: request.command, exitCode: code, signal, duration: durationMs });
      settle({ kind: 'exited', exitCode: code, signal, durationMs });
    });

    return { pid: proc.pid, completion };
  }
}
