/**
 * PCB Toolbench - Logger
 *
 * Winston-based structured logging. Entries that belong to a run carry its
 * panel and run id, which are printed as a tag ahead of the message and also
 * copied to a separate runs.log in production.
 */

import os from 'os';
import path from 'path';
import winston from 'winston';
import { config } from '../config.js';
import type { PanelId } from '../types/run.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/** Run ids are uuids; the first block is enough to tell runs apart in a log */
const RUN_TAG_ID_LENGTH = 8;

interface LogMetadata {
  requestId?: string;
  panel?: PanelId | string;
  runId?: string | null;
  service?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * `[bom 1a2b3c4d]`, `[kicad]`, or nothing for entries outside a panel.
 */
export function runTag(panel: unknown, runId: unknown): string {
  if (typeof panel !== 'string') return '';
  if (typeof runId !== 'string' || !runId) return ` [${panel}]`;
  return ` [${panel} ${runId.slice(0, RUN_TAG_ID_LENGTH)}]`;
}

export function formatLogLine(info: { [key: string]: unknown }): string {
  const { level, message, timestamp: time, stack, panel, runId, ...metadata } = info;
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = typeof stack === 'string' && stack ? `\n${stack}` : '';
  return `${String(time)} [${String(level)}]${runTag(panel, runId)} ${String(message)}${meta}${stackTrace}`;
}

const logFormat = printf((info) => formatLogLine(info));

const runEntriesOnly = winston.format((info) => (typeof info.runId === 'string' ? info : false));

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize({ all: config.nodeEnv === 'development' }),
        logFormat
      ),
    }),
  ],
});

// Add file transports in production
if (config.nodeEnv === 'production') {
  const logDir = path.join(os.homedir(), '.pcb-toolbench', 'logs');
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'runs.log'),
      format: combine(runEntriesOnly(), logFormat),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 10,
    })
  );
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
  /** Child logger whose entries are tagged with one run */
  forRun(panel: PanelId, runId: string): Logger;
}

function createLogger(defaultMetadata: LogMetadata = {}): Logger {
  const write = (level: 'debug' | 'info' | 'warn', message: string, metadata?: LogMetadata): void => {
    logger.log(level, message, { ...defaultMetadata, ...metadata });
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),

    error(message: string, error?: Error, metadata?: LogMetadata): void {
      logger.error(message, {
        ...defaultMetadata,
        ...metadata,
        error: error?.message,
        stack: error?.stack,
      });
    },

    child(childMetadata: LogMetadata): Logger {
      return createLogger({ ...defaultMetadata, ...childMetadata });
    },

    forRun(panel: PanelId, runId: string): Logger {
      return createLogger({ ...defaultMetadata, panel, runId });
    },
  };
}

export const log = createLogger();
