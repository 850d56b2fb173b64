/**
 * mailsweep — Logging
 *
 * pino logger emitting one JSON line per event with an ISO timestamp and an
 * upper-case level label (INFO, WARNING, ERROR).
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const LEVEL_LABELS: Record<string, string> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Append log lines to this file in addition to stdout */
  file?: string;
  /** Write only to this destination (tests) */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';

  const destination = options.destination ?? pino.multistream([
    { level, stream: process.stdout },
    ...(options.file
      ? [{ level, stream: pino.destination({ dest: options.file, mkdir: true, sync: true }) }]
      : []),
  ]);

  return pino(
    {
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: LEVEL_LABELS[label] ?? label.toUpperCase() }),
      },
    },
    destination,
  );
}
