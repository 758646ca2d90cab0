import pino from 'pino';
import { LOG_SYNC_ENV } from './types/common.js';

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Bound to every line as `service` */
  name: string;
  /** Append to this file instead of stdout; parent directories are created */
  file?: string;
  level?: string;
  /** Write synchronously; defaults to `STREAMWIRE_LOG_SYNC=1` */
  sync?: boolean;
}

/**
 * Structured JSON logger for the long-running workers.
 * LOG_LEVEL overrides the default `info` level.
 */
export function createLogger(options: LoggerOptions): Logger {
  const sync = options.sync ?? process.env[LOG_SYNC_ENV] === '1';
  const destination = pino.destination({
    dest: options.file ?? 1,
    sync,
    mkdir: options.file !== undefined,
  });

  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      base: { service: options.name, pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
