import crypto from 'node:crypto';
import fs from 'node:fs';
import type { Logger } from '@streamwire/shared';
import { delayFor, formatLogLine } from './lines.js';

export interface LogGeneratorOptions {
  file: string;
  processName: string;
  logger: Pick<Logger, 'info' | 'error'>;
  pid?: number;
  /** Non-negative integer seed for one line */
  seed?: () => number;
  now?: () => Date;
}

export interface Tick {
  line: string;
  delayMs: number;
}

/**
 * Appends synthetic application log lines to a file at random intervals,
 * to exercise a log-shipping pipeline end to end.
 */
export class LogGenerator {
  private readonly options: Required<LogGeneratorOptions>;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: LogGeneratorOptions) {
    this.options = {
      pid: process.pid,
      seed: () => crypto.randomInt(0, 1_000_000_000),
      now: () => new Date(),
      ...options,
    };
  }

  /** Write one line and return it with the pause before the next. */
  tick(): Tick {
    const { file, processName, pid, seed, now, logger } = this.options;
    const value = seed();
    const line = formatLogLine({ date: now(), seed: value, processName, pid });
    fs.appendFileSync(file, `${line}\n`, 'utf-8');
    logger.info({ line }, 'Appended');
    return { line, delayMs: delayFor(value) };
  }

  start(): void {
    if (this.timer) return;
    this.schedule(0);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      let next = 1000;
      try {
        next = this.tick().delayMs;
      } catch (err: unknown) {
        this.options.logger.error({ err }, 'Append failed, will retry');
      }
      this.schedule(next);
    }, delayMs);
  }
}
