import fs from 'node:fs';
import type { Logger } from '@streamwire/shared';
import { parse } from 'csv-parse/sync';
import { type CsvRow, convertRow } from './convert.js';

export type TailerLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export interface CsvTailerOptions {
  input: string;
  output: string;
  logger: TailerLogger;
}

export interface PollResult {
  written: number;
  skipped: number;
}

function toRows(records: unknown): CsvRow[] {
  if (!Array.isArray(records)) return [];
  const rows: CsvRow[] = [];
  for (const record of records) {
    if (typeof record !== 'object' || record === null) continue;
    const row: CsvRow = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = typeof value === 'string' ? value : undefined;
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Follows a growing CSV file and appends every new row to a JSON Lines file.
 * The whole file is re-read on each poll; a trailing line without newline is
 * left for the next poll.
 */
export class CsvTailer {
  private readonly input: string;
  private readonly output: string;
  private readonly logger: TailerLogger;
  private consumed = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: CsvTailerOptions) {
    this.input = options.input;
    this.output = options.output;
    this.logger = options.logger;
  }

  /** Rows read so far, including skipped ones */
  get rowsConsumed(): number {
    return this.consumed;
  }

  /** Read new rows once. Returns undefined while the input file is missing. */
  poll(): PollResult | undefined {
    let content: string;
    try {
      content = fs.readFileSync(this.input, 'utf-8');
    } catch (err: unknown) {
      if ((err as { code?: string }).code === 'ENOENT') {
        this.logger.warn({ input: this.input }, 'Input file not found, will retry');
        return undefined;
      }
      throw err;
    }

    const complete = content.slice(0, content.lastIndexOf('\n') + 1);
    const rows = toRows(
      parse(complete, {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
        bom: true,
      }),
    );

    if (rows.length < this.consumed) {
      this.logger.warn(
        { input: this.input, rows: rows.length, consumed: this.consumed },
        'Input file shrank, reading from the start',
      );
      this.consumed = 0;
    }

    const fresh = rows.slice(this.consumed);
    if (fresh.length === 0) {
      this.logger.debug('No new lines detected');
      return { written: 0, skipped: 0 };
    }

    const lines: string[] = [];
    let skipped = 0;
    fresh.forEach((row, i) => {
      const converted = convertRow(row);
      if (converted.ok) {
        lines.push(JSON.stringify(converted.record));
      } else {
        skipped++;
        this.logger.warn({ row: this.consumed + i + 1 }, `${converted.reason}, skipping row`);
      }
    });

    if (lines.length > 0) {
      fs.appendFileSync(this.output, `${lines.join('\n')}\n`, 'utf-8');
    }
    this.consumed += fresh.length;
    this.logger.info(
      { written: lines.length, skipped, total: this.consumed },
      `Processed ${lines.length} new line(s)`,
    );
    return { written: lines.length, skipped };
  }

  /** Poll now and then every `intervalMs`; poll errors are logged, not thrown. */
  start(intervalMs: number): void {
    if (this.timer) return;
    this.logger.info({ input: this.input, output: this.output }, 'Starting to monitor input');
    this.safePoll();
    this.timer = setInterval(() => this.safePoll(), intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private safePoll(): void {
    try {
      this.poll();
    } catch (err: unknown) {
      this.logger.error({ err }, 'Poll failed, will retry');
    }
  }
}
