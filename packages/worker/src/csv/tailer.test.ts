import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CsvTailer } from './tailer.js';

let dir: string;
let input: string;
let output: string;

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function readOutput(): unknown[] {
  return fs
    .readFileSync(output, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line) as unknown);
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamwire-tail-'));
  input = path.join(dir, 'stream701_prod.csv');
  output = path.join(dir, 'stream701_prod.jsonl');
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('CsvTailer', () => {
  it('converts the rows present on the first poll', () => {
    fs.writeFileSync(
      input,
      'timestamp,fps,stream\n2024-05-01T08:00:00Z,30,stream701\n2024-05-01T08:00:05Z,29.5,stream701\n',
    );
    const tailer = new CsvTailer({ input, output, logger: createLogger() });

    expect(tailer.poll()).toEqual({ written: 2, skipped: 0 });
    expect(readOutput()).toEqual([
      { timestamp: '2024-05-01T08:00:00.000000Z', fps: 30, stream: 'stream701' },
      { timestamp: '2024-05-01T08:00:05.000000Z', fps: 29.5, stream: 'stream701' },
    ]);
  });

  it('only appends rows added since the last poll', () => {
    fs.writeFileSync(input, 'timestamp,fps\n2024-05-01T08:00:00Z,30\n');
    const tailer = new CsvTailer({ input, output, logger: createLogger() });
    tailer.poll();

    fs.appendFileSync(input, '2024-05-01T08:00:05Z,31\n');
    expect(tailer.poll()).toEqual({ written: 1, skipped: 0 });
    expect(tailer.poll()).toEqual({ written: 0, skipped: 0 });

    expect(readOutput()).toEqual([
      { timestamp: '2024-05-01T08:00:00.000000Z', fps: 30 },
      { timestamp: '2024-05-01T08:00:05.000000Z', fps: 31 },
    ]);
    expect(tailer.rowsConsumed).toBe(2);
  });

  it('leaves a partly written last line for the next poll', () => {
    fs.writeFileSync(input, 'timestamp,fps\n2024-05-01T08:00:00Z,30\n2024-05-01T08:00');
    const tailer = new CsvTailer({ input, output, logger: createLogger() });

    expect(tailer.poll()).toEqual({ written: 1, skipped: 0 });
    fs.appendFileSync(input, ':05Z,31\n');
    expect(tailer.poll()).toEqual({ written: 1, skipped: 0 });
    expect(readOutput()).toHaveLength(2);
  });

  it('skips bad rows once and counts them as consumed', () => {
    fs.writeFileSync(input, 'timestamp,fps\nnot-a-time,30\n2024-05-01T08:00:00Z,30\n');
    const logger = createLogger();
    const tailer = new CsvTailer({ input, output, logger });

    expect(tailer.poll()).toEqual({ written: 1, skipped: 1 });
    expect(logger.warn).toHaveBeenCalledWith(
      { row: 1 },
      "Could not parse timestamp 'not-a-time', skipping row",
    );
    expect(tailer.poll()).toEqual({ written: 0, skipped: 0 });
    expect(readOutput()).toHaveLength(1);
  });

  it('waits for a missing input file', () => {
    const logger = createLogger();
    const tailer = new CsvTailer({ input, output, logger });

    expect(tailer.poll()).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith({ input }, 'Input file not found, will retry');
    expect(fs.existsSync(output)).toBe(false);
  });

  it('starts over when the input shrinks', () => {
    fs.writeFileSync(input, 'timestamp,fps\n2024-05-01T08:00:00Z,30\n2024-05-01T08:00:05Z,31\n');
    const tailer = new CsvTailer({ input, output, logger: createLogger() });
    tailer.poll();

    fs.writeFileSync(input, 'timestamp,fps\n2024-05-02T00:00:00Z,12\n');
    expect(tailer.poll()).toEqual({ written: 1, skipped: 0 });
    expect(readOutput()[2]).toEqual({ timestamp: '2024-05-02T00:00:00.000000Z', fps: 12 });
  });

  it('polls on an interval and logs poll errors instead of throwing', () => {
    vi.useFakeTimers();
    fs.mkdirSync(input);
    const logger = createLogger();
    const tailer = new CsvTailer({ input, output, logger });

    tailer.start(5_000);
    expect(logger.error).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(10_000);
    expect(logger.error).toHaveBeenCalledTimes(3);

    tailer.stop();
    vi.advanceTimersByTime(10_000);
    expect(logger.error).toHaveBeenCalledTimes(3);
  });
});
