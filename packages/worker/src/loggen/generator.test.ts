import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LogGenerator } from './generator.js';

let dir: string;
let file: string;

function createGenerator(seeds: number[]) {
  const logger = { info: vi.fn(), error: vi.fn() };
  let i = 0;
  const generator = new LogGenerator({
    file,
    processName: 'chrome_process',
    logger,
    pid: 100,
    seed: () => seeds[i++ % seeds.length] ?? 0,
    now: () => new Date('2024-05-01T08:00:00Z'),
  });
  return { generator, logger };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamwire-loggen-'));
  file = path.join(dir, 'app.log');
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('LogGenerator', () => {
  it('appends one line per tick and echoes it', () => {
    const { generator, logger } = createGenerator([3]);

    const tick = generator.tick();

    const line =
      '2024-05-01T08:00:00Z [WARN] - chrome_process[100]: Ad-blocker detected and disabled feature X';
    expect(tick).toEqual({ line, delayMs: 4000 });
    expect(fs.readFileSync(file, 'utf-8')).toBe(`${line}\n`);
    expect(logger.info).toHaveBeenCalledWith({ line }, 'Appended');
  });

  it('keeps appending on the seed-derived schedule until stopped', () => {
    vi.useFakeTimers();
    // delays: seed 0 -> 1s, seed 1 -> 2s
    const { generator } = createGenerator([0, 1]);

    generator.start();
    vi.advanceTimersByTime(0);
    expect(fs.readFileSync(file, 'utf-8').split('\n')).toHaveLength(2);
    vi.advanceTimersByTime(1000);
    vi.advanceTimersByTime(2000);
    expect(fs.readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(3);

    generator.stop();
    vi.advanceTimersByTime(10_000);
    expect(fs.readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(3);
  });

  it('logs append failures and keeps going', () => {
    vi.useFakeTimers();
    fs.mkdirSync(file);
    const { generator, logger } = createGenerator([0]);

    generator.start();
    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(1000);
    expect(logger.error).toHaveBeenCalledTimes(2);
    generator.stop();
  });
});
