import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type CommandDeps, cmdGenerate } from './generate.js';

let root: string;
let unitDir: string;
let dataDir: string;

function createDeps(overrides: Partial<CommandDeps> = {}): CommandDeps {
  return {
    initSystem: { activate: vi.fn(), reload: vi.fn(), status: vi.fn(() => 'active') },
    isPrivileged: () => true,
    env: {},
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    ...overrides,
  };
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'streamwire-cli-'));
  unitDir = path.join(root, 'system');
  dataDir = path.join(root, 'csvs');
  fs.mkdirSync(unitDir);
  fs.mkdirSync(dataDir);
  fs.writeFileSync(path.join(unitDir, 'checking_stream_quality_stream701.service'), '');
  fs.writeFileSync(path.join(dataDir, 'stream701_prod.csv'), '');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('cmdGenerate', () => {
  it('exits 1 without privileges, writing nothing and calling nothing', () => {
    const deps = createDeps({ isPrivileged: () => false });

    const result = cmdGenerate({ unitDir, dataDir }, false, deps);

    expect(result.exitCode).toBe(1);
    expect(deps.error).toHaveBeenCalledWith(
      'Error: streamwire-units generate must be run as root. Please use sudo.',
    );
    expect(fs.readdirSync(unitDir)).toEqual(['checking_stream_quality_stream701.service']);
    expect(deps.initSystem.activate).not.toHaveBeenCalled();
    expect(deps.initSystem.reload).not.toHaveBeenCalled();
  });

  it('exits 0 after generating', () => {
    const deps = createDeps();

    const result = cmdGenerate({ unitDir, dataDir }, false, deps);

    expect(result.exitCode).toBe(0);
    expect(result.report?.outcomes).toHaveLength(1);
    expect(fs.existsSync(path.join(unitDir, 'csv-parser_stream701.service'))).toBe(true);
  });

  it('exits 0 when an instance is skipped', () => {
    fs.writeFileSync(path.join(dataDir, 'stream701_other.csv'), '');
    const deps = createDeps();

    const result = cmdGenerate({ unitDir, dataDir }, false, deps);

    expect(result.exitCode).toBe(0);
    expect(result.report?.outcomes[0]?.status).toBe('skipped');
    expect(deps.warn).toHaveBeenCalledWith(
      "Warning: Could not find a unique data file for 'stream701'.",
    );
  });

  it('exits 1 when a directory is missing', () => {
    const deps = createDeps();
    const missing = path.join(root, 'nope');

    const result = cmdGenerate({ unitDir: missing, dataDir }, false, deps);

    expect(result.exitCode).toBe(1);
    expect(deps.error).toHaveBeenCalledWith(`Error: Unit directory not found at ${missing}`);
  });

  it('exits 1 on an invalid config file', () => {
    const file = path.join(root, 'bad.json');
    fs.writeFileSync(file, '"nope"');
    const deps = createDeps({ env: { STREAMWIRE_CONFIG: file } });

    expect(cmdGenerate({ unitDir, dataDir }, false, deps).exitCode).toBe(1);
  });

  it('allows a dry run without privileges', () => {
    const deps = createDeps({ isPrivileged: () => false });

    const result = cmdGenerate({ unitDir, dataDir }, true, deps);

    expect(result.exitCode).toBe(0);
    expect(fs.readdirSync(unitDir)).toEqual(['checking_stream_quality_stream701.service']);
    expect(deps.initSystem.reload).not.toHaveBeenCalled();
  });
});
