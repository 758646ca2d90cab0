import { ConfigurationError, PrivilegeError, isRoot, requireRoot } from '@streamwire/shared';
import { type ConfigOverrides, loadNamingConfig } from '../config.js';
import { type GenerateReport, generateUnits } from '../generator.js';
import { type InitSystem, createSystemctl } from '../system/init-system.js';

export interface CommandDeps {
  initSystem: InitSystem;
  isPrivileged: () => boolean;
  env: NodeJS.ProcessEnv;
  log: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export function createDefaultDeps(): CommandDeps {
  return {
    initSystem: createSystemctl(),
    isPrivileged: isRoot,
    env: process.env,
    log: console.log,
    warn: console.warn,
    error: console.error,
  };
}

export interface GenerateCommandResult {
  exitCode: 0 | 1;
  report?: GenerateReport;
}

/**
 * Check privileges, load the config and run the generator.
 * Exit code 1 only for privilege or configuration failures.
 */
export function cmdGenerate(
  overrides: ConfigOverrides,
  dryRun: boolean,
  deps: CommandDeps = createDefaultDeps(),
): GenerateCommandResult {
  try {
    if (!dryRun) {
      requireRoot('streamwire-units generate', deps.isPrivileged);
    }
    const config = loadNamingConfig(overrides, deps.env);
    const report = generateUnits(config, deps, { dryRun });
    return { exitCode: 0, report };
  } catch (err: unknown) {
    if (err instanceof PrivilegeError || err instanceof ConfigurationError) {
      deps.error(`Error: ${err.message}`);
      return { exitCode: 1 };
    }
    throw err;
  }
}
