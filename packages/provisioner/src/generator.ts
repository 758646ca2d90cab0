import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError, type NamingConfig } from '@streamwire/shared';
import {
  baseUnitName,
  deriveInstanceId,
  deriveOutputPath,
  generatedUnitName,
  logFilePath,
  matchesGlob,
} from './naming.js';
import { type InitSystem, describeExecError } from './system/init-system.js';
import { resolveDataFile } from './unit/data-file.js';
import { renderParserUnit } from './unit/template.js';

export type SkipReason =
  | { kind: 'malformed-instance-id' }
  | { kind: 'ambiguous-data-file'; pattern: string; matches: string[] }
  | { kind: 'write-failed'; error: string };

export type ActivationResult =
  | { status: 'activated' }
  | { status: 'not-requested' }
  | { status: 'failed'; error: string };

export type InstanceOutcome =
  | {
      status: 'generated';
      baseUnit: string;
      instanceId: string;
      unit: string;
      unitPath: string;
      dataFile: string;
      outputFile: string;
      activation: ActivationResult;
    }
  | { status: 'skipped'; baseUnit: string; instanceId?: string; reason: SkipReason };

export type ReloadResult =
  | { status: 'reloaded' }
  | { status: 'not-needed' }
  | { status: 'failed'; error: string };

export interface GenerateReport {
  pattern: string;
  baseUnits: string[];
  outcomes: InstanceOutcome[];
  reload: ReloadResult;
  summary: string;
}

export interface GenerateDeps {
  initSystem: InitSystem;
  log: (msg: string) => void;
  warn: (msg: string) => void;
}

export interface GenerateOptions {
  /** Print rendered units instead of writing them; no init-system calls */
  dryRun?: boolean;
}

export function isDirectory(dir: string): boolean {
  return fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/** Throws ConfigurationError when a directory the run depends on is missing. */
export function checkDirectories(config: NamingConfig): void {
  if (!isDirectory(config.unitDir)) {
    throw new ConfigurationError(`Unit directory not found at ${config.unitDir}`);
  }
  if (config.dataFile.kind === 'discover' && !isDirectory(config.dataDir)) {
    throw new ConfigurationError(`Data directory not found at ${config.dataDir}`);
  }
}

/** Base unit file names in the unit dir matching `<basePrefix>*<unitSuffix>`, sorted. */
export function listBaseUnits(config: NamingConfig): string[] {
  return fs
    .readdirSync(config.unitDir)
    .filter((name) => matchesGlob(name, config.basePrefix, config.unitSuffix))
    .filter((name) => {
      const stat = fs.statSync(path.join(config.unitDir, name), { throwIfNoEntry: false });
      return stat?.isFile() ?? false;
    })
    .sort();
}

function processBaseUnit(
  fileName: string,
  config: NamingConfig,
  deps: GenerateDeps,
  options: GenerateOptions,
): InstanceOutcome {
  const { log, warn, initSystem } = deps;

  const instanceId = deriveInstanceId(fileName, config.basePrefix, config.unitSuffix);
  if (instanceId === undefined) {
    warn(`Warning: No instance id in '${fileName}'. Skipping.`);
    return { status: 'skipped', baseUnit: fileName, reason: { kind: 'malformed-instance-id' } };
  }
  log(`Found base unit for: ${instanceId}`);

  const resolution = resolveDataFile(instanceId, config);
  if (!resolution.found) {
    warn(`Warning: Could not find a unique data file for '${instanceId}'.`);
    warn(`         Searched for '${resolution.pattern}', found ${resolution.matches.length}.`);
    warn('         Skipping unit creation for this instance.');
    return {
      status: 'skipped',
      baseUnit: fileName,
      instanceId,
      reason: {
        kind: 'ambiguous-data-file',
        pattern: resolution.pattern,
        matches: resolution.matches,
      },
    };
  }
  const dataFile = resolution.path;
  log(`Using data file: ${dataFile}`);

  const outputFile = deriveOutputPath(dataFile, config.dataSuffix, config.outputSuffix);
  const baseUnit = baseUnitName(instanceId, config);
  const unit = generatedUnitName(instanceId, config);
  const unitPath = path.join(config.unitDir, unit);

  const content = renderParserUnit({
    instanceId,
    baseUnit,
    executablePath: config.executablePath,
    workerScriptPath: config.workerScriptPath,
    dataFile,
    outputFile,
    logFile: logFilePath(instanceId, config),
    workingDirectory: config.workingDirectory,
    unbufferedEnv: config.unbufferedEnv,
  });

  const generated = {
    status: 'generated',
    baseUnit: fileName,
    instanceId,
    unit,
    unitPath,
    dataFile,
    outputFile,
  } as const;

  if (options.dryRun) {
    log(`Would write ${unitPath}:`);
    log(content);
    return { ...generated, activation: { status: 'not-requested' } };
  }

  log(`Generating new unit file: ${unit}`);
  try {
    fs.writeFileSync(unitPath, content, 'utf-8');
  } catch (err: unknown) {
    const error = err instanceof Error ? err.message : String(err);
    warn(`Warning: Could not write ${unitPath}: ${error}`);
    warn('         Skipping unit creation for this instance.');
    return {
      status: 'skipped',
      baseUnit: fileName,
      instanceId,
      reason: { kind: 'write-failed', error },
    };
  }
  log(`Successfully created ${unit}.`);

  if (!config.activate) {
    return { ...generated, activation: { status: 'not-requested' } };
  }

  log(`Enabling and starting ${unit}...`);
  try {
    initSystem.activate(unit);
    return { ...generated, activation: { status: 'activated' } };
  } catch (err: unknown) {
    const error = describeExecError(err);
    warn(`Failed to enable ${unit}: ${error}`);
    return { ...generated, activation: { status: 'failed', error } };
  }
}

export function summarize(outcomes: InstanceOutcome[], reload: ReloadResult): string {
  let generated = 0;
  let skipped = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'skipped') {
      skipped++;
      continue;
    }
    generated++;
    if (outcome.activation.status === 'failed') failed++;
  }
  const reloadNote = reload.status === 'failed' ? ' Daemon reload failed.' : '';
  return `Generated ${generated} of ${outcomes.length} parser unit(s): ${skipped} skipped, ${failed} activation failure(s).${reloadNote}`;
}

/**
 * Write one parser unit per qualifying base unit, activate each when
 * configured, then reload the init system once.
 *
 * Throws ConfigurationError before any side effect when a directory is
 * missing. Per-instance problems are reported as outcomes and never stop the
 * loop.
 */
export function generateUnits(
  config: NamingConfig,
  deps: GenerateDeps,
  options: GenerateOptions = {},
): GenerateReport {
  const { log, warn, initSystem } = deps;
  checkDirectories(config);

  const pattern = `${config.basePrefix}*${config.unitSuffix}`;
  log(`Searching for base units matching '${pattern}' in ${config.unitDir}...`);

  const baseUnits = listBaseUnits(config);
  if (baseUnits.length === 0) {
    const summary = `No units found matching the pattern '${pattern}'.`;
    log(summary);
    return { pattern, baseUnits, outcomes: [], reload: { status: 'not-needed' }, summary };
  }

  const outcomes: InstanceOutcome[] = [];
  for (const fileName of baseUnits) {
    outcomes.push(processBaseUnit(fileName, config, deps, options));
    log('---');
  }

  let reload: ReloadResult = { status: 'not-needed' };
  if (!options.dryRun) {
    log('Reloading systemd daemon to apply changes...');
    try {
      initSystem.reload();
      reload = { status: 'reloaded' };
    } catch (err: unknown) {
      const error = describeExecError(err);
      warn(`Daemon reload failed: ${error}`);
      reload = { status: 'failed', error };
    }
  }

  const summary = summarize(outcomes, reload);
  log(summary);
  return { pattern, baseUnits, outcomes, reload, summary };
}
