import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '@streamwire/shared';
import { type ConfigOverrides, loadNamingConfig } from '../config.js';
import { isDirectory, listBaseUnits } from '../generator.js';
import { deriveInstanceId, generatedUnitName } from '../naming.js';
import { type CommandDeps, createDefaultDeps } from './generate.js';

export interface UnitStatus {
  baseUnit: string;
  instanceId?: string;
  unit?: string;
  installed: boolean;
  state: string;
}

/** Parser unit state for every base unit in the unit dir. */
export function collectStatus(
  overrides: ConfigOverrides,
  deps: Pick<CommandDeps, 'initSystem' | 'env'>,
): UnitStatus[] {
  const config = loadNamingConfig(overrides, deps.env);
  if (!isDirectory(config.unitDir)) {
    throw new ConfigurationError(`Unit directory not found at ${config.unitDir}`);
  }

  return listBaseUnits(config).map((baseUnit) => {
    const instanceId = deriveInstanceId(baseUnit, config.basePrefix, config.unitSuffix);
    if (instanceId === undefined) {
      return { baseUnit, installed: false, state: 'malformed' };
    }
    const unit = generatedUnitName(instanceId, config);
    const installed = fs.existsSync(path.join(config.unitDir, unit));
    const state = installed ? deps.initSystem.status(unit) : 'not-installed';
    return { baseUnit, instanceId, unit, installed, state };
  });
}

export function cmdStatus(
  overrides: ConfigOverrides,
  deps: CommandDeps = createDefaultDeps(),
): 0 | 1 {
  let statuses: UnitStatus[];
  try {
    statuses = collectStatus(overrides, deps);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      deps.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (statuses.length === 0) {
    deps.log('No base units found.');
    return 0;
  }

  const width = Math.max(...statuses.map((s) => (s.instanceId ?? s.baseUnit).length));
  for (const s of statuses) {
    const label = (s.instanceId ?? s.baseUnit).padEnd(width);
    deps.log(`  ${label}  ${s.unit ?? '-'}  ${s.state}`);
  }
  return 0;
}
