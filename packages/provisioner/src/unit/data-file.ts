import fs from 'node:fs';
import path from 'node:path';
import type { NamingConfig } from '@streamwire/shared';
import { dataFilePattern, fixedDataFilePath, matchesGlob } from '../naming.js';

export type DataFileResolution =
  | { found: true; path: string }
  | { found: false; pattern: string; matches: string[] };

function isRegularFile(filePath: string): boolean {
  return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Regular files in the data dir matching `<instanceId>*<dataSuffix>`, sorted.
 * Symlinks count when their target is a regular file.
 */
export function findDataFiles(
  instanceId: string,
  config: Pick<NamingConfig, 'dataDir' | 'dataSuffix'>,
): string[] {
  return fs
    .readdirSync(config.dataDir)
    .filter((name) => matchesGlob(name, instanceId, config.dataSuffix))
    .map((name) => path.join(config.dataDir, name))
    .filter(isRegularFile)
    .sort();
}

/**
 * Locate the data file of an instance according to the configured strategy.
 * The fixed-suffix strategy never fails: its path is not checked.
 */
export function resolveDataFile(
  instanceId: string,
  config: Pick<NamingConfig, 'dataDir' | 'dataSuffix' | 'dataFile'>,
): DataFileResolution {
  if (config.dataFile.kind === 'fixed-suffix') {
    return { found: true, path: fixedDataFilePath(instanceId, config.dataFile.suffix, config) };
  }

  const matches = findDataFiles(instanceId, config);
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) {
    return { found: true, path: only };
  }
  return { found: false, pattern: dataFilePattern(instanceId, config), matches };
}
