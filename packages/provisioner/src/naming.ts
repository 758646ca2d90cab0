import path from 'node:path';
import type { NamingConfig } from '@streamwire/shared';

/**
 * Glob `<prefix>*<suffix>` against a single file name. The wildcard may be
 * empty but prefix and suffix may not overlap.
 */
export function matchesGlob(fileName: string, prefix: string, suffix: string): boolean {
  return (
    fileName.length >= prefix.length + suffix.length &&
    fileName.startsWith(prefix) &&
    fileName.endsWith(suffix)
  );
}

/**
 * Instance id of a base unit file name, or undefined when the name does not
 * match or nothing is left between prefix and suffix.
 */
export function deriveInstanceId(
  fileName: string,
  prefix: string,
  suffix: string,
): string | undefined {
  if (!matchesGlob(fileName, prefix, suffix)) return undefined;
  const id = fileName.slice(prefix.length, fileName.length - suffix.length);
  return id.length > 0 ? id : undefined;
}

export function baseUnitName(
  instanceId: string,
  config: Pick<NamingConfig, 'basePrefix' | 'unitSuffix'>,
): string {
  return `${config.basePrefix}${instanceId}${config.unitSuffix}`;
}

export function generatedUnitName(
  instanceId: string,
  config: Pick<NamingConfig, 'newPrefix' | 'unitSuffix'>,
): string {
  return `${config.newPrefix}${instanceId}${config.unitSuffix}`;
}

/** Shell-style pattern shown to the operator when looking for data files */
export function dataFilePattern(
  instanceId: string,
  config: Pick<NamingConfig, 'dataDir' | 'dataSuffix'>,
): string {
  return path.join(config.dataDir, `${instanceId}*${config.dataSuffix}`);
}

export function fixedDataFilePath(
  instanceId: string,
  fixedSuffix: string,
  config: Pick<NamingConfig, 'dataDir' | 'dataSuffix'>,
): string {
  return path.join(config.dataDir, `${instanceId}_${fixedSuffix}${config.dataSuffix}`);
}

/** Swap the data suffix for the output suffix; appends when the suffix is absent. */
export function deriveOutputPath(dataPath: string, dataSuffix: string, outputSuffix: string): string {
  const stem = dataPath.endsWith(dataSuffix)
    ? dataPath.slice(0, dataPath.length - dataSuffix.length)
    : dataPath;
  return `${stem}${outputSuffix}`;
}

export function logFilePath(
  instanceId: string,
  config: Pick<NamingConfig, 'logDir' | 'logPrefix'>,
): string {
  return path.join(config.logDir, `${config.logPrefix}_${instanceId}.log`);
}
