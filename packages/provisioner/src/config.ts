import fs from 'node:fs';
import { ConfigurationError, NamingConfig } from '@streamwire/shared';

/** Environment variable naming a JSON config file */
export const CONFIG_ENV = 'STREAMWIRE_CONFIG';

/** Values taken from command-line flags; they win over the config file. */
export interface ConfigOverrides {
  configPath?: string;
  unitDir?: string;
  dataDir?: string;
  logDir?: string;
  fixedSuffix?: string;
  activate?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const code = (err as { code?: string }).code;
    if (code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found at ${filePath}`);
    }
    if (code === 'EACCES') {
      throw new ConfigurationError(`Cannot read config at ${filePath}. Check file permissions.`);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Config file corrupted at ${filePath}. Expected a JSON object.`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file corrupted at ${filePath}. Expected a JSON object.`);
  }
  return parsed;
}

/**
 * Effective naming config: schema defaults, then the config file
 * (`--config` or STREAMWIRE_CONFIG), then flag overrides.
 */
export function loadNamingConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): NamingConfig {
  const configPath = overrides.configPath ?? env[CONFIG_ENV];
  const input: Record<string, unknown> = configPath ? readConfigFile(configPath) : {};

  if (overrides.unitDir !== undefined) input.unitDir = overrides.unitDir;
  if (overrides.dataDir !== undefined) input.dataDir = overrides.dataDir;
  if (overrides.logDir !== undefined) input.logDir = overrides.logDir;
  if (overrides.fixedSuffix !== undefined) {
    input.dataFile = { kind: 'fixed-suffix', suffix: overrides.fixedSuffix };
  }
  if (overrides.activate !== undefined) input.activate = overrides.activate;

  const result = NamingConfig.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
