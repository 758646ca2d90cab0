#!/usr/bin/env node

import { ConfigurationError } from '@streamwire/shared';
import { cmdGenerate } from './cli/generate.js';
import { cmdStatus } from './cli/status.js';
import { type ConfigOverrides, loadNamingConfig } from './config.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: streamwire-units <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  generate  Write a parser unit for every stream-quality unit (requires root)');
  console.log('  status    Show the parser unit of every stream-quality unit');
  console.log('  config    Print the effective configuration as JSON');
  console.log('');
  console.log('Options:');
  console.log('  --config <file>        JSON config file (or STREAMWIRE_CONFIG)');
  console.log('  --unit-dir <dir>       Directory holding base and generated units');
  console.log('  --data-dir <dir>       Directory holding per-stream CSV files');
  console.log('  --log-dir <dir>        Directory for parser log files');
  console.log('  --fixed-suffix <name>  Use <id>_<name>.csv instead of discovering the CSV');
  console.log('  --no-activate          Write units without enabling or starting them');
  console.log('  --dry-run              Print units instead of writing them (generate only)');
}

function parseOverrides(): ConfigOverrides {
  const overrides: ConfigOverrides = {
    configPath: getArg('--config'),
    unitDir: getArg('--unit-dir'),
    dataDir: getArg('--data-dir'),
    logDir: getArg('--log-dir'),
    fixedSuffix: getArg('--fixed-suffix'),
  };
  if (hasFlag('--no-activate')) overrides.activate = false;
  return overrides;
}

function cmdConfig(): void {
  try {
    console.log(JSON.stringify(loadNamingConfig(parseOverrides()), null, 2));
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

if (command === '--version' || command === '-v' || hasFlag('--version')) {
  console.log(VERSION);
  process.exit(0);
}

switch (command) {
  case 'generate':
    process.exitCode = cmdGenerate(parseOverrides(), hasFlag('--dry-run')).exitCode;
    break;
  case 'status':
    process.exitCode = cmdStatus(parseOverrides());
    break;
  case 'config':
    cmdConfig();
    break;
  default:
    printUsage();
    if (command && command !== '--help' && command !== '-h') {
      console.error(`\nUnknown command: ${command}`);
      process.exit(1);
    }
    break;
}
