#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { PrivilegeError, createLogger, requireRoot } from '@streamwire/shared';
import { LogGenerator } from './loggen/generator.js';

const DEFAULT_FILE = '/root/process-monitor/app.log';
const DEFAULT_PROCESS_NAME = 'chrome_process';

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

const file = getArg('--file') ?? DEFAULT_FILE;
const processName = getArg('--process-name') ?? DEFAULT_PROCESS_NAME;
const dir = path.dirname(file);

try {
  requireRoot(`streamwire-loggen (writing to ${dir})`);
} catch (err: unknown) {
  if (err instanceof PrivilegeError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

if (!fs.existsSync(dir)) {
  console.log(`Directory ${dir} does not exist. Creating it...`);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Error: Failed to create directory: ${msg}`);
    process.exit(1);
  }
}

const logger = createLogger({ name: 'loggen' });
const generator = new LogGenerator({ file, processName, logger });

const shutdown = () => {
  generator.stop();
  logger.info('Log generator stopped');
  logger.flush(() => process.exit(0));
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

logger.info({ file }, 'Starting log generator');
generator.start();
