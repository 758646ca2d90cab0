#!/usr/bin/env node

import { createLogger } from '@streamwire/shared';
import { CSV_PARSER_USAGE, parseCsvParserArgs } from './csv/args.js';
import { CsvTailer } from './csv/tailer.js';

const parsed = parseCsvParserArgs(process.argv.slice(2));
if (!parsed.ok) {
  console.error(CSV_PARSER_USAGE);
  console.error(`Error: ${parsed.error}`);
  process.exit(1);
}

const { input, output, intervalSeconds, logFile } = parsed.args;
const logger = createLogger({ name: 'csv-parser', file: logFile });
const tailer = new CsvTailer({ input, output, logger });

const shutdown = (signal: string) => {
  tailer.stop();
  logger.info({ signal }, 'Monitoring stopped');
  logger.flush(() => process.exit(0));
};
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

tailer.start(intervalSeconds * 1000);
