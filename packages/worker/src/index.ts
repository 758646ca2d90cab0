export { CsvTailer } from './csv/tailer.js';
export type { CsvTailerOptions, PollResult, TailerLogger } from './csv/tailer.js';
export { NUMERIC_FIELDS, convertRow, normalizeTimestamp, toNumberOrNull } from './csv/convert.js';
export type { CsvRow, JsonRecord, RowConversion } from './csv/convert.js';
export { parseCsvParserArgs } from './csv/args.js';
export type { CsvParserArgs } from './csv/args.js';
export { LogGenerator } from './loggen/generator.js';
export type { LogGeneratorOptions, Tick } from './loggen/generator.js';
export { formatLogLine, levelFor, messageFor } from './loggen/lines.js';
