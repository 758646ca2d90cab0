import { DEFAULT_POLL_INTERVAL_S } from '@streamwire/shared';

export interface CsvParserArgs {
  input: string;
  output: string;
  intervalSeconds: number;
  logFile?: string;
}

export type ParsedArgs = { ok: true; args: CsvParserArgs } | { ok: false; error: string };

const VALUE_FLAGS = new Set(['--interval', '--log-file']);

export const CSV_PARSER_USAGE =
  'Usage: streamwire-csv-parser <input.csv> <output.jsonl> [--interval <seconds>] [--log-file <path>]';

export function parseCsvParserArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) return { ok: false, error: `${arg} requires a value` };
      values.set(arg, value);
      i++;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  const [input, output, ...extra] = positional;
  if (input === undefined || output === undefined) {
    return { ok: false, error: 'input and output paths are required' };
  }
  if (extra.length > 0) {
    return { ok: false, error: `Unexpected argument: ${extra[0]}` };
  }

  const rawInterval = values.get('--interval');
  const intervalSeconds = rawInterval === undefined ? DEFAULT_POLL_INTERVAL_S : Number(rawInterval);
  if (!Number.isInteger(intervalSeconds) || intervalSeconds < 1) {
    return { ok: false, error: `--interval must be a positive integer, got '${rawInterval}'` };
  }

  return {
    ok: true,
    args: { input, output, intervalSeconds, logFile: values.get('--log-file') },
  };
}
