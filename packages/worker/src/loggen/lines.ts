/** Indexed by `seed % 6`: INFO is three times as likely as the others */
export const LEVELS = ['INFO', 'INFO', 'INFO', 'WARN', 'ERROR', 'DEBUG'] as const;
export type Level = (typeof LEVELS)[number];

/** Indexed by `seed % 9` */
export const MESSAGES = [
  'User authenticated successfully',
  'Page loaded in 250ms',
  'Configuration saved to profile',
  'Ad-blocker detected and disabled feature X',
  'Failed to fetch resource: /api/v2/user/settings',
  'GPU process crashed, restarting.',
  'High memory usage detected: 1.5GB',
  "Processing user input for form field 'username'",
  'Cache cleared for site: example.com',
] as const;

function pick<T>(items: readonly T[], seed: number): T {
  const item = items[Math.abs(seed) % items.length];
  if (item === undefined) throw new RangeError(`No item for seed ${seed}`);
  return item;
}

export function levelFor(seed: number): Level {
  return pick(LEVELS, seed);
}

export function messageFor(seed: number): string {
  return pick(MESSAGES, seed);
}

/** Pause before the next line: 1 to 5 seconds */
export function delayFor(seed: number): number {
  return ((Math.abs(seed) % 5) + 1) * 1000;
}

/** `2024-05-01T08:00:00Z`, second precision */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export interface LineInput {
  date: Date;
  seed: number;
  processName: string;
  pid: number;
}

export function formatLogLine({ date, seed, processName, pid }: LineInput): string {
  return `${formatTimestamp(date)} [${levelFor(seed)}] - ${processName}[${pid}]: ${messageFor(seed)}`;
}
