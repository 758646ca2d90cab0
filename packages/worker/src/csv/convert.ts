/** Columns written to JSON as numbers, or null when the cell is not numeric */
export const NUMERIC_FIELDS: ReadonlySet<string> = new Set([
  'fps',
  'win_packets',
  'win_lost',
  'win_late',
  'win_dup',
  'win_loss_pct',
  'acc_packets',
  'acc_lost',
  'acc_loss_pct',
  'avg_jitter_ms',
  'bitrate_kbps',
  'rtp_in',
  'rtp_gaps',
  'rtp_ooo',
  'buf_corrupted',
  'buf_discont',
  'buf_gapflag',
  'gap_events',
  'qos_dropped',
  'late_avg_ms',
  'late_max_ms',
]);

export type CsvRow = Record<string, string | undefined>;
export type JsonRecord = Record<string, string | number | null>;

export type RowConversion =
  | { ok: true; record: JsonRecord }
  | { ok: false; reason: string };

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?(Z|[+-]\d{2}:\d{2})?$/;

function offsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const [hours = '0', minutes = '0'] = zone.slice(1).split(':');
  return sign * (Number(hours) * 60 + Number(minutes));
}

/**
 * Parse an ISO 8601 timestamp and re-emit it in UTC with microseconds,
 * e.g. `2024-05-01T08:00:00.250000Z`. Naive timestamps are taken as UTC.
 * Returns undefined for anything else, including impossible dates.
 */
export function normalizeTimestamp(value: string): string | undefined {
  const m = ISO_TIMESTAMP.exec(value.trim());
  if (!m) return undefined;

  const field = (i: number): number => Number(m[i] ?? '0');
  const year = field(1);
  const month = field(2);
  const day = field(3);
  const hour = field(4);
  const minute = field(5);
  const second = field(6);
  const fraction = (m[7] ?? '').padEnd(6, '0');

  const local = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(local);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  const utc = new Date(local - offsetMinutes(m[8]) * 60_000);
  return `${utc.toISOString().slice(0, 19)}.${fraction}Z`;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Decimal notation only; hex, binary and octal literals are not numbers here. */
export function toNumberOrNull(value: string | undefined): number | null {
  const trimmed = value?.trim();
  if (!trimmed || !DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** Convert one CSV row; column order is kept. */
export function convertRow(row: CsvRow): RowConversion {
  const rawTimestamp = row.timestamp;
  if (rawTimestamp === undefined) {
    return { ok: false, reason: "'timestamp' column not found" };
  }
  const timestamp = normalizeTimestamp(rawTimestamp);
  if (timestamp === undefined) {
    return { ok: false, reason: `Could not parse timestamp '${rawTimestamp}'` };
  }

  const record: JsonRecord = {};
  for (const [key, value] of Object.entries(row)) {
    if (key === 'timestamp') {
      record[key] = timestamp;
    } else if (NUMERIC_FIELDS.has(key)) {
      record[key] = toNumberOrNull(value);
    } else {
      record[key] = value ?? null;
    }
  }
  return { ok: true, record };
}
