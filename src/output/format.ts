import type { Label } from '../api/types.js';

export const ELLIPSIS = '…';

/**
 * Code-point length, so multi-byte characters count once. East Asian wide
 * characters and emoji occupy two terminal columns but still count as one,
 * so rows holding them can sit out of line.
 */
export function displayLength(s: string): number {
  return Array.from(s).length;
}

/**
 * Shorten `s` to at most `maxLen` code points, ending in an ellipsis when
 * anything was cut.
 */
export function truncate(s: string, maxLen: number): string {
  const chars = Array.from(s);
  if (chars.length <= maxLen) return s;
  if (maxLen <= 1) return ELLIPSIS;
  return `${chars.slice(0, maxLen - 1).join('')}${ELLIPSIS}`;
}

// RFC 3339 with Z or a numeric offset; fractional seconds optional, which
// also covers the API's fixed `.000Z` form.
const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|([+-])(\d{2}):(\d{2}))$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Epoch milliseconds for an RFC 3339 timestamp, or undefined when the shape
 * is wrong or a field is out of range (Feb 30, hour 24).
 */
function parseTimestamp(value: string): number | undefined {
  const m = TIMESTAMP_RE.exec(value);
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  const offsetHours = Number(m[9] ?? 0);
  const offsetMinutes = Number(m[10] ?? 0);
  if (offsetHours > 23 || offsetMinutes > 59) return undefined;

  // Wall-clock fields as if they were UTC; any rollover means a field was out of range.
  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, 0);
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month - 1 ||
    local.getUTCDate() !== day ||
    local.getUTCHours() !== hour ||
    local.getUTCMinutes() !== minute ||
    local.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  const sign = m[8] === '-' ? -1 : 1;
  return local.getTime() - sign * (offsetHours * 60 + offsetMinutes) * 60_000;
}

/** `YYYY-MM-DD HH:MM` in UTC, `-` when absent, the raw value (cut to 16) when unparseable. */
export function formatTime(value: string | null | undefined): string {
  if (!value) return '-';
  const ms = parseTimestamp(value);
  if (ms === undefined) return truncate(value, 16);

  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())} ${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}`;
}

export function formatDate(value: string | null | undefined): string {
  if (!value) return '-';
  return Array.from(formatTime(value)).slice(0, 10).join('');
}

export function formatBool(value: boolean | undefined): string {
  return value ? 'yes' : 'no';
}

export function formatLabels(names: readonly string[]): string {
  if (names.length === 0) return '-';
  return names.join(', ');
}

/** Label display names; unnamed labels show their colour. */
export function labelNames(labels: readonly Label[] | undefined): string[] {
  return (labels ?? []).map((l) => (l.name ? l.name : (l.color ?? '')));
}

function alignRows(rows: ReadonlyArray<readonly string[]>): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, displayLength(cell));
    });
  }

  return rows.map((row) =>
    row
      .map((cell, i) => {
        if (i === row.length - 1) return cell;
        return cell + ' '.repeat((widths[i] ?? 0) - displayLength(cell) + 2);
      })
      .join(''),
  );
}

/** Header line plus one line per row, columns separated by at least two spaces. */
export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  return alignRows([headers, ...rows])
    .map((line) => `${line}\n`)
    .join('');
}

export function formatKeyValue(pairs: ReadonlyArray<readonly [string, string]>): string {
  return alignRows(pairs)
    .map((line) => `${line}\n`)
    .join('');
}

export function formatError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return `Error: ${message}\n`;
}

/** Show the first and last four characters of a secret. */
export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  if (value.length <= 8) return '***';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}
