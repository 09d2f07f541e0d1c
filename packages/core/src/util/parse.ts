/**
 * Lenient text-to-value parsers shared by the string format checks and the
 * coercing transformers. Each returns `undefined` when the text does not
 * parse; surrounding whitespace is ignored.
 */

const INT_RE = /^[+-]?\d+$/;
const DOUBLE_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// YYYY-MM-DD, optional time (T or space), optional fraction, optional offset
const DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

export function parseIntString(text: string): number | undefined {
  const trimmed = text.trim();
  if (!INT_RE.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

export function parseBigIntString(text: string): bigint | undefined {
  const trimmed = text.trim();
  if (!INT_RE.test(trimmed)) return undefined;
  return BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
}

export function parseDoubleString(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DOUBLE_RE.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export interface ParsedDate {
  date: Date;
  /** True when the text carried no time component. */
  dateOnly: boolean;
  /** True when the calendar fields did not roll over (e.g. `2024-02-30`). */
  exact: boolean;
}

/**
 * Parse an ISO-8601 style date or date-time. Text without an offset is read
 * as UTC so results do not depend on the host time zone.
 */
export function parseDateString(text: string): ParsedDate | undefined {
  const match = DATE_RE.exec(text.trim());
  if (!match) return undefined;
  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const ms = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;
  let time = Date.UTC(
    year,
    month,
    day,
    Number(h ?? 0),
    Number(mi ?? 0),
    Number(s ?? 0),
    ms
  );
  if (offset && offset.toUpperCase() !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const minutes =
      Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
    time -= sign * minutes * 60_000;
  }
  const date = new Date(time);
  if (Number.isNaN(date.getTime())) return undefined;
  const calendar = new Date(Date.UTC(year, month, day));
  return {
    date,
    dateOnly: h === undefined,
    exact:
      calendar.getUTCFullYear() === year &&
      calendar.getUTCMonth() === month &&
      calendar.getUTCDate() === day,
  };
}

/** `YYYY-MM-DD` of the UTC calendar day. */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
