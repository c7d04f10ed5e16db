const EPOCH_MS_THRESHOLD = 10_000_000_000;

const DATE_TIME_PATTERN =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// RFC 2822 as found in RSS pubDate: "Mon, 01 Jan 2024 08:30:00 GMT"
const RFC_2822_PATTERN = /^(?:[a-z]{3},?\s+)?\d{1,2}\s+[a-z]{3}\s+\d{4}(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?(?:\s+(?:[a-z]{1,5}|[+-]\d{4}))?$/i;

function fromEpoch(value: number): string | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  const ms = value > EPOCH_MS_THRESHOLD ? value : value * 1000;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function fromDateTime(match: RegExpExecArray): string | null {
  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.slice(0, 3).padEnd(3, '0'));

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(utc);
  // Date.UTC rolls 2024-02-31 over into March; reject instead.
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }

  return new Date(utc - offsetMinutes(zone) * 60_000).toISOString();
}

/**
 * Parse a date-like value into an ISO-8601 UTC instant.
 *
 * Accepts unix seconds or milliseconds (number or digit string), ISO-8601 and
 * `YYYY-MM-DD HH:MM[:SS]` / `YYYY/MM/DD` forms, and RFC 2822 dates. A value
 * without a zone is read as UTC. Year-less forms such as `MM-DD HH:MM` cannot
 * name an instant and return null.
 */
export function toIsoTimestamp(value: unknown): string | null {
  if (typeof value === 'number') return fromEpoch(value);
  if (typeof value !== 'string') return null;

  const raw = value.trim();
  if (!raw) return null;

  if (/^\d{9,13}$/.test(raw)) return fromEpoch(Number(raw));

  const match = DATE_TIME_PATTERN.exec(raw);
  if (match) return fromDateTime(match);

  if (RFC_2822_PATTERN.test(raw)) {
    const ms = Date.parse(raw);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  return null;
}

