/**
 * Record normalization helpers
 *
 * Peers report balances and timestamps as free text. These helpers turn the
 * raw fields into numbers and UTC dates, returning null when a field carries
 * nothing usable so the caller can drop that single record.
 */

/** A whole field in plain decimal notation, exponent allowed */
const PLAIN_DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

/** A leading minus stays attached so a suffixed negative is still negative */
const DECIMAL_SUBSTRING = /-?(?:\d+(?:\.\d+)?|\.\d+)/;

/**
 * Normalize a raw balance field.
 *
 * "120.5"      -> 120.5
 * "12.3 QUIL"  -> 12.3   (first decimal substring)
 * "-5 QUIL"    -> -5
 * "0x1A"       -> 0      (hex and binary literals are not decimal)
 * "abc"        -> null
 */
export function normalizeBalance(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  if (PLAIN_DECIMAL.test(trimmed)) {
    const direct = Number(trimmed);
    return Number.isFinite(direct) ? direct : null;
  }

  const match = DECIMAL_SUBSTRING.exec(trimmed);
  if (!match) {
    return null;
  }
  const extracted = Number.parseFloat(match[0]);
  return Number.isFinite(extracted) ? extracted : null;
}

/**
 * ISO-like timestamps: date, 'T' or space, time, optional fraction and zone.
 * Groups: year, month, day, hour, minute, second, fraction, zone
 */
const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * At least nine integer digits (1973 onwards in seconds), so compact dates
 * such as "20251001" are not read as epoch time
 */
const EPOCH = /^\d{9,}(?:\.\d+)?$/;

/** Epoch values below this are read as seconds, above as milliseconds */
const EPOCH_SECONDS_LIMIT = 1e11;

/**
 * Parse a raw timestamp into a UTC Date.
 *
 * Accepts:
 * - "2025-10-01T10:00:00Z", "2025-10-01T12:00:00+02:00"
 * - "2025-10-01 10:00:00.123456" (no zone -> UTC)
 * - "2025-10-01" (midnight UTC)
 * - "1759312800" (epoch seconds), "1759312800000" (epoch milliseconds)
 */
export function parseTimestamp(raw: string): Date | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  if (EPOCH.test(trimmed)) {
    const value = Number(trimmed);
    const ms = value < EPOCH_SECONDS_LIMIT ? value * 1000 : value;
    return toValidDate(Math.round(ms));
  }

  const match = ISO_LIKE.exec(trimmed);
  if (!match) {
    return null;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const hour = match[4] ? Number.parseInt(match[4], 10) : 0;
  const minute = match[5] ? Number.parseInt(match[5], 10) : 0;
  const second = match[6] ? Number.parseInt(match[6], 10) : 0;
  const millis = match[7] ? Number.parseInt(match[7].padEnd(3, '0').slice(0, 3), 10) : 0;

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > 31 ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Reject rollovers such as 2025-02-30
  if (new Date(utc).getUTCDate() !== day) {
    return null;
  }

  return toValidDate(utc - zoneOffsetMs(match[8]));
}

/**
 * Offset of the zone designator from UTC, in milliseconds
 */
function zoneOffsetMs(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes) * 60_000;
}

function toValidDate(ms: number): Date | null {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}
