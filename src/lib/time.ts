/**
 * Civil-time helpers
 *
 * Instants are always compared as epoch milliseconds. The operating timezone
 * only decides which calendar day a sweep covers and how a time reads in a
 * notification body.
 */

const partsFormatterCache = new Map<string, Intl.DateTimeFormat>();

const getPartsFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = partsFormatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    partsFormatterCache.set(timeZone, formatter);
  }
  return formatter;
};

const getPart = (parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string => {
  const part = parts.find((p) => p.type === type);
  if (!part) {
    throw new Error(`Missing ${type} when formatting date`);
  }
  return part.value;
};

/**
 * Calendar date of `instant` in `timeZone` as yyyy-MM-dd
 *
 * @example
 * toDayKey(new Date('2026-03-29T23:30:00Z'), 'Europe/London') // '2026-03-30'
 */
export function toDayKey(instant: Date, timeZone: string): string {
  const parts = getPartsFormatter(timeZone).formatToParts(instant);
  return `${getPart(parts, 'year')}-${getPart(parts, 'month')}-${getPart(parts, 'day')}`;
}

/**
 * Wall-clock time of `instant` in `timeZone` as HH:mm (24-hour)
 */
export function formatClockTime(instant: Date, timeZone: string): string {
  const parts = getPartsFormatter(timeZone).formatToParts(instant);
  return `${getPart(parts, 'hour')}:${getPart(parts, 'minute')}`;
}

export function toEpochSeconds(instant: Date): number {
  return Math.floor(instant.getTime() / 1000);
}

/**
 * Parse an ISO-8601 string; anything unparseable is treated as absent
 */
export function parseInstant(value: string | undefined | null): Date | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}
