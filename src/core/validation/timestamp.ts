/**
 * ISO-8601 date-time with a mandatory zone designator (`Z`, `±HH:MM` or
 * `±HHMM`). Seconds are optional; fractions beyond milliseconds are truncated.
 */
const ZONED_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(?:(Z)|([+-])(\d{2}):?(\d{2}))$/;

/**
 * Parse a zoned timestamp and return it in UTC `toISOString()` form,
 * or null when the value is not a zoned ISO-8601 date-time on a real
 * calendar date.
 */
export function normalizeZonedTimestamp(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = ZONED_TIMESTAMP.exec(value);
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, fraction, zulu, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = s ? Number(s) : 0;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  date.setUTCHours(hours, minutes, seconds, millis);

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(oh);
    const offsetMins = Number(om);
    if (offsetHours > 23 || offsetMins > 59) {
      return null;
    }
    offsetMinutes = (offsetHours * 60 + offsetMins) * (sign === '-' ? -1 : 1);
  }

  const utc = new Date(date.getTime() - offsetMinutes * 60_000);
  if (Number.isNaN(utc.getTime())) {
    return null;
  }
  return utc.toISOString();
}
