const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const MS_PER_MINUTE = 60 * 1000;

/**
 * Returns the number of days in a month (1-12) of a given year.
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Parses an RFC3339 timestamp (`2020-07-04T12:00:00Z`,
 * `2020-07-04T14:00:00.250+02:00`) into epoch milliseconds.
 *
 * The offset is required. Calendar fields are range-checked, so
 * `2021-02-29T00:00:00Z` is rejected rather than rolled over into March.
 * Fractional seconds are kept to microsecond precision, so the result may
 * have a fractional part; digits beyond the sixth are truncated.
 *
 * @returns epoch milliseconds, or `undefined` if the value is not a valid timestamp
 *
 * @example
 * ```typescript
 * parseTimestamp("2020-07-04T12:00:00+02:00"); // 1593856800000
 * parseTimestamp("2020-07-04 12:00"); // undefined
 * ```
 */
export function parseTimestamp(value: string): number | undefined {
  const match = RFC3339_PATTERN.exec(value);
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s, fraction, zulu, sign, offH, offM] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);

  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;

  const micros = fraction ? Number(fraction.slice(0, 6).padEnd(6, "0")) : 0;

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(offH);
    const offsetMins = Number(offM);
    if (offsetHours > 23 || offsetMins > 59) return undefined;
    offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  // Date.UTC maps years 0-99 onto 1900-1999, so set the fields explicitly.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);
  return date.getTime() + micros / 1000 - offsetMinutes * MS_PER_MINUTE;
}

/**
 * Returns true if the value is a valid RFC3339 timestamp.
 */
export function isTimestamp(value: string): boolean {
  return parseTimestamp(value) !== undefined;
}
