/**
 * Calendar helpers for deadline resolution.
 * Calendar days are represented as midnight UTC.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T/;

/**
 * Truncates a date to midnight UTC of the same day.
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Adds calendar months, clamping to the last day of the target month
 * (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonthsUtc(date: Date, months: number): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + months;
  const lastDayOfTarget = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(date.getUTCDate(), lastDayOfTarget);
  return new Date(Date.UTC(year, month, day));
}

/**
 * Whole calendar months from `from` to `to`, rounded up.
 * A deadline 10 days away counts as 1 month; exactly 6 calendar months away is 6.
 * Returns 0 when `to` is not after `from`.
 *
 * @param from - Start date (truncated to its UTC day)
 * @param to - End date (truncated to its UTC day)
 */
export function calendarMonthsUntil(from: Date, to: Date): number {
  const start = startOfUtcDay(from);
  const end = startOfUtcDay(to);
  if (end.getTime() <= start.getTime()) {
    return 0;
  }

  let whole =
    (end.getUTCFullYear() - start.getUTCFullYear()) * 12 +
    (end.getUTCMonth() - start.getUTCMonth());
  if (addMonthsUtc(start, whole).getTime() > end.getTime()) {
    whole -= 1;
  }

  return addMonthsUtc(start, whole).getTime() === end.getTime() ? whole : whole + 1;
}

function utcCalendarDate(year: string, month: string, day: string): Date | null {
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  // Reject overflowed dates such as 2026-02-31
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return null;
  }
  return date;
}

/**
 * True for a bare `YYYY-MM-DD` string, which names a calendar day rather than an instant.
 */
export function isIsoDateOnly(value: string): boolean {
  return ISO_DATE_PATTERN.test(value.trim());
}

/**
 * The calendar day a deadline names, as midnight UTC.
 * An ISO timestamp keeps the date written in it, whatever its offset
 * (`2026-11-01T00:00:00+05:30` is 2026-11-01); other values use the UTC day of `instant`.
 */
export function calendarDayOf(value: string | Date, instant: Date): Date {
  if (typeof value === "string") {
    const match = ISO_TIMESTAMP_DATE_PATTERN.exec(value.trim());
    if (match) {
      const [, year, month, day] = match;
      const written = utcCalendarDate(year, month, day);
      if (written) {
        return written;
      }
    }
  }
  return startOfUtcDay(instant);
}

/**
 * Parses a deadline given as a `Date` or a date string.
 * `YYYY-MM-DD` strings are read as UTC calendar dates; other strings go through `Date.parse`.
 *
 * @returns The parsed date, or null when the value is not a valid date
 */
export function parseDate(value: string | Date): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (match) {
    const [, year, month, day] = match;
    return utcCalendarDate(year, month, day);
  }

  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

/**
 * Formats a date as `YYYY-MM-DD` (UTC).
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
