/**
 * Day-granularity calendar dates as ISO "YYYY-MM-DD" strings.
 *
 * All arithmetic happens on UTC midnights so that DST shifts in the host
 * timezone can never skip or repeat a day. ISO strings sort lexicographically
 * in chronological order, so plain string comparison orders them.
 */

export type CalendarDate = string;

const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 86_400_000;

/** Weekday names, indexed by weekday number (0 = Monday … 6 = Sunday). */
export const WEEKDAY_NAMES = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

/** Return the UTC midnight for a date, or null if the string is not a real calendar day. */
function toUtc(value: string): Date | null {
  const match = CALENDAR_DATE_RE.exec(value);
  if (!match) return null;

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  // Date.UTC would read years 0..99 as 1900..1999; setUTCFullYear does not.
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);

  // 2024-02-30 rolls over into March; reject anything that moved.
  if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
    return null;
  }
  return utc;
}

function requireUtc(date: CalendarDate): Date {
  const utc = toUtc(date);
  if (!utc) {
    throw new RangeError(`Invalid calendar date: ${date}`);
  }
  return utc;
}

/** Earliest date a four-digit year can spell. */
export const MIN_CALENDAR_DATE: CalendarDate = "0000-01-01";

const MIN_UTC_MS = requireUtc(MIN_CALENDAR_DATE).getTime();

/** Whole days between MIN_CALENDAR_DATE and `date`. */
export function daysSinceMin(date: CalendarDate): number {
  return Math.round((requireUtc(date).getTime() - MIN_UTC_MS) / MS_PER_DAY);
}

export function isCalendarDate(value: string): boolean {
  return toUtc(value) !== null;
}

/** Validate a "YYYY-MM-DD" string. Throws RangeError for malformed or impossible dates. */
export function parseCalendarDate(value: string): CalendarDate {
  requireUtc(value);
  return value;
}

/** Format the UTC calendar day of a Date. */
export function formatCalendarDate(d: Date): CalendarDate {
  const year = d.getUTCFullYear();
  if (!(year >= 0 && year <= 9999)) {
    throw new RangeError(`Year ${year} is outside 0000..9999`);
  }
  const y = String(year).padStart(4, "0");
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

/** Today's date on the host's local clock. */
export function calendarDateFromLocal(now: Date = new Date()): CalendarDate {
  const y = String(now.getFullYear()).padStart(4, "0");
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(new Date(requireUtc(date).getTime() + days * MS_PER_DAY));
}

export function addWeeks(date: CalendarDate, weeks: number): CalendarDate {
  return addDays(date, weeks * 7);
}

/** Weekday number with Monday = 0 and Sunday = 6. */
export function weekdayOf(date: CalendarDate): number {
  return (requireUtc(date).getUTCDay() + 6) % 7;
}

export function dayOfMonth(date: CalendarDate): number {
  return requireUtc(date).getUTCDate();
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Sorted copy, oldest first. */
export function sortCalendarDates(dates: Iterable<CalendarDate>): CalendarDate[] {
  return [...dates].sort(compareCalendarDates);
}

/**
 * Parse a weekday given as a number ("0".."6", Monday = 0), a full English
 * name ("monday") or its three-letter form ("mon"). Case-insensitive.
 */
export function parseWeekday(value: string): number | null {
  const trimmed = value.trim().toLowerCase();
  if (/^[0-6]$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  if (trimmed.length < 3) return null;
  const index = WEEKDAY_NAMES.findIndex((name) => name === trimmed || name.slice(0, 3) === trimmed);
  return index === -1 ? null : index;
}
