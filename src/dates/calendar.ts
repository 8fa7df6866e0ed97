// src/dates/calendar.ts

/** A proleptic Gregorian calendar date with no time or zone. */
export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

const MS_PER_DAY = 86_400_000;

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1];
}

export function monthNames(): readonly string[] {
  return MONTH_NAMES;
}

export function weekdayNames(): readonly string[] {
  return WEEKDAY_NAMES;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Returns a reason string when the date is impossible, null when it is valid. */
export function checkDate(date: CalendarDate): string | null {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    return `year ${year} is out of range`;
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return 'month must be in 1..12';
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    return 'day is out of range for month';
  }
  return null;
}

// Date.UTC maps years 0-99 onto 1900-1999, so go through setUTCFullYear.
function toEpochMs(date: CalendarDate): number {
  const d = new Date(0);
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  return d.getTime();
}

function fromEpochMs(ms: number): CalendarDate {
  const d = new Date(ms);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/**
 * Add a whole number of days. Throws RangeError when the result leaves
 * years 1..9999.
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const ms = toEpochMs(date) + days * MS_PER_DAY;
  // Past about 1e8 days Date itself is invalid and every field reads NaN
  const result = fromEpochMs(ms);
  if (!Number.isFinite(result.year) || result.year < MIN_YEAR || result.year > MAX_YEAR) {
    throw new RangeError('date value out of range');
  }
  return result;
}

/** Signed number of days from `a` to `b`. */
export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return Math.round((toEpochMs(b) - toEpochMs(a)) / MS_PER_DAY);
}

/** 1 for January 1st. */
export function dayOfYear(date: CalendarDate): number {
  return daysBetween({ year: date.year, month: 1, day: 1 }, date) + 1;
}

/** 0 = Monday ... 6 = Sunday. */
export function weekday(date: CalendarDate): number {
  return (new Date(toEpochMs(date)).getUTCDay() + 6) % 7;
}
