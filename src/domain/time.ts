import { ParseError } from './errors.js';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{2}):(\d{2})$/;

const MINUTES_PER_HOUR = 60;

/** Half-open time-of-day interval `[start, end)`, in minutes since midnight. */
export interface TimeInterval {
  readonly start: number;
  readonly end: number;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Strictly parses a `YYYY-MM-DD` calendar date.
 *
 * Returns the input unchanged when it names a real date, so the
 * canonical form stays the string callers already hold.
 */
export function parseCalendarDate(input: string): string {
  const match = DATE_RE.exec(input);
  if (!match) throw new ParseError(input, 'date (expected YYYY-MM-DD)');

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new ParseError(input, 'date (expected YYYY-MM-DD)');
  }

  return input;
}

/** Strictly parses a 24-hour `HH:MM` literal into minutes since midnight. */
export function parseTimeOfDay(input: string): number {
  const match = TIME_RE.exec(input);
  if (!match) throw new ParseError(input, 'time (expected HH:MM)');

  const hours = Number(match[1]);
  const minutes = Number(match[2]);

  if (hours > 23 || minutes > 59) {
    throw new ParseError(input, 'time (expected HH:MM)');
  }

  return hours * MINUTES_PER_HOUR + minutes;
}

/** Formats minutes since midnight back to `HH:MM`. */
export function formatTimeOfDay(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / MINUTES_PER_HOUR);
  const minutes = totalMinutes % MINUTES_PER_HOUR;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/** Non-throwing variants for schema refinements. */
export function isCalendarDate(input: string): boolean {
  try {
    parseCalendarDate(input);
    return true;
  } catch (err: unknown) {
    if (err instanceof ParseError) return false;
    throw err;
  }
}

export function isTimeOfDay(input: string): boolean {
  try {
    parseTimeOfDay(input);
    return true;
  } catch (err: unknown) {
    if (err instanceof ParseError) return false;
    throw err;
  }
}
