import { IsoDate } from '../types/library.types';
import { InvalidDateError } from './errors';

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them literally
function utcMidnight(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_REGEX.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = utcMidnight(year, month - 1, day);

  return (
    year >= MIN_YEAR &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Validate a date argument, naming the field in the error
 * @throws InvalidDateError when the value is not a calendar date
 */
export function parseIsoDate(value: string, field: string = 'date'): IsoDate {
  if (typeof value !== 'string' || !isIsoDate(value)) {
    throw new InvalidDateError(`Invalid ${field}: expected YYYY-MM-DD, got '${value}'`);
  }
  return value;
}

/**
 * ISO dates order lexicographically, so plain string comparison is exact
 */
export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * @throws InvalidDateError when the result falls outside years 0001-9999
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  const [year, month, day] = parseIsoDate(date).split('-').map(Number);
  const result = new Date(utcMidnight(year, month - 1, day).getTime() + days * MS_PER_DAY);

  const resultYear = result.getUTCFullYear();
  if (resultYear < MIN_YEAR || resultYear > MAX_YEAR) {
    throw new InvalidDateError(`Date ${date} plus ${days} days is out of range`);
  }
  return result.toISOString().slice(0, 10);
}

/**
 * Today's date in UTC
 */
export function today(now: Date = new Date()): IsoDate {
  return now.toISOString().slice(0, 10);
}
