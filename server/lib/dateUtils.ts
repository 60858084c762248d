/**
 * Date parsing for spreadsheet cells.
 * Handles Excel date cells, ISO strings, month-year labels and separated day/month/year forms.
 */
import { format, isValid } from 'date-fns';

const MONTH_NAMES = new Map<string, number>([
  ['jan', 0], ['january', 0],
  ['feb', 1], ['february', 1],
  ['mar', 2], ['march', 2],
  ['apr', 3], ['april', 3],
  ['may', 4],
  ['jun', 5], ['june', 5],
  ['jul', 6], ['july', 6],
  ['aug', 7], ['august', 7],
  ['sep', 8], ['september', 8], ['sept', 8],
  ['oct', 9], ['october', 9],
  ['nov', 10], ['november', 10],
  ['dec', 11], ['december', 11],
]);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

// Two-digit years: 00-30 = 2000-2030, 31-99 = 1931-1999
function expandYear(year: number): number {
  if (year >= 100) return year;
  return year <= 30 ? 2000 + year : 1900 + year;
}

function buildDate(year: number, month: number, day: number): Date | null {
  if (year < 1900 || year > 2100 || month < 0 || month > 11 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(year, month, day);
  // Reject overflow such as 31-02-2024 rolling into March
  if (date.getMonth() !== month) return null;
  return date;
}

/**
 * Parse a cell into a Date, or null when it is not a recognisable date.
 * Numbers and booleans are never dates: a numeric column stays numeric.
 */
export function parseFlexibleDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const str = value.trim();
  if (!str) return null;

  // "2024-01-15", "2024-01-15T10:30:00Z"
  if (ISO_DATE.test(str)) {
    const date = new Date(str.length === 10 ? `${str}T00:00:00` : str);
    if (isValid(date) && date.getFullYear() >= 1900 && date.getFullYear() <= 2100) {
      return date;
    }
    return null;
  }

  // "11-2020", "11/20" (MM-YYYY)
  const numericMonthYear = str.match(/^(\d{1,2})[-/](\d{2}|\d{4})$/);
  if (numericMonthYear) {
    const month = parseInt(numericMonthYear[1], 10);
    if (month >= 1 && month <= 12) {
      return buildDate(expandYear(parseInt(numericMonthYear[2], 10)), month - 1, 1);
    }
    return null;
  }

  // "Jan-24", "January 2024", "Jan/24", "Jan24"
  const monthYear = str.match(/^([A-Za-z]{3,})[-\s/]?(\d{2}|\d{4})$/);
  if (monthYear) {
    const month = MONTH_NAMES.get(monthYear[1].toLowerCase());
    if (month === undefined) return null;
    return buildDate(expandYear(parseInt(monthYear[2], 10)), month, 1);
  }

  // "DD-MM-YYYY", "MM/DD/YYYY", "YYYY/MM/DD"
  const separated = str.match(/^(\d{1,4})[-/](\d{1,2})[-/](\d{1,4})$/);
  if (separated) {
    if (separated[1].length === 4) {
      return buildDate(parseInt(separated[1], 10), parseInt(separated[2], 10) - 1, parseInt(separated[3], 10));
    }
    const part1 = parseInt(separated[1], 10);
    const part2 = parseInt(separated[2], 10);
    const year = expandYear(parseInt(separated[3], 10));
    if (part2 > 12) {
      // MM-DD-YYYY
      return buildDate(year, part1 - 1, part2);
    }
    // DD-MM-YYYY, also the reading for ambiguous values
    return buildDate(year, part2 - 1, part1);
  }

  // "DD.MM.YYYY"
  const dotted = str.match(/^(\d{1,2})\.(\d{1,2})\.(\d{2}|\d{4})$/);
  if (dotted) {
    return buildDate(expandYear(parseInt(dotted[3], 10)), parseInt(dotted[2], 10) - 1, parseInt(dotted[1], 10));
  }

  // "April 15, 2024", "Apr 15 2024"
  const monthDayYear = str.match(/^([A-Za-z]{3,})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (monthDayYear) {
    const month = MONTH_NAMES.get(monthDayYear[1].toLowerCase());
    if (month === undefined) return null;
    return buildDate(parseInt(monthDayYear[3], 10), month, parseInt(monthDayYear[2], 10));
  }

  // "15 April 2024"
  const dayMonthYear = str.match(/^(\d{1,2})\s+([A-Za-z]{3,})\.?,?\s+(\d{4})$/);
  if (dayMonthYear) {
    const month = MONTH_NAMES.get(dayMonthYear[2].toLowerCase());
    if (month === undefined) return null;
    return buildDate(parseInt(dayMonthYear[3], 10), month, parseInt(dayMonthYear[1], 10));
  }

  return null;
}

/**
 * Render a date for tables and charts: "2024-01-15", or the full ISO string when it carries a time
 */
export function formatDate(date: Date): string {
  const hasTime = date.getHours() !== 0 || date.getMinutes() !== 0 || date.getSeconds() !== 0 || date.getMilliseconds() !== 0;
  return hasTime ? date.toISOString() : format(date, 'yyyy-MM-dd');
}
