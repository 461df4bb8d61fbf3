import type { DateRow } from '@conservation-warehouse/types';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

// Index 0 is Monday
const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDay(isoDate: string): Date {
  const [year, month, day] = isoDate.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYYMMDD integer key of a YYYY-MM-DD date
 */
export function dateKey(isoDate: string): number {
  return Number(isoDate.replace(/-/g, ''));
}

// YYYY-MM-DD of a YYYYMMDD key
export function isoDateFromKey(key: number): string {
  const digits = String(key).padStart(8, '0');
  return `${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`;
}

function isoWeek(date: Date): number {
  // Thursday of this week decides the ISO year
  const thursday = new Date(date.getTime());
  thursday.setUTCDate(date.getUTCDate() + 3 - ((date.getUTCDay() + 6) % 7));
  const weekOne = new Date(Date.UTC(thursday.getUTCFullYear(), 0, 4));
  const days = (thursday.getTime() - weekOne.getTime()) / DAY_MS;
  return 1 + Math.round((days - 3 + ((weekOne.getUTCDay() + 6) % 7)) / 7);
}

/**
 * One date dimension row. The fiscal year starts in fiscalYearStartMonth and is
 * named by the calendar year it ends in.
 */
export function buildDateRow(isoDate: string, fiscalYearStartMonth = 10): DateRow {
  const date = parseDay(isoDate);
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  const dayOfWeek = (date.getUTCDay() + 6) % 7;

  return {
    date_key: dateKey(isoDate),
    full_date: isoDate,
    year,
    quarter: Math.floor((month - 1) / 3) + 1,
    month,
    month_name: MONTH_NAMES[month - 1],
    week: isoWeek(date),
    day_of_month: date.getUTCDate(),
    day_of_week: dayOfWeek,
    day_name: DAY_NAMES[dayOfWeek],
    is_weekend: dayOfWeek >= 5,
    fiscal_year: fiscalYearStartMonth > 1 && month >= fiscalYearStartMonth ? year + 1 : year,
    fiscal_quarter: Math.floor(((month - fiscalYearStartMonth + 12) % 12) / 3) + 1,
  };
}

/**
 * Every day from the earliest to the latest business date, inclusive.
 * No dates gives no rows.
 */
export function generateDateDimension(businessDates: Iterable<string>, fiscalYearStartMonth = 10): DateRow[] {
  let min: string | null = null;
  let max: string | null = null;
  for (const isoDate of businessDates) {
    if (min === null || isoDate < min) min = isoDate;
    if (max === null || isoDate > max) max = isoDate;
  }
  if (min === null || max === null) {
    return [];
  }

  const rows: DateRow[] = [];
  const end = parseDay(max).getTime();
  for (let time = parseDay(min).getTime(); time <= end; time += DAY_MS) {
    rows.push(buildDateRow(toIsoDate(new Date(time)), fiscalYearStartMonth));
  }
  return rows;
}
