/**
 * Certificate Date Handling
 *
 * Completion dates are printed in many shapes ("Friday, June 6, 2025",
 * "06/06/2025", "2025-06-06"). Each accepted shape is a DateFormat with an
 * anchored pattern and a specificity rank; the first format that yields a real
 * calendar date wins.
 */

import type { DateFormat, IsoDate } from '../types';

const WEEKDAY = '(?:mon|tues|wednes|thurs|fri|satur|sun)day';
const ORDINAL = '(?:st|nd|rd|th)?';

/**
 * Accepted formats, most specific first.
 */
export const DEFAULT_DATE_FORMATS: readonly DateFormat[] = Object.freeze([
  {
    name: 'iso',
    pattern: /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})$/,
    confidence: 1.0,
  },
  {
    name: 'weekday_month_day_year',
    pattern: new RegExp(
      `^${WEEKDAY},?\\s+(?<month>[a-z]+)\\.?\\s+(?<day>\\d{1,2})${ORDINAL},?\\s+(?<year>\\d{4})$`,
      'i'
    ),
    confidence: 0.95,
  },
  {
    name: 'month_day_year',
    pattern: new RegExp(
      `^(?<month>[a-z]+)\\.?\\s+(?<day>\\d{1,2})${ORDINAL},?\\s+(?<year>\\d{4})$`,
      'i'
    ),
    confidence: 0.9,
  },
  {
    name: 'day_month_year',
    pattern: new RegExp(
      `^(?<day>\\d{1,2})${ORDINAL}\\s+(?<month>[a-z]+)\\.?,?\\s+(?<year>\\d{4})$`,
      'i'
    ),
    confidence: 0.85,
  },
  {
    name: 'us_slash',
    pattern: /^(?<month>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{4})$/,
    confidence: 0.8,
  },
  {
    name: 'us_dash',
    pattern: /^(?<month>\d{1,2})-(?<day>\d{1,2})-(?<year>\d{4})$/,
    confidence: 0.7,
  },
]);

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

function monthNumber(text: string): number | null {
  if (/^\d{1,2}$/.test(text)) {
    return parseInt(text, 10);
  }
  return MONTHS[text.toLowerCase()] ?? null;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function formatIsoDate(year: number, month: number, day: number): IsoDate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export interface ParsedDate {
  iso: IsoDate;
  format: string;
  confidence: number;
}

/**
 * Try each format in order. Returns null when no format yields a real date.
 */
export function parseCertificateDate(
  text: string,
  formats: readonly DateFormat[] = DEFAULT_DATE_FORMATS
): ParsedDate | null {
  const value = text.trim().replace(/\s+/g, ' ').replace(/\.$/, '');

  for (const format of formats) {
    const groups = value.match(format.pattern)?.groups;
    if (!groups?.year || !groups.month || !groups.day) continue;

    const year = parseInt(groups.year, 10);
    const month = monthNumber(groups.month);
    const day = parseInt(groups.day, 10);
    if (month === null || !isValidCalendarDate(year, month, day)) continue;

    return {
      iso: formatIsoDate(year, month, day),
      format: format.name,
      confidence: format.confidence,
    };
  }

  return null;
}

interface DateParts {
  year: number;
  month: number;
  day: number;
}

function isoParts(iso: IsoDate): DateParts | null {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(iso.trim());
  if (!match) return null;
  const [, year, month, day] = match;
  return { year: parseInt(year, 10), month: parseInt(month, 10), day: parseInt(day, 10) };
}

/**
 * Zero-pad an ISO date. Throws on anything that is not a real calendar date.
 */
export function canonicalIsoDate(iso: IsoDate): IsoDate {
  const parts = isoParts(iso);
  if (!parts || !isValidCalendarDate(parts.year, parts.month, parts.day)) {
    throw new Error(`Not a calendar date: ${iso}`);
  }
  return formatIsoDate(parts.year, parts.month, parts.day);
}

/**
 * Same month and day `years` earlier; Feb 29 becomes Feb 28.
 */
export function subtractYears(iso: IsoDate, years: number): IsoDate {
  const parts = isoParts(canonicalIsoDate(iso));
  if (!parts) {
    throw new Error(`Not a calendar date: ${iso}`);
  }
  const year = parts.year - years;
  const day = Math.min(parts.day, daysInMonth(year, parts.month));
  return formatIsoDate(year, parts.month, day);
}

/**
 * Local calendar date of `now`.
 */
export function toLocalIsoDate(now: Date): IsoDate {
  return formatIsoDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

/**
 * YYYY-MM-DD → MM/DD/YYYY
 */
export function toBrokerDate(iso: IsoDate): string {
  const [year, month, day] = canonicalIsoDate(iso).split('-');
  return `${month}/${day}/${year}`;
}
