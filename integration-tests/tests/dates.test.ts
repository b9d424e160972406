/**
 * Completion date parsing and calendar helpers
 */

import {
  parseCertificateDate,
  canonicalIsoDate,
  subtractYears,
  toBrokerDate,
  toLocalIsoDate,
  DEFAULT_DATE_FORMATS,
} from '@ce-intake/shared';

describe('parseCertificateDate', () => {
  it.each([
    ['2025-06-06', 'iso', 1.0],
    ['Friday, June 6, 2025', 'weekday_month_day_year', 0.95],
    ['June 6th, 2025', 'month_day_year', 0.9],
    ['6 June 2025', 'day_month_year', 0.85],
    ['06/06/2025', 'us_slash', 0.8],
    ['6-6-2025', 'us_dash', 0.7],
  ])('should parse %s with the %s format', (text, format, confidence) => {
    expect(parseCertificateDate(text)).toEqual({ iso: '2025-06-06', format, confidence });
  });

  it('should accept abbreviated months with a trailing period', () => {
    expect(parseCertificateDate('Sept. 9, 2024')?.iso).toBe('2024-09-09');
    expect(parseCertificateDate('Dec 31 2024')?.iso).toBe('2024-12-31');
  });

  it('should tolerate surrounding whitespace and a trailing period', () => {
    expect(parseCertificateDate('  June   6,  2025. ')?.iso).toBe('2025-06-06');
  });

  it('should reject dates that do not exist', () => {
    expect(parseCertificateDate('02/30/2025')).toBeNull();
    expect(parseCertificateDate('2025-13-01')).toBeNull();
    expect(parseCertificateDate('February 29, 2025')).toBeNull();
  });

  it('should accept Feb 29 in a leap year', () => {
    expect(parseCertificateDate('02/29/2024')?.iso).toBe('2024-02-29');
  });

  it('should reject unknown month names and free text', () => {
    expect(parseCertificateDate('Smarch 3, 2025')).toBeNull();
    expect(parseCertificateDate('sometime last spring')).toBeNull();
  });

  it('should only use the formats it is given', () => {
    const isoOnly = DEFAULT_DATE_FORMATS.filter((format) => format.name === 'iso');
    expect(parseCertificateDate('06/06/2025', isoOnly)).toBeNull();
    expect(parseCertificateDate('2025-06-06', isoOnly)?.format).toBe('iso');
  });
});

describe('calendar helpers', () => {
  it('should zero-pad ISO dates', () => {
    expect(canonicalIsoDate('2025-6-6')).toBe('2025-06-06');
  });

  it('should throw on a non-calendar ISO date', () => {
    expect(() => canonicalIsoDate('2025-02-29')).toThrow('Not a calendar date: 2025-02-29');
  });

  it('should subtract whole years', () => {
    expect(subtractYears('2025-06-06', 3)).toBe('2022-06-06');
  });

  it('should clamp Feb 29 to Feb 28 in a common year', () => {
    expect(subtractYears('2024-02-29', 3)).toBe('2021-02-28');
    expect(subtractYears('2024-02-29', 4)).toBe('2020-02-29');
  });

  it('should format the broker date as MM/DD/YYYY', () => {
    expect(toBrokerDate('2025-06-06')).toBe('06/06/2025');
    expect(toBrokerDate('2024-12-1')).toBe('12/01/2024');
  });

  it('should take the local calendar date', () => {
    expect(toLocalIsoDate(new Date(2025, 0, 5, 23, 30))).toBe('2025-01-05');
  });
});
