import { describe, expect, it } from 'vitest';
import {
  comparePeriods,
  calendarDateIn,
  formatPeriod,
  isValidTimeZone,
  isoWeekOf,
  letterPeriodFor,
  periodKey,
  validatePeriod,
} from '../../src/utils/period.js';
import { DocumentValidationError } from '../../src/utils/errors.js';

describe('isoWeekOf', () => {
  it('computes the ISO week of a mid-year Monday', () => {
    expect(isoWeekOf(new Date('2024-10-14T08:00:00.000Z'))).toEqual({ week: 42, year: 2024 });
  });

  it('assigns early January days to the last week of the previous year', () => {
    expect(isoWeekOf(new Date('2021-01-01T12:00:00.000Z'))).toEqual({ week: 53, year: 2020 });
  });

  it('assigns late December days to week 1 of the next year', () => {
    expect(isoWeekOf(new Date('2024-12-30T12:00:00.000Z'))).toEqual({ week: 1, year: 2025 });
  });
});

describe('letterPeriodFor', () => {
  it('looks one week ahead on Sundays', () => {
    expect(letterPeriodFor(new Date('2024-10-13T16:00:00.000Z'))).toEqual({ week: 42, year: 2024 });
  });

  it('uses the current week on other days', () => {
    expect(letterPeriodFor(new Date('2024-10-12T16:00:00.000Z'))).toEqual({ week: 41, year: 2024 });
  });

  it('reads the weekday in the given time zone', () => {
    const lateSaturdayUtc = new Date('2024-10-12T22:30:00.000Z');

    expect(letterPeriodFor(lateSaturdayUtc)).toEqual({ week: 41, year: 2024 });
    expect(letterPeriodFor(lateSaturdayUtc, 'Europe/Copenhagen')).toEqual({ week: 42, year: 2024 });
    expect(letterPeriodFor(new Date('2024-10-13T02:00:00.000Z'), 'America/New_York')).toEqual({ week: 41, year: 2024 });
  });
});

describe('time zone helpers', () => {
  it('maps an instant to its calendar date in a zone', () => {
    expect(calendarDateIn(new Date('2024-10-12T22:30:00.000Z'), 'Europe/Copenhagen')).toEqual(
      new Date('2024-10-13T00:00:00.000Z'),
    );
    expect(calendarDateIn(new Date('2024-10-12T22:30:00.000Z'), 'UTC')).toEqual(new Date('2024-10-12T00:00:00.000Z'));
  });

  it('recognises IANA zone names', () => {
    expect(isValidTimeZone('Europe/Copenhagen')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});

describe('period helpers', () => {
  it('formats periods and keys', () => {
    expect(formatPeriod({ week: 42, year: 2024 })).toBe('42/2024');
    expect(periodKey('emma', { week: 7, year: 2024 })).toBe('emma:2024-W07');
  });

  it('orders periods by year, then week', () => {
    const periods = [
      { week: 2, year: 2025 },
      { week: 52, year: 2024 },
      { week: 10, year: 2024 },
    ];
    expect([...periods].sort(comparePeriods)).toEqual([
      { week: 10, year: 2024 },
      { week: 52, year: 2024 },
      { week: 2, year: 2025 },
    ]);
  });

  it('rejects out-of-range weeks and years', () => {
    expect(() => validatePeriod({ week: 0, year: 2024 })).toThrow(DocumentValidationError);
    expect(() => validatePeriod({ week: 54, year: 2024 })).toThrow('Week must be an integer between 1 and 53, got 54.');
    expect(() => validatePeriod({ week: 10, year: 1999 })).toThrow('Year must be an integer between 2000 and 2100, got 1999.');
    expect(() => validatePeriod({ week: 53, year: 2020 })).not.toThrow();
  });
});
