import type { Cadence } from '@streakboard/data-models';
import {
  addDays,
  isValidPeriodKey,
  periodKey,
  periodStart,
  previousPeriodKey,
  stepBack,
} from './period-key';

describe('periodKey', () => {
  it('daily: ISO calendar date, time of day ignored', () => {
    expect(periodKey(new Date(2024, 0, 15), 'daily')).toBe('2024-01-15');
    expect(periodKey(new Date(2024, 0, 15, 23, 59), 'daily')).toBe('2024-01-15');
  });

  it('monthly: year and month only', () => {
    expect(periodKey(new Date(2024, 2, 10), 'monthly')).toBe('2024-03');
    expect(periodKey(new Date(2024, 11, 31), 'monthly')).toBe('2024-12');
  });

  it('weekly: ISO week number', () => {
    expect(periodKey(new Date(2024, 0, 17), 'weekly')).toBe('2024-W03');
    expect(periodKey(new Date(2024, 0, 1), 'weekly')).toBe('2024-W01');
  });

  it('weekly: uses the week-numbering year around new year', () => {
    expect(periodKey(new Date(2024, 11, 30), 'weekly')).toBe('2025-W01');
    expect(periodKey(new Date(2021, 0, 3), 'weekly')).toBe('2020-W53');
    expect(periodKey(new Date(2023, 0, 1), 'weekly')).toBe('2022-W52');
  });

  it('weekly: Monday through Sunday share one key', () => {
    const monday = new Date(2024, 0, 15);
    const keys = new Set([0, 1, 2, 3, 4, 5, 6].map((i) => periodKey(addDays(monday, i), 'weekly')));
    expect([...keys]).toEqual(['2024-W03']);
    expect(periodKey(addDays(monday, 7), 'weekly')).toBe('2024-W04');
  });

  it('is monotonic in string order for every cadence', () => {
    const cadences: Cadence[] = ['daily', 'weekly', 'monthly'];
    for (const cadence of cadences) {
      let prev = periodKey(new Date(2019, 11, 1), cadence);
      for (let i = 1; i < 900; i++) {
        const key = periodKey(addDays(new Date(2019, 11, 1), i), cadence);
        expect(key >= prev).toBe(true);
        prev = key;
      }
    }
  });

  it('throws a TypeError for an unknown cadence', () => {
    const bogus = 'yearly' as unknown as Cadence;
    expect(() => periodKey(new Date(2024, 0, 1), bogus)).toThrow(TypeError);
  });
});

describe('stepBack', () => {
  it('monthly goes to the first of the previous month', () => {
    expect(stepBack(new Date(2024, 2, 31), 'monthly')).toEqual(new Date(2024, 1, 1));
    expect(stepBack(new Date(2024, 0, 10), 'monthly')).toEqual(new Date(2023, 11, 1));
  });

  it('weekly goes back seven days', () => {
    expect(stepBack(new Date(2024, 0, 3), 'weekly')).toEqual(new Date(2023, 11, 27));
  });
});

describe('periodStart / isValidPeriodKey', () => {
  it('parses the first day of each period', () => {
    expect(periodStart('2024-01-15', 'daily')).toEqual(new Date(2024, 0, 15));
    expect(periodStart('2024-W03', 'weekly')).toEqual(new Date(2024, 0, 15));
    expect(periodStart('2020-W53', 'weekly')).toEqual(new Date(2020, 11, 28));
    expect(periodStart('2024-03', 'monthly')).toEqual(new Date(2024, 2, 1));
  });

  it('rejects keys that do not round-trip', () => {
    expect(isValidPeriodKey('2021-W53', 'weekly')).toBe(false);
    expect(isValidPeriodKey('2024-W00', 'weekly')).toBe(false);
    expect(isValidPeriodKey('2023-02-30', 'daily')).toBe(false);
    expect(isValidPeriodKey('2024-13', 'monthly')).toBe(false);
  });

  it('rejects keys in another format', () => {
    expect(isValidPeriodKey('2024-1-15', 'daily')).toBe(false);
    expect(isValidPeriodKey('2024-03', 'daily')).toBe(false);
    expect(isValidPeriodKey('2024-01-15', 'weekly')).toBe(false);
    expect(isValidPeriodKey('garbage', 'monthly')).toBe(false);
  });
});

describe('previousPeriodKey', () => {
  it('crosses month, year and leap-day boundaries', () => {
    expect(previousPeriodKey('2024-03-01', 'daily')).toBe('2024-02-29');
    expect(previousPeriodKey('2024-W01', 'weekly')).toBe('2023-W52');
    expect(previousPeriodKey('2021-W01', 'weekly')).toBe('2020-W53');
    expect(previousPeriodKey('2024-01', 'monthly')).toBe('2023-12');
  });

  it('returns undefined for malformed keys', () => {
    expect(previousPeriodKey('2024/01', 'monthly')).toBeUndefined();
  });
});
