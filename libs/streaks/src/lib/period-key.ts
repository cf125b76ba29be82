// libs/streaks/src/lib/period-key.ts
import type { Cadence, PeriodKey } from '@streakboard/data-models';

const DAY_MS = 86_400_000;

const DAY_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;
const WEEK_KEY = /^(\d{4})-W(\d{2})$/;
const MONTH_KEY = /^(\d{4})-(\d{2})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

export function unknownCadence(cadence: never): never {
  throw new TypeError(`Unknown cadence: ${String(cadence)}`);
}

// ====== Date helpers (lokale Kalenderzeit) ======

/** Lokale Mitternacht desselben Kalendertags */
export function startOfDayLocal(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/** Kalendertage addieren; über den Konstruktor, damit Sommerzeit keine Stunde verschiebt */
export function addDays(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

/** 0 = Mo … 6 = So */
function isoWeekday(d: Date): number {
  return (d.getDay() + 6) % 7;
}

export function dateKeyLocal(d: Date): PeriodKey {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** ISO-Woche (Mo–So), Ergebnis wie 'YYYY-Www'. Jahr und Woche sind die des Donnerstags. */
export function weekKeyOf(d: Date): PeriodKey {
  const thursday = addDays(d, 3 - isoWeekday(d));
  const year = thursday.getFullYear();
  const dayOfYear = Math.round(
    (Date.UTC(year, thursday.getMonth(), thursday.getDate()) - Date.UTC(year, 0, 1)) / DAY_MS
  );
  const week = Math.floor(dayOfYear / 7) + 1;
  return `${pad(year, 4)}-W${pad(week)}`;
}

export function monthKeyOf(d: Date): PeriodKey {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}`;
}

/** Montag der ISO-Woche; Woche 1 enthält immer den 4. Januar */
function isoWeekToDate(year: number, week: number): Date {
  const jan4 = new Date(year, 0, 4);
  return addDays(jan4, (week - 1) * 7 - isoWeekday(jan4));
}

/** Canonical key of the period containing `date`. */
export function periodKey(date: Date, cadence: Cadence): PeriodKey {
  switch (cadence) {
    case 'daily':
      return dateKeyLocal(date);
    case 'weekly':
      return weekKeyOf(date);
    case 'monthly':
      return monthKeyOf(date);
    default:
      return unknownCadence(cadence);
  }
}

/**
 * A date inside the previous period: one day back, seven days back,
 * or the first of the previous calendar month (January rolls over to December).
 */
export function stepBack(date: Date, cadence: Cadence): Date {
  switch (cadence) {
    case 'daily':
      return addDays(date, -1);
    case 'weekly':
      return addDays(date, -7);
    case 'monthly':
      return new Date(date.getFullYear(), date.getMonth() - 1, 1);
    default:
      return unknownCadence(cadence);
  }
}

/**
 * First day of the period named by `key`, or `undefined` when the key is malformed
 * or does not round-trip (e.g. `2021-W53`, `2023-02-30`).
 */
export function periodStart(key: string, cadence: Cadence): Date | undefined {
  let start: Date;
  switch (cadence) {
    case 'daily': {
      const m = DAY_KEY.exec(key);
      if (!m) return undefined;
      start = new Date(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
      break;
    }
    case 'weekly': {
      const m = WEEK_KEY.exec(key);
      if (!m) return undefined;
      start = isoWeekToDate(Number(m[1]), Number(m[2]));
      break;
    }
    case 'monthly': {
      const m = MONTH_KEY.exec(key);
      if (!m) return undefined;
      start = new Date(Number(m[1]), Number(m[2]) - 1, 1);
      break;
    }
    default:
      return unknownCadence(cadence);
  }
  return periodKey(start, cadence) === key ? start : undefined;
}

export function isValidPeriodKey(key: string, cadence: Cadence): boolean {
  return periodStart(key, cadence) !== undefined;
}

export function previousPeriodKey(key: string, cadence: Cadence): PeriodKey | undefined {
  const start = periodStart(key, cadence);
  return start ? periodKey(stepBack(start, cadence), cadence) : undefined;
}
