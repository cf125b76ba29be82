// libs/streaks/src/lib/window-summary.ts
import type { Cadence, PeriodKey } from '@streakboard/data-models';
import { periodKey, startOfDayLocal, stepBack, unknownCadence, weekKeyOf } from './period-key';
import { type CompletedKeys, toKeySet } from './streak';

export interface WindowEntry {
  periodKey: PeriodKey;
  /** Short label for the strip: `Mon`, `W03`, `Jan` */
  label: string;
  completed: boolean;
}

/** Sichtfenster je Kadenz: 7 Tage, 4 Wochen, 6 Monate */
export const DEFAULT_WINDOW: Readonly<Record<Cadence, number>> = {
  daily: 7,
  weekly: 4,
  monthly: 6,
};

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function periodLabel(date: Date, cadence: Cadence): string {
  switch (cadence) {
    case 'daily':
      return WEEKDAYS[date.getDay()];
    case 'weekly':
      return weekKeyOf(date).slice(5);
    case 'monthly':
      return MONTHS[date.getMonth()];
    default:
      return unknownCadence(cadence);
  }
}

/**
 * The most recent `windowSize` periods ending at today's period, oldest first.
 */
export function windowSummary(
  completed: CompletedKeys,
  cadence: Cadence,
  today: Date,
  windowSize: number
): WindowEntry[] {
  const keys = toKeySet(completed);
  const entries: WindowEntry[] = [];
  let cursor = startOfDayLocal(today);
  for (let i = 0; i < Math.floor(windowSize); i++) {
    const key = periodKey(cursor, cadence);
    entries.push({ periodKey: key, label: periodLabel(cursor, cadence), completed: keys.has(key) });
    cursor = stepBack(cursor, cadence);
  }
  return entries.reverse();
}

/** Anteil erledigter Perioden im Fenster, 0..1 */
export function completionRate(summary: readonly WindowEntry[]): number {
  if (summary.length === 0) return 0;
  return summary.filter((e) => e.completed).length / summary.length;
}
