// libs/streaks/src/lib/streak.ts
import type { Cadence, PeriodKey } from '@streakboard/data-models';
import { isValidPeriodKey, periodKey, previousPeriodKey, startOfDayLocal, stepBack } from './period-key';

/** Completed period keys of one habit; missing means "no completions". */
export type CompletedKeys = Iterable<PeriodKey> | null | undefined;

export function toKeySet(completed: CompletedKeys): Set<PeriodKey> {
  return new Set(completed ?? []);
}

/**
 * Consecutive completed periods ending at and including today's period.
 * 0 as soon as the current period is open, even if the previous one was done.
 */
export function currentStreak(completed: CompletedKeys, cadence: Cadence, today: Date): number {
  const keys = toKeySet(completed);
  let streak = 0;
  let cursor = startOfDayLocal(today);
  // rückwärts ab heute bis zur ersten Lücke – höchstens |keys| + 1 Schritte
  while (keys.has(periodKey(cursor, cadence))) {
    streak++;
    cursor = stepBack(cursor, cadence);
  }
  return streak;
}

/** Historisches Maximum an aufeinanderfolgenden Perioden; ungültige Keys zählen nicht. */
export function longestStreak(completed: CompletedKeys, cadence: Cadence): number {
  const keys = Array.from(toKeySet(completed))
    .filter((k) => isValidPeriodKey(k, cadence))
    .sort(); // lexikographisch = chronologisch

  let longest = 0;
  let run = 0;
  let prev: PeriodKey | undefined;
  for (const key of keys) {
    run = prev !== undefined && previousPeriodKey(key, cadence) === prev ? run + 1 : 1;
    if (run > longest) longest = run;
    prev = key;
  }
  return longest;
}
