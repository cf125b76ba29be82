// libs/data-models/src/lib/habit.ts
// Defines the core data model for habits and their completions

/** All cadences a habit can repeat on. */
export const CADENCES = ['daily', 'weekly', 'monthly'] as const;

/**
 * Repetition granularity of a habit.
 * Stored in the `habits.habit_type` column.
 */
export type Cadence = (typeof CADENCES)[number];

export function isCadence(value: unknown): value is Cadence {
  return CADENCES.some((c) => c === value);
}

/** Validates a raw cadence string, throws a TypeError for anything outside the enumeration. */
export function parseCadence(value: unknown): Cadence {
  if (!isCadence(value)) {
    throw new TypeError(`Unknown cadence: ${String(value)}`);
  }
  return value;
}

/**
 * Canonical identifier of one period instance:
 * `YYYY-MM-DD` (daily), `YYYY-Www` (weekly, ISO week), `YYYY-MM` (monthly).
 */
export type PeriodKey = string;

/**
 * Represents a habit owned by one user. Unique per (name, owner).
 */
export interface Habit {
  /** Human-readable name of the habit, also its key within the owner's list */
  name: string;
  /** Username of the owner */
  owner: string;
  cadence: Cadence;
  /** ISO timestamp, set by the database */
  createdAt?: string;
}

/**
 * A habit was done during the period `periodKey`.
 * There is no record for "not done".
 */
export interface Completion {
  periodKey: PeriodKey;
  habitName: string;
  owner: string;
}

export interface User {
  username: string;
  passwordHash: string;
}

export interface AccessCode {
  code: string;
  used: boolean;
  usedBy?: string | null;
}
