// web/src/app/services/store.ts
import type { Completion, Habit, User } from '@streakboard/data-models';

/** Users and single-use access codes. */
export interface UserStore {
  findUser(username: string): Promise<User | undefined>;
  /** `false` when the username is already taken */
  createUser(user: User): Promise<boolean>;
  /**
   * Atomically flips `used` on an unused code.
   * `true` for exactly one caller per code, however many race for it.
   */
  claimAccessCode(code: string, username: string): Promise<boolean>;
  /** Undo a claim whose registration did not go through. */
  releaseAccessCode(code: string, username: string): Promise<void>;
}

/** Habits and completions of one owner. */
export interface HabitStore {
  listHabits(owner: string): Promise<Habit[]>;
  /** `false` when the owner already has a habit with this name */
  createHabit(habit: Habit): Promise<boolean>;
  /** Removes the habit together with all its completions. */
  deleteHabit(owner: string, name: string): Promise<void>;
  listCompletions(owner: string): Promise<Completion[]>;
  /** Idempotent: marking twice leaves one record. */
  markComplete(completion: Completion): Promise<void>;
  unmarkComplete(completion: Completion): Promise<void>;
}
