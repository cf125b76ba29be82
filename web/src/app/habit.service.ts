// web/src/app/habit.service.ts
import { BehaviorSubject, filter, firstValueFrom, map, type Observable } from 'rxjs';
import type { Cadence, Completion, Habit, PeriodKey } from '@streakboard/data-models';
import {
  addDays,
  completionRate,
  currentStreak,
  dateKeyLocal,
  DEFAULT_WINDOW,
  isValidPeriodKey,
  longestStreak,
  periodKey,
  periodLabel,
  startOfDayLocal,
  windowSummary,
  type WindowEntry,
} from '@streakboard/streaks';
import { ConflictError, NotFoundError, ValidationError } from './errors';
import { logger } from './logger';
import type { SessionContext } from './services/auth.service';
import type { HabitStore } from './services/store';

const MAX_NAME_LENGTH = 80;
const OVERVIEW_DAYS = 7;

/** UI-Progress */
export type Progress = { count: number; target: number; percent: number };

export interface HabitCard {
  name: string;
  cadence: Cadence;
  /** Key der laufenden Periode */
  periodKey: PeriodKey;
  done: boolean;
  currentStreak: number;
  longestStreak: number;
  window: WindowEntry[];
  windowRate: number;
}

/** Eine Spalte der „Last 7 Days“-Übersicht */
export interface DayTally {
  dateKey: PeriodKey;
  label: string;
  completed: number;
  total: number;
}

export interface Dashboard {
  username: string;
  today: Date;
  habits: HabitCard[];
  progress: Progress;
  lastSevenDays: DayTally[];
}

interface BoardState {
  habits: Habit[];
  /** habit name → erledigte Period-Keys */
  completed: Map<string, Set<PeriodKey>>;
}

/**
 * Completions je Habit; Keys, die nicht zur Kadenz passen, zählen nicht.
 */
function toBoard(habits: Habit[], completions: Completion[]): BoardState {
  const byName = new Map(habits.map((h) => [h.name, h] as const));
  const completed = new Map<string, Set<PeriodKey>>(habits.map((h) => [h.name, new Set<PeriodKey>()]));
  let dropped = 0;

  for (const c of completions) {
    const habit = byName.get(c.habitName);
    if (!habit || !isValidPeriodKey(c.periodKey, habit.cadence)) {
      dropped++;
      continue;
    }
    completed.get(habit.name)?.add(c.periodKey);
  }
  if (dropped > 0) {
    logger.warn(`ignored ${dropped} completion(s) without a matching habit period`);
  }
  return { habits, completed };
}

/**
 * Request-scoped: one instance per request and user, built from freshly fetched rows.
 * `today` is injected, never read from the clock here.
 */
export class HabitService {
  private readonly _state$ = new BehaviorSubject<BoardState | undefined>(undefined);
  private readonly today: Date;

  /** Dashboard, neu abgeleitet bei jeder Änderung */
  readonly dashboard$: Observable<Dashboard> = this._state$.pipe(
    filter((s): s is BoardState => s !== undefined),
    map((s) => this.toDashboard(s))
  );

  constructor(
    private readonly session: SessionContext,
    private readonly store: HabitStore,
    today: Date
  ) {
    this.today = startOfDayLocal(today);
  }

  // ======= Öffentliche API =======

  async load(): Promise<void> {
    const owner = this.session.username;
    const [habits, completions] = await Promise.all([
      this.store.listHabits(owner),
      this.store.listCompletions(owner),
    ]);
    this._state$.next(toBoard(habits, completions));
  }

  async dashboard(): Promise<Dashboard> {
    await this.ensureLoaded();
    return firstValueFrom(this.dashboard$);
  }

  async addHabit(rawName: string, cadence: Cadence): Promise<Habit> {
    const name = rawName.trim();
    if (!name) throw new ValidationError('Please enter a habit name.');
    if (name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Habit names are limited to ${MAX_NAME_LENGTH} characters.`);
    }

    const state = await this.ensureLoaded();
    const habit: Habit = { name, owner: this.session.username, cadence };
    if (state.habits.some((h) => h.name === name) || !(await this.store.createHabit(habit))) {
      throw new ConflictError('Habit already exists!');
    }

    const completed = new Map(state.completed).set(name, new Set<PeriodKey>());
    this.commit({ habits: [...state.habits, habit], completed });
    return habit;
  }

  /** Entfernt ein Habit samt Completions. */
  async removeHabit(name: string): Promise<void> {
    const state = await this.ensureLoaded();
    const habit = this.habitNamed(state, name);
    await this.store.deleteHabit(this.session.username, habit.name);

    const completed = new Map(state.completed);
    completed.delete(habit.name);
    this.commit({ habits: state.habits.filter((h) => h.name !== habit.name), completed });
  }

  /** Check-in für die laufende Periode (Tag/Woche/Monat); doppelt ist ein No-op. */
  async complete(name: string): Promise<PeriodKey> {
    const state = await this.ensureLoaded();
    const habit = this.habitNamed(state, name);
    const key = periodKey(this.today, habit.cadence);

    await this.store.markComplete({ periodKey: key, habitName: habit.name, owner: this.session.username });
    this.commit(this.withKey(state, habit.name, key, true));
    return key;
  }

  /** „Undo“ des Eintrags der laufenden Periode */
  async undo(name: string): Promise<PeriodKey> {
    const state = await this.ensureLoaded();
    const habit = this.habitNamed(state, name);
    const key = periodKey(this.today, habit.cadence);

    await this.store.unmarkComplete({ periodKey: key, habitName: habit.name, owner: this.session.username });
    this.commit(this.withKey(state, habit.name, key, false));
    return key;
  }

  // ======= Interne Helfer =======

  private async ensureLoaded(): Promise<BoardState> {
    if (!this._state$.value) await this.load();
    const state = this._state$.value;
    if (!state) throw new Error('habit board failed to load');
    return state;
  }

  private habitNamed(state: BoardState, name: string): Habit {
    const habit = state.habits.find((h) => h.name === name);
    if (!habit) throw new NotFoundError(`No habit named '${name}'.`);
    return habit;
  }

  private withKey(state: BoardState, name: string, key: PeriodKey, done: boolean): BoardState {
    const keys = new Set(state.completed.get(name));
    if (done) keys.add(key);
    else keys.delete(key);
    return { habits: state.habits, completed: new Map(state.completed).set(name, keys) };
  }

  private toDashboard(state: BoardState): Dashboard {
    const cards = state.habits.map((h) => this.cardFor(h, state.completed.get(h.name)));
    const count = cards.filter((c) => c.done).length;
    const target = cards.length;

    const lastSevenDays: DayTally[] = [];
    for (let i = OVERVIEW_DAYS - 1; i >= 0; i--) {
      const day = addDays(this.today, -i);
      const completed = state.habits.filter((h) => state.completed.get(h.name)?.has(periodKey(day, h.cadence))).length;
      lastSevenDays.push({ dateKey: dateKeyLocal(day), label: periodLabel(day, 'daily'), completed, total: target });
    }

    return {
      username: this.session.username,
      today: this.today,
      habits: cards,
      progress: { count, target, percent: target > 0 ? count / target : 0 },
      lastSevenDays,
    };
  }

  private cardFor(habit: Habit, keys: Set<PeriodKey> | undefined): HabitCard {
    const key = periodKey(this.today, habit.cadence);
    const window = windowSummary(keys, habit.cadence, this.today, DEFAULT_WINDOW[habit.cadence]);
    return {
      name: habit.name,
      cadence: habit.cadence,
      periodKey: key,
      done: keys?.has(key) ?? false,
      currentStreak: currentStreak(keys, habit.cadence, this.today),
      longestStreak: longestStreak(keys, habit.cadence),
      window,
      windowRate: completionRate(window),
    };
  }

  private commit(state: BoardState): void {
    this._state$.next(state);
  }
}
