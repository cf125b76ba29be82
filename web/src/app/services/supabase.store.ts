// web/src/app/services/supabase.store.ts
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { parseCadence, type Cadence, type Completion, type Habit, type User } from '@streakboard/data-models';
import type { AppConfig } from '../config';
import { StorageError } from '../errors';
import { logger } from '../logger';
import type { HabitStore, UserStore } from './store';

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';
const COMPLETION_CONFLICT = 'period_key,habit_name,username';

// ====== Zeilen, wie sie aus Supabase kommen ======
const userRow = z.object({ username: z.string(), password_hash: z.string() });
const habitRow = z.object({
  name: z.string(),
  username: z.string(),
  habit_type: z.string(),
  created_at: z.string().nullish(),
});
const completionRow = z.object({ period_key: z.string(), habit_name: z.string(), username: z.string() });

type DbError = { code?: string; message: string };

function parseRows<T>(schema: z.ZodType<T>, data: unknown, operation: string): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new StorageError(operation, parsed.error);
  }
  return parsed.data;
}

export function createSupabaseStore(config: AppConfig['supabase']): SupabaseStore {
  const client = createClient(config.url, config.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return new SupabaseStore(client);
}

export class SupabaseStore implements UserStore, HabitStore {
  constructor(private readonly client: SupabaseClient) {}

  // ======= Users / Access codes =======

  async findUser(username: string): Promise<User | undefined> {
    const { data, error } = await this.client
      .from('users')
      .select('username, password_hash')
      .eq('username', username)
      .maybeSingle();
    this.check('findUser', error);
    if (!data) return undefined;
    const [row] = parseRows(userRow, [data], 'findUser');
    return { username: row.username, passwordHash: row.password_hash };
  }

  async createUser(user: User): Promise<boolean> {
    const { error } = await this.client
      .from('users')
      .insert({ username: user.username, password_hash: user.passwordHash });
    if (error?.code === UNIQUE_VIOLATION) return false;
    this.check('createUser', error);
    return true;
  }

  /** Bedingtes Update – nur eine Anfrage findet `used = false` vor. */
  async claimAccessCode(code: string, username: string): Promise<boolean> {
    const { data, error } = await this.client
      .from('access_codes')
      .update({ used: true, used_by: username })
      .eq('code', code)
      .eq('used', false)
      .select('code');
    this.check('claimAccessCode', error);
    return Array.isArray(data) && data.length > 0;
  }

  async releaseAccessCode(code: string, username: string): Promise<void> {
    const { error } = await this.client
      .from('access_codes')
      .update({ used: false, used_by: null })
      .eq('code', code)
      .eq('used_by', username);
    this.check('releaseAccessCode', error);
  }

  // ======= Habits =======

  async listHabits(owner: string): Promise<Habit[]> {
    const { data, error } = await this.client
      .from('habits')
      .select('name, username, habit_type, created_at')
      .eq('username', owner)
      .order('created_at', { ascending: true });
    this.check('listHabits', error);

    const habits: Habit[] = [];
    for (const row of parseRows(habitRow, data, 'listHabits')) {
      let cadence: Cadence;
      try {
        cadence = parseCadence(row.habit_type);
      } catch (err) {
        if (!(err instanceof TypeError)) throw err;
        logger.warn(`skipping habit '${row.name}' of ${row.username}: ${err.message}`);
        continue;
      }
      habits.push({
        name: row.name,
        owner: row.username,
        cadence,
        ...(row.created_at ? { createdAt: row.created_at } : {}),
      });
    }
    return habits;
  }

  async createHabit(habit: Habit): Promise<boolean> {
    const { error } = await this.client
      .from('habits')
      .insert({ name: habit.name, username: habit.owner, habit_type: habit.cadence });
    if (error?.code === UNIQUE_VIOLATION) return false;
    this.check('createHabit', error);
    return true;
  }

  async deleteHabit(owner: string, name: string): Promise<void> {
    // Habit zuerst; der FK-Cascade nimmt die Completions mit
    const habits = await this.client.from('habits').delete().eq('name', name).eq('username', owner);
    this.check('deleteHabit', habits.error);

    // Aufräumen für Schemata ohne Cascade
    const completions = await this.client
      .from('completions')
      .delete()
      .eq('habit_name', name)
      .eq('username', owner);
    this.check('deleteHabit', completions.error);
  }

  // ======= Completions =======

  async listCompletions(owner: string): Promise<Completion[]> {
    const { data, error } = await this.client
      .from('completions')
      .select('period_key, habit_name, username')
      .eq('username', owner);
    this.check('listCompletions', error);
    return parseRows(completionRow, data, 'listCompletions').map((row) => ({
      periodKey: row.period_key,
      habitName: row.habit_name,
      owner: row.username,
    }));
  }

  async markComplete(c: Completion): Promise<void> {
    const { error } = await this.client
      .from('completions')
      .upsert(
        { period_key: c.periodKey, habit_name: c.habitName, username: c.owner },
        { onConflict: COMPLETION_CONFLICT, ignoreDuplicates: true }
      );
    this.check('markComplete', error);
  }

  async unmarkComplete(c: Completion): Promise<void> {
    const { error } = await this.client
      .from('completions')
      .delete()
      .eq('period_key', c.periodKey)
      .eq('habit_name', c.habitName)
      .eq('username', c.owner);
    this.check('unmarkComplete', error);
  }

  private check(operation: string, error: DbError | null): void {
    if (error) {
      throw new StorageError(operation, error);
    }
  }
}
