import { MemoryStore } from '../testing/memory.store';
import { ConflictError, NotFoundError, ValidationError } from './errors';
import { HabitService } from './habit.service';

// Montag, 15.01.2024 (KW 03)
const today = new Date(2024, 0, 15, 18, 45);
const alice = { username: 'alice' };

async function seededStore(): Promise<MemoryStore> {
  const store = new MemoryStore();
  store.habits = [
    { name: 'Read', owner: 'alice', cadence: 'daily' },
    { name: 'Gym', owner: 'alice', cadence: 'weekly' },
    { name: 'Budget', owner: 'alice', cadence: 'monthly' },
    { name: 'Read', owner: 'bob', cadence: 'daily' },
  ];
  const done = [
    { habitName: 'Read', owner: 'alice', periodKey: '2024-01-13' },
    { habitName: 'Read', owner: 'alice', periodKey: '2024-01-14' },
    { habitName: 'Read', owner: 'alice', periodKey: '2024-01-15' },
    { habitName: 'Read', owner: 'alice', periodKey: '2024-1-12' },
    { habitName: 'Gym', owner: 'alice', periodKey: '2024-W02' },
    { habitName: 'Budget', owner: 'alice', periodKey: '2024-01' },
    { habitName: 'Read', owner: 'bob', periodKey: '2024-01-10' },
  ];
  for (const c of done) await store.markComplete(c);
  return store;
}

describe('HabitService', () => {
  let store: MemoryStore;
  let service: HabitService;

  beforeEach(async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    store = await seededStore();
    service = new HabitService(alice, store, today);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('dashboard', () => {
    it('builds one card per own habit', async () => {
      const board = await service.dashboard();

      expect(board.username).toBe('alice');
      expect(board.today).toEqual(new Date(2024, 0, 15));
      expect(board.habits.map((h) => [h.name, h.periodKey, h.done, h.currentStreak, h.longestStreak])).toEqual([
        ['Read', '2024-01-15', true, 3, 3],
        ['Gym', '2024-W03', false, 0, 1],
        ['Budget', '2024-01', true, 1, 1],
      ]);
      expect(board.progress).toEqual({ count: 2, target: 3, percent: 2 / 3 });
    });

    it('ignores malformed keys with a warning', async () => {
      await service.dashboard();
      expect(console.warn).toHaveBeenCalledWith('[streakboard]', 'ignored 1 completion(s) without a matching habit period');
    });

    it('summarises the recent window per habit', async () => {
      const [read, gym] = (await service.dashboard()).habits;

      expect(read.window.map((e) => e.completed)).toEqual([false, false, false, false, true, true, true]);
      expect(read.windowRate).toBeCloseTo(3 / 7);
      expect(gym.window).toEqual([
        { periodKey: '2023-W52', label: 'W52', completed: false },
        { periodKey: '2024-W01', label: 'W01', completed: false },
        { periodKey: '2024-W02', label: 'W02', completed: true },
        { periodKey: '2024-W03', label: 'W03', completed: false },
      ]);
      expect(gym.windowRate).toBe(0.25);
    });

    it('tallies the last seven days by the period each day falls in', async () => {
      const { lastSevenDays } = await service.dashboard();

      expect(lastSevenDays.map((d) => d.label)).toEqual(['Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun', 'Mon']);
      expect(lastSevenDays[0].dateKey).toBe('2024-01-09');
      expect(lastSevenDays.map((d) => d.completed)).toEqual([2, 2, 2, 2, 3, 3, 2]);
      expect(lastSevenDays.every((d) => d.total === 3)).toBe(true);
    });

    it('is empty for a new user', async () => {
      const board = await new HabitService({ username: 'carol' }, store, today).dashboard();
      expect(board.habits).toEqual([]);
      expect(board.progress).toEqual({ count: 0, target: 0, percent: 0 });
    });
  });

  describe('addHabit', () => {
    it('trims and stores the habit', async () => {
      await expect(service.addHabit('  Stretch ', 'daily')).resolves.toEqual({
        name: 'Stretch',
        owner: 'alice',
        cadence: 'daily',
      });
      expect(store.habits).toContainEqual({ name: 'Stretch', owner: 'alice', cadence: 'daily' });

      const card = (await service.dashboard()).habits[3];
      expect(card).toMatchObject({ name: 'Stretch', done: false, currentStreak: 0 });
    });

    it('rejects blank, overlong and duplicate names', async () => {
      await expect(service.addHabit('   ', 'daily')).rejects.toThrow(new ValidationError('Please enter a habit name.'));
      await expect(service.addHabit('x'.repeat(81), 'daily')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.addHabit('Gym', 'daily')).rejects.toThrow(new ConflictError('Habit already exists!'));
    });

    it('lets different users share a habit name', async () => {
      await new HabitService({ username: 'bob' }, store, today).addHabit('Gym', 'weekly');
      expect(store.habits.filter((h) => h.name === 'Gym')).toHaveLength(2);
    });
  });

  describe('complete / undo', () => {
    it('marks the running week for a weekly habit', async () => {
      await expect(service.complete('Gym')).resolves.toBe('2024-W03');

      const gym = (await service.dashboard()).habits[1];
      expect(gym).toMatchObject({ done: true, currentStreak: 2, longestStreak: 2 });
      expect(store.completions.size).toBe(8);
    });

    it('is idempotent', async () => {
      await service.complete('Gym');
      await service.complete('Gym');
      const rows = await store.listCompletions('alice');
      expect(rows.filter((c) => c.habitName === 'Gym' && c.periodKey === '2024-W03')).toHaveLength(1);
    });

    it('undo removes only the running period', async () => {
      await expect(service.undo('Read')).resolves.toBe('2024-01-15');

      const read = (await service.dashboard()).habits[0];
      expect(read).toMatchObject({ done: false, currentStreak: 0, longestStreak: 2 });
      const keys = (await store.listCompletions('alice')).filter((c) => c.habitName === 'Read').map((c) => c.periodKey);
      expect(keys).toEqual(['2024-01-13', '2024-01-14', '2024-1-12']);
    });

    it('rejects unknown habits', async () => {
      await expect(service.complete('Swim')).rejects.toThrow(new NotFoundError("No habit named 'Swim'."));
      await expect(service.undo('Swim')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('removeHabit', () => {
    it('drops the habit and its completions but leaves other users alone', async () => {
      await service.removeHabit('Read');

      expect((await service.dashboard()).habits.map((h) => h.name)).toEqual(['Gym', 'Budget']);
      expect((await store.listCompletions('alice')).some((c) => c.habitName === 'Read')).toBe(false);
      expect(await store.listCompletions('bob')).toEqual([{ habitName: 'Read', owner: 'bob', periodKey: '2024-01-10' }]);
    });
  });

  it('emits a fresh dashboard after every change', async () => {
    const counts: number[] = [];
    const sub = service.dashboard$.subscribe((d) => counts.push(d.progress.count));

    await service.load();
    await service.complete('Gym');
    await service.undo('Budget');
    sub.unsubscribe();

    expect(counts).toEqual([2, 3, 2]);
  });
});
