import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TaskStore } from '../../src/store/task-store.js';
import type { TaskPersistence } from '../../src/persistence/task-persistence.js';
import type { CopyResult, LoadResult, SaveResult } from '../../src/types/results.js';
import type { Task } from '../../src/types/task.js';
import { Priority } from '../../src/types/priority.js';
import { CorruptStoreError, IOError } from '../../src/errors.js';

const fixed = new Date(2026, 1, 8, 9, 30); // Feb 8 2026

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'abc123',
    title: 'Test task',
    listName: 'Inbox',
    priority: Priority.P3,
    dueDate: '',
    isDone: false,
    notes: '',
    isRecurring: false,
    ...overrides,
  };
}

/** In-memory persistence that records every saved snapshot */
function makePersistence(initial: LoadResult = { type: 'success', tasks: [] }) {
  const saved: Task[][] = [];
  let nextSave: SaveResult = { type: 'success' };
  const persistence = {
    load: vi.fn((): LoadResult => initial),
    save: vi.fn((tasks: readonly Task[]): SaveResult => {
      saved.push([...tasks]);
      return nextSave;
    }),
    quarantine: vi.fn((): CopyResult => ({ type: 'success', path: '/data/tasks.json.corrupt-x' })),
  } satisfies TaskPersistence;
  return {
    persistence,
    saved,
    failSaves(error: IOError) { nextSave = { type: 'error', error }; },
    recoverSaves() { nextSave = { type: 'success' }; },
  };
}

function openStore(tasks: Task[] = []) {
  const fake = makePersistence({ type: 'success', tasks });
  const { store } = TaskStore.open(fake.persistence, { clock: () => new Date(fixed) });
  return { store, ...fake };
}

function created(result: ReturnType<TaskStore['create']>): Task {
  if (result.type !== 'success') throw new Error(`expected success, got ${result.type}`);
  return result.data;
}

describe('TaskStore.open', () => {
  it('seeds the store with loaded tasks in file order', () => {
    const tasks = [makeTask({ id: 'a' }), makeTask({ id: 'b' })];
    const { store, persistence } = openStore(tasks);
    expect(persistence.load).toHaveBeenCalledTimes(1);
    expect(store.all().map(t => t.id)).toEqual(['a', 'b']);
  });

  it('starts empty and quarantines the file after a corrupt load', () => {
    const error = new CorruptStoreError('/data/tasks.json', 'not valid JSON');
    const fake = makePersistence({ type: 'error', error });
    const result = TaskStore.open(fake.persistence);

    expect(result.store.size).toBe(0);
    expect(result.error).toBe(error);
    expect(result.quarantinedTo).toBe('/data/tasks.json.corrupt-x');
    expect(fake.persistence.quarantine).toHaveBeenCalledTimes(1);
    expect(fake.persistence.save).not.toHaveBeenCalled();
  });

  it('reports a quarantine failure by leaving quarantinedTo empty', () => {
    const fake = makePersistence({ type: 'error', error: new CorruptStoreError('/data/tasks.json', 'bad') });
    fake.persistence.quarantine.mockReturnValue({
      type: 'error', error: new IOError('/data/tasks.json.corrupt-x', 'copy'),
    });
    const result = TaskStore.open(fake.persistence);
    expect(result.quarantinedTo).toBeNull();
    expect(result.error).toBeInstanceOf(CorruptStoreError);
  });

  it('does not quarantine after a read failure', () => {
    const error = new IOError('/data/tasks.json', 'read');
    const fake = makePersistence({ type: 'error', error });
    const result = TaskStore.open(fake.persistence);

    expect(result.error).toBe(error);
    expect(result.quarantinedTo).toBeNull();
    expect(fake.persistence.quarantine).not.toHaveBeenCalled();
  });
});

describe('create', () => {
  it('builds a task with defaults and saves it', () => {
    const { store, saved } = openStore();
    const task = created(store.create('  Water the plants  ', 'Home'));

    expect(task).toEqual({
      id: task.id,
      title: 'Water the plants',
      listName: 'Home',
      priority: Priority.P3,
      dueDate: '',
      isDone: false,
      notes: '',
      isRecurring: false,
    });
    expect(task.id).toMatch(/^[0-9a-z]{6}$/);
    expect(saved).toEqual([[task]]);
  });

  it('guesses priority from keywords and strips them', () => {
    const { store } = openStore();
    const task = created(store.create('Buy milk high', 'Inbox'));
    expect(task.title).toBe('Buy milk');
    expect(task.priority).toBe(Priority.P1);
  });

  it('sets tomorrow as due date and keeps the word in the title', () => {
    const { store } = openStore();
    const task = created(store.create('Call mom tomorrow', 'Inbox'));
    expect(task.dueDate).toBe('2026-02-09');
    expect(task.title).toBe('Call mom tomorrow');
  });

  it('rejects an empty title without saving', () => {
    const { store, persistence } = openStore();
    const result = store.create('', 'Inbox');

    expect(result).toEqual({
      type: 'invalid',
      error: { code: 'empty-title', field: 'title', message: 'Title cannot be empty' },
    });
    expect(store.size).toBe(0);
    expect(persistence.save).not.toHaveBeenCalled();
  });

  it('rejects a whitespace-only title', () => {
    const { store } = openStore();
    expect(store.create('   \t', 'Inbox').type).toBe('invalid');
    expect(store.size).toBe(0);
  });

  it('files blank list names under Inbox', () => {
    const { store } = openStore();
    expect(created(store.create('Task', '  ')).listName).toBe('Inbox');
  });

  it('hands out unique ids', () => {
    const { store } = openStore();
    const ids = new Set<string>();
    for (let i = 0; i < 50; i++) ids.add(created(store.create(`Task ${i}`, 'Inbox')).id);
    expect(ids.size).toBe(50);
  });

  it('keeps the change when the save fails and reports a warning', () => {
    const fake = makePersistence();
    const { store } = TaskStore.open(fake.persistence);
    const error = new IOError('/data/tasks.json', 'write');
    fake.failSaves(error);

    const result = store.create('Write essay', 'Inbox');
    expect(result.type).toBe('success');
    if (result.type === 'success') expect(result.warning).toBe(error);
    expect(store.size).toBe(1);
  });

  it('writes the kept change with the next successful save', () => {
    const fake = makePersistence();
    const { store } = TaskStore.open(fake.persistence);
    fake.failSaves(new IOError('/data/tasks.json', 'write'));
    store.create('First', 'Inbox');
    fake.recoverSaves();

    const result = store.create('Second', 'Inbox');
    expect(result.type === 'success' && result.warning).toBeNull();
    expect(fake.saved[1]?.map(t => t.title)).toEqual(['First', 'Second']);
  });
});

describe('toggleDone', () => {
  it('flips completion both ways and saves each time', () => {
    const { store, persistence } = openStore([makeTask({ id: 'a' })]);

    store.toggleDone('a');
    expect(store.get('a')?.isDone).toBe(true);
    store.toggleDone('a');
    expect(store.get('a')?.isDone).toBe(false);
    expect(persistence.save).toHaveBeenCalledTimes(2);
  });

  it('is a no-op for an unknown id', () => {
    const tasks = [makeTask({ id: 'a' }), makeTask({ id: 'b', isDone: true })];
    const { store, persistence } = openStore(tasks);

    expect(store.toggleDone('zzz')).toEqual({ type: 'not-found', taskId: 'zzz' });
    expect(store.all()).toEqual(tasks);
    expect(persistence.save).not.toHaveBeenCalled();
  });
});

describe('delete', () => {
  it('removes the task and saves', () => {
    const { store, saved } = openStore([makeTask({ id: 'a' }), makeTask({ id: 'b' })]);
    const result = store.delete('a');

    expect(result.type).toBe('success');
    expect(store.all().map(t => t.id)).toEqual(['b']);
    expect(saved[0]?.map(t => t.id)).toEqual(['b']);
  });

  it('is a no-op for an unknown id', () => {
    const { store, persistence } = openStore([makeTask({ id: 'a' })]);
    expect(store.delete('zzz').type).toBe('not-found');
    expect(store.size).toBe(1);
    expect(persistence.save).not.toHaveBeenCalled();
  });
});

describe('update', () => {
  let store: TaskStore;
  let persistence: ReturnType<typeof makePersistence>['persistence'];

  beforeEach(() => {
    ({ store, persistence } = openStore([makeTask({ id: 'a', dueDate: '2026-03-01' })]));
  });

  it('applies a partial update', () => {
    const result = store.update('a', { priority: Priority.P1, notes: '- buy eggs\n- buy flour' });

    expect(result.type).toBe('success');
    expect(store.get('a')).toEqual(makeTask({
      id: 'a',
      dueDate: '2026-03-01',
      priority: Priority.P1,
      notes: '- buy eggs\n- buy flour',
    }));
    expect(persistence.save).toHaveBeenCalledTimes(1);
  });

  it('applies every editable field', () => {
    store.update('a', {
      title: '  Renamed  ', dueDate: '2030-01-13', priority: Priority.None, isRecurring: true, notes: 'n',
    });
    expect(store.get('a')).toEqual(makeTask({
      id: 'a', title: 'Renamed', dueDate: '2030-01-13', priority: Priority.None, isRecurring: true, notes: 'n',
    }));
  });

  it('clears the due date with an empty string', () => {
    store.update('a', { dueDate: '' });
    expect(store.get('a')?.dueDate).toBe('');
  });

  it('rejects a malformed due date and changes nothing', () => {
    const result = store.update('a', { dueDate: '13/01/2030', title: 'Should not apply' });

    expect(result.type).toBe('invalid');
    if (result.type === 'invalid') expect(result.error.code).toBe('invalid-date-format');
    expect(store.get('a')).toEqual(makeTask({ id: 'a', dueDate: '2026-03-01' }));
    expect(persistence.save).not.toHaveBeenCalled();
  });

  it('rejects an impossible calendar date', () => {
    expect(store.update('a', { dueDate: '2026-02-30' }).type).toBe('invalid');
  });

  it('rejects an empty title and changes nothing', () => {
    const result = store.update('a', { title: '  ', priority: Priority.P1 });

    expect(result.type).toBe('invalid');
    if (result.type === 'invalid') expect(result.error.code).toBe('empty-title');
    expect(store.get('a')?.priority).toBe(Priority.P3);
  });

  it('returns not-found for an unknown id', () => {
    expect(store.update('zzz', { notes: 'x' })).toEqual({ type: 'not-found', taskId: 'zzz' });
  });

  it('keeps unknown record fields', () => {
    const { store: s } = openStore([makeTask({ id: 'x', extra: { color: 'teal' } })]);
    s.update('x', { notes: 'n' });
    expect(s.get('x')?.extra).toEqual({ color: 'teal' });
  });
});

describe('listNames', () => {
  it('always includes Inbox', () => {
    const { store } = openStore();
    expect(store.listNames()).toEqual(['Inbox']);
  });

  it('returns the sorted union of Inbox and every task list', () => {
    const { store } = openStore([
      makeTask({ id: 'a', listName: 'Work' }),
      makeTask({ id: 'b', listName: 'Errands' }),
      makeTask({ id: 'c', listName: 'Work' }),
    ]);
    expect(store.listNames()).toEqual(['Errands', 'Inbox', 'Work']);
  });

  it('drops a list once its last task is deleted', () => {
    const { store } = openStore([makeTask({ id: 'a', listName: 'Work' })]);
    store.delete('a');
    expect(store.listNames()).toEqual(['Inbox']);
  });
});

describe('tasksIn', () => {
  it('returns only the named list in store order', () => {
    const { store } = openStore([
      makeTask({ id: 'a', listName: 'Work' }),
      makeTask({ id: 'b', listName: 'Inbox' }),
      makeTask({ id: 'c', listName: 'Work' }),
    ]);
    store.create('Later task', 'Work');

    const ids = store.tasksIn('Work').map(t => t.id);
    expect(ids.slice(0, 2)).toEqual(['a', 'c']);
    expect(ids).toHaveLength(3);
    expect(store.tasksIn('Nowhere')).toEqual([]);
  });
});
