/**
 * In-memory task collection. The store is the only owner of Task records;
 * every successful mutation is written through the persistence adapter
 * before the call returns.
 */

import type { IOError } from '../errors.js';
import { CorruptStoreError, emptyTitle } from '../errors.js';
import type { TaskPersistence } from '../persistence/task-persistence.js';
import type { TaskResult } from '../types/results.js';
import type { ListName, Task, TaskId, TaskUpdate } from '../types/task.js';
import { DEFAULT_LIST } from '../types/task.js';
import {
  applyUpdate, createTask, generateId, validateUpdate, withToggledDone,
} from './task-helpers.js';

export interface TaskStoreOptions {
  /** Override "now" for testing. Defaults to the system clock. */
  readonly clock?: () => Date;
}

export interface OpenResult {
  readonly store: TaskStore;
  /** Why the store started empty, if loading failed */
  readonly error: CorruptStoreError | IOError | null;
  /** Where unreadable data was copied before the store started empty */
  readonly quarantinedTo: string | null;
}

export class TaskStore {
  private tasks: Task[];
  private readonly persistence: TaskPersistence;
  private readonly clock: () => Date;
  /** Every id this instance has seen, including deleted ones */
  private readonly issuedIds = new Set<TaskId>();

  constructor(persistence: TaskPersistence, tasks: readonly Task[] = [], options: TaskStoreOptions = {}) {
    this.persistence = persistence;
    this.clock = options.clock ?? (() => new Date());
    this.tasks = [...tasks];
    for (const t of this.tasks) this.issuedIds.add(t.id);
  }

  /**
   * Load tasks once and build a store. A failed load never throws: the store
   * starts empty and the error is handed back for the caller to report.
   */
  static open(persistence: TaskPersistence, options: TaskStoreOptions = {}): OpenResult {
    const loaded = persistence.load();
    if (loaded.type === 'success') {
      return { store: new TaskStore(persistence, loaded.tasks, options), error: null, quarantinedTo: null };
    }

    let quarantinedTo: string | null = null;
    if (loaded.error instanceof CorruptStoreError) {
      const copy = persistence.quarantine();
      if (copy.type === 'success') quarantinedTo = copy.path;
    }
    return { store: new TaskStore(persistence, [], options), error: loaded.error, quarantinedTo };
  }

  // ── Mutations ─────────────────────────────────────────

  /** Quick entry: guesses priority and due date from the title */
  create(title: string, listName: ListName): TaskResult {
    const trimmed = title.trim();
    if (!trimmed) return { type: 'invalid', error: emptyTitle() };

    const id = generateId(candidate => this.issuedIds.has(candidate));
    const task = createTask(id, trimmed, listName, this.clock());
    this.issuedIds.add(id);
    this.tasks.push(task);
    return this.committed(task);
  }

  toggleDone(id: TaskId): TaskResult {
    const idx = this.indexOf(id);
    if (idx === -1) return { type: 'not-found', taskId: id };

    const updated = withToggledDone(this.at(idx));
    this.tasks[idx] = updated;
    return this.committed(updated);
  }

  delete(id: TaskId): TaskResult {
    const idx = this.indexOf(id);
    if (idx === -1) return { type: 'not-found', taskId: id };

    const removed = this.at(idx);
    this.tasks.splice(idx, 1);
    return this.committed(removed);
  }

  /** All-or-nothing: a rejected edit leaves every field as it was */
  update(id: TaskId, fields: TaskUpdate): TaskResult {
    const idx = this.indexOf(id);
    if (idx === -1) return { type: 'not-found', taskId: id };

    const error = validateUpdate(fields);
    if (error) return { type: 'invalid', error };

    const updated = applyUpdate(this.at(idx), fields);
    this.tasks[idx] = updated;
    return this.committed(updated);
  }

  // ── Queries ───────────────────────────────────────────

  /** The default list plus every list a task refers to, sorted */
  listNames(): ListName[] {
    const names = new Set<ListName>([DEFAULT_LIST]);
    for (const t of this.tasks) names.add(t.listName);
    return [...names].sort();
  }

  /** Tasks of one list in store order */
  tasksIn(listName: ListName): Task[] {
    return this.tasks.filter(t => t.listName === listName);
  }

  get(id: TaskId): Task | null {
    return this.tasks.find(t => t.id === id) ?? null;
  }

  all(): Task[] {
    return [...this.tasks];
  }

  get size(): number {
    return this.tasks.length;
  }

  // ── Private ───────────────────────────────────────────

  /** Save after a mutation; a failed save is reported, not rolled back */
  private committed(task: Task): TaskResult {
    const saved = this.persistence.save([...this.tasks]);
    return { type: 'success', data: task, warning: saved.type === 'error' ? saved.error : null };
  }

  private indexOf(id: TaskId): number {
    return this.tasks.findIndex(t => t.id === id);
  }

  private at(idx: number): Task {
    const task = this.tasks[idx];
    if (!task) throw new RangeError(`No task at index ${idx}`);
    return task;
  }
}
