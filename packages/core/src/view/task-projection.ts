/**
 * Display ordering for one list: open before done, then priority
 * (P1, P2, P3, unset), then due date with undated tasks last.
 * Equal keys keep their input order.
 */

import type { Task, ListName } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { PriorityRank } from '../types/priority.js';
import type { TaskStore } from '../store/task-store.js';

export type StatusLabel = 'Done' | 'Pending';
export type StyleTag = 'Done' | Priority;

export interface TaskView {
  readonly task: Task;
  readonly statusLabel: StatusLabel;
  /** Row styling hint for the presentation layer */
  readonly styleTag: StyleTag;
}

export type ShowFilter = 'all' | 'pending' | 'done';

export interface ProjectionOptions {
  readonly show?: ShowFilter;
}

/** Concrete dates ascending, empty after all of them */
function compareDueDates(a: string, b: string): number {
  if (a === b) return 0;
  if (!a) return 1;
  if (!b) return -1;
  return a < b ? -1 : 1;
}

export function compareForDisplay(a: Task, b: Task): number {
  if (a.isDone !== b.isDone) return a.isDone ? 1 : -1;

  const p = PriorityRank[a.priority] - PriorityRank[b.priority];
  if (p !== 0) return p;

  return compareDueDates(a.dueDate, b.dueDate);
}

function matchesShow(task: Task, show: ShowFilter): boolean {
  switch (show) {
    case 'all': return true;
    case 'pending': return !task.isDone;
    case 'done': return task.isDone;
  }
}

export function toTaskView(task: Task): TaskView {
  return {
    task,
    statusLabel: task.isDone ? 'Done' : 'Pending',
    styleTag: task.isDone ? 'Done' : task.priority,
  };
}

/** Sort and annotate tasks for display. Pure; the input is not modified. */
export function projectTasks(tasks: readonly Task[], options: ProjectionOptions = {}): TaskView[] {
  const show = options.show ?? 'all';
  return tasks
    .filter(t => matchesShow(t, show))
    .sort(compareForDisplay)
    .map(toTaskView);
}

/** Projection of one list of a store */
export function viewList(store: TaskStore, listName: ListName, options?: ProjectionOptions): TaskView[] {
  return projectTasks(store.tasksIn(listName), options);
}
