import type { Priority } from './priority.js';

export type TaskId = string;
export type ListName = string;

export const DEFAULT_LIST: ListName = 'Inbox';

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly listName: ListName;
  readonly priority: Priority;
  readonly dueDate: string; // yyyy-MM-dd or ''
  readonly isDone: boolean;
  readonly notes: string;
  /** Stored only; nothing schedules recurrences */
  readonly isRecurring: boolean;
  /** Stored values of known record keys that could not be read; written back until the field changes */
  readonly rawFields?: Readonly<Record<string, unknown>>;
  /** Record keys this version does not know, written back unchanged */
  readonly extra?: Readonly<Record<string, unknown>>;
}

/** Fields a detail edit may change */
export interface TaskUpdate {
  readonly title?: string;
  readonly dueDate?: string;
  readonly priority?: Priority;
  readonly isRecurring?: boolean;
  readonly notes?: string;
}
