import { randomInt } from 'node:crypto';
import type { ListName, Task, TaskId, TaskUpdate } from '../types/task.js';
import { DEFAULT_LIST } from '../types/task.js';
import { guessTaskFields } from '../parsers/quick-entry-parser.js';
import { isValidDate } from '../parsers/date-parser.js';
import type { ValidationError } from '../errors.js';
import { emptyTitle, invalidDateFormat } from '../errors.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 6;

/** Generate a random task ID, retrying while `isTaken` rejects it */
export function generateId(isTaken: (id: TaskId) => boolean): TaskId {
  let id: string;
  do {
    id = '';
    for (let i = 0; i < ID_LENGTH; i++) {
      id += ID_CHARS.charAt(randomInt(ID_CHARS.length));
    }
  } while (isTaken(id));
  return id;
}

/** Blank list names fall back to the default list */
export function normalizeListName(listName: string | null | undefined): ListName {
  return listName?.trim() ? listName : DEFAULT_LIST;
}

/** Create a new Task from a trimmed, non-empty quick-entry title */
export function createTask(id: TaskId, title: string, listName: ListName, now?: Date): Task {
  const guess = guessTaskFields(title, now);
  return {
    id,
    title: guess.title,
    listName: normalizeListName(listName),
    priority: guess.priority,
    dueDate: guess.dueDate,
    isDone: false,
    notes: '',
    isRecurring: false,
  };
}

/** Check an edit before anything is applied; null when it is acceptable */
export function validateUpdate(fields: TaskUpdate): ValidationError | null {
  if (fields.title !== undefined && !fields.title.trim()) return emptyTitle();
  if (fields.dueDate && !isValidDate(fields.dueDate)) return invalidDateFormat(fields.dueDate);
  return null;
}

// Record key written for each editable field
const UPDATE_RECORD_KEYS = [
  ['title', 'title'],
  ['dueDate', 'due_date'],
  ['priority', 'priority'],
  ['isRecurring', 'is_recurring'],
  ['notes', 'notes'],
] as const;

/** Drop unreadable stored values that an edit has replaced */
function withoutRawFields(task: Task, keys: readonly string[]): Task {
  const { rawFields, ...base } = task;
  if (!rawFields) return task;
  const kept = Object.fromEntries(Object.entries(rawFields).filter(([key]) => !keys.includes(key)));
  return Object.keys(kept).length > 0 ? { ...base, rawFields: kept } : base;
}

/** Return a copy of the task with the edit applied */
export function applyUpdate(task: Task, fields: TaskUpdate): Task {
  const edited = UPDATE_RECORD_KEYS.filter(([field]) => fields[field] !== undefined).map(([, key]) => key);
  return {
    ...withoutRawFields(task, edited),
    ...(fields.title !== undefined ? { title: fields.title.trim() } : {}),
    ...(fields.dueDate !== undefined ? { dueDate: fields.dueDate } : {}),
    ...(fields.priority !== undefined ? { priority: fields.priority } : {}),
    ...(fields.isRecurring !== undefined ? { isRecurring: fields.isRecurring } : {}),
    ...(fields.notes !== undefined ? { notes: fields.notes } : {}),
  };
}

/** Return a copy of the task with its completion flipped */
export function withToggledDone(task: Task): Task {
  return { ...withoutRawFields(task, ['is_done']), isDone: !task.isDone };
}
