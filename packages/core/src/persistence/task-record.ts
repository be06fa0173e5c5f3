import { z } from 'zod';
import type { Task } from '../types/task.js';
import { DEFAULT_LIST } from '../types/task.js';
import { Priority, isPriority } from '../types/priority.js';

/**
 * On-disk record layout. Keys are snake_case and written in this order;
 * unknown keys follow them.
 */
const RECORD_KEYS = [
  'id', 'title', 'due_date', 'priority', 'is_done', 'notes', 'is_recurring', 'list_name',
] as const;

type RecordKey = (typeof RECORD_KEYS)[number];
type RawRecord = Readonly<Record<string, unknown>>;

const KNOWN_KEYS = new Set<string>(RECORD_KEYS);

// Only the id is required; every other field falls back to its default
const taskFileSchema = z.array(z.object({ id: z.string().min(1) }).passthrough());

const prioritySchema = z.custom<Priority>(isPriority);

export type ParsedTaskFile =
  | { success: true; tasks: Task[] }
  | { success: false; error: z.ZodError };

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unknownEntries(obj: RawRecord): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([key]) => !KNOWN_KEYS.has(key)));
}

/** Map the parsed JSON of a task file to tasks */
export function parseTaskFile(data: unknown): ParsedTaskFile {
  const result = taskFileSchema.safeParse(data);
  if (!result.success) return { success: false, error: result.error };

  // zod rebuilds objects and skips some keys, so read from the parsed JSON itself
  const entries: unknown[] = Array.isArray(data) ? data : [];
  return { success: true, tasks: entries.filter(isRawRecord).map(recordToTask) };
}

/**
 * Map one record to a Task. A known field holding a value of the wrong type
 * gets its default, and the stored value is kept in `rawFields`.
 */
function recordToTask(record: RawRecord): Task {
  const rawFields: Record<string, unknown> = {};

  function read<T>(key: RecordKey, schema: z.ZodType<T>, fallback: T): T {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;
    rawFields[key] = value;
    return fallback;
  }

  const task: Task = {
    id: read('id', z.string(), ''),
    title: read('title', z.string(), ''),
    listName: read('list_name', z.string(), '') || DEFAULT_LIST,
    priority: read('priority', prioritySchema, Priority.None),
    dueDate: read('due_date', z.string(), ''),
    isDone: read('is_done', z.boolean(), false),
    notes: read('notes', z.string(), ''),
    isRecurring: read('is_recurring', z.boolean(), false),
  };

  const extra = unknownEntries(record);
  return {
    ...task,
    ...(Object.keys(rawFields).length > 0 ? { rawFields } : {}),
    ...(Object.keys(extra).length > 0 ? { extra } : {}),
  };
}

/** Map a Task to its record; known keys first, then preserved extras */
export function taskToRecord(task: Task): Record<string, unknown> {
  return {
    id: task.id,
    title: task.title,
    due_date: task.dueDate,
    priority: task.priority,
    is_done: task.isDone,
    notes: task.notes,
    is_recurring: task.isRecurring,
    list_name: task.listName,
    ...task.rawFields,
    ...(task.extra ? unknownEntries(task.extra) : {}),
  };
}

export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unexpected content';
  const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `${path}: ${issue.message}`;
}
