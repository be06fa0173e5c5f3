/**
 * CLI helpers: argument parsing, id resolution, error handling.
 */

import { Priority, parseDate } from '@docket/core';
import type { TaskId, TaskStore } from '@docket/core';
import * as out from './output.js';

/**
 * Parse a priority argument. "clear" unsets the priority;
 * returns null for anything unrecognised.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.P1;
    case 'medium': case '2': case 'p2': return Priority.P2;
    case 'low': case '3': case 'p3': return Priority.P3;
    case 'clear': case 'none': return Priority.None;
    default: return null;
  }
}

/**
 * Parse a due-date argument into the value handed to the store.
 * "clear" empties the date; text that is not a date is passed through
 * unchanged so the store can reject it.
 */
export function parseDueArg(text: string, now?: Date): string {
  if (text.trim().toLowerCase() === 'clear') return '';
  return parseDate(text, now) ?? text;
}

export type IdLookup =
  | { readonly type: 'found'; readonly id: TaskId }
  | { readonly type: 'not-found'; readonly input: string }
  | { readonly type: 'ambiguous'; readonly input: string; readonly matches: TaskId[] };

/** Resolve a task id from an exact id or a unique prefix */
export function resolveTaskId(store: TaskStore, input: string): IdLookup {
  const needle = input.trim();
  if (!needle) return { type: 'not-found', input };
  if (store.get(needle)) return { type: 'found', id: needle };

  const matches = store.all().map(t => t.id).filter(id => id.startsWith(needle));
  if (matches.length === 1 && matches[0] !== undefined) return { type: 'found', id: matches[0] };
  if (matches.length > 1) return { type: 'ambiguous', input, matches };
  return { type: 'not-found', input };
}

/**
 * Resolve an id argument, printing the problem when it cannot be resolved.
 * Returns null when the caller should stop.
 */
export function requireTaskId(store: TaskStore, input: string): TaskId | null {
  const lookup = resolveTaskId(store, input);
  switch (lookup.type) {
    case 'found':
      return lookup.id;
    case 'not-found':
      out.error(`Could not find task with id ${lookup.input}`);
      return null;
    case 'ambiguous':
      out.error(`Id '${lookup.input}' matches several tasks: ${lookup.matches.join(', ')}`);
      return null;
  }
}

/**
 * Run a command body, reporting any thrown error instead of crashing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    if (err instanceof Error && err.stack) out.debug(err.stack);
  }
}
