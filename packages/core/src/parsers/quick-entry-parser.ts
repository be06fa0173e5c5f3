/**
 * Guesses priority and due date from a quick-entry title by plain substring
 * matching. Priority and date keywords are detected case-insensitively;
 * only the priority markers below are removed from the title, and only
 * when they appear in that exact case. "today"/"tomorrow" stay in the title.
 */

import { Priority } from '../types/priority.js';
import { addDays, formatDate } from './date-parser.js';

const P1_KEYWORDS = ['p1', 'priority 1', 'high'];
const P2_KEYWORDS = ['p2', 'priority 2', 'medium'];
const STRIPPED_MARKERS = ['p1', 'p2', 'high', 'medium'];

export interface QuickEntryGuess {
  readonly title: string;
  readonly priority: Priority;
  readonly dueDate: string; // yyyy-MM-dd or ''
}

function guessPriority(lower: string): Priority {
  if (P1_KEYWORDS.some(k => lower.includes(k))) return Priority.P1;
  if (P2_KEYWORDS.some(k => lower.includes(k))) return Priority.P2;
  return Priority.P3;
}

function guessDueDate(lower: string, now: Date): string {
  if (lower.includes('today')) return formatDate(now);
  if (lower.includes('tomorrow')) return formatDate(addDays(now, 1));
  return '';
}

/** Remove every occurrence of each marker, in order */
export function stripPriorityMarkers(title: string): string {
  let s = title;
  for (const marker of STRIPPED_MARKERS) {
    s = s.replaceAll(marker, '');
  }
  return s.trim();
}

/**
 * @param title - Trimmed, non-empty title as typed
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function guessTaskFields(title: string, now?: Date): QuickEntryGuess {
  const lower = title.toLowerCase();
  const stripped = stripPriorityMarkers(title);

  return {
    // A title made only of markers would otherwise end up empty
    title: stripped || title,
    priority: guessPriority(lower),
    dueDate: guessDueDate(lower, now ?? new Date()),
  };
}
