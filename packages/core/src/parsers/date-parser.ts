/**
 * Calendar-date helpers. Dates are local calendar days written as yyyy-MM-dd.
 */

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/**
 * True when the input is yyyy-MM-dd and names a real calendar day
 * (rejects 2026-02-30, 2026-13-01, 13/01/2030).
 */
export function isValidDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;

  const [y, m, d] = input.split('-').map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;
  if (y < 1) return false;

  const candidate = new Date(y, m - 1, d);
  // Years below 100 are mapped to 19xx by the Date constructor
  candidate.setFullYear(y);
  return formatDate(candidate) === input;
}

/**
 * Resolve a due-date argument: "today", "tomorrow" or yyyy-MM-dd.
 * Returns null for anything else.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const today = new Date(now ?? new Date());
  // Zero out time component for consistent date math
  today.setHours(0, 0, 0, 0);

  const normalized = input.trim().toLowerCase();
  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    default:
      return isValidDate(input.trim()) ? input.trim() : null;
  }
}

function utcDay(y: number, monthIndex: number, d: number): number {
  const t = new Date(0);
  t.setUTCFullYear(y, monthIndex, d);
  return t.getTime();
}

/** Whole calendar days from `now` until a yyyy-MM-dd date; null for an invalid date */
export function daysUntil(dueDate: string, now: Date = new Date()): number | null {
  if (!isValidDate(dueDate)) return null;

  const due = utcDay(Number(dueDate.slice(0, 4)), Number(dueDate.slice(5, 7)) - 1, Number(dueDate.slice(8, 10)));
  const today = utcDay(now.getFullYear(), now.getMonth(), now.getDate());
  return Math.round((due - today) / 86_400_000);
}
