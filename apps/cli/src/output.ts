/**
 * chalk-based output formatting and message helpers.
 */

import chalk from 'chalk';
import { Priority, daysUntil } from '@docket/core';
import type { Task, TaskResult, TaskView } from '@docket/core';

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Formatting functions ---

export function formatCheckbox(isDone: boolean): string {
  return isDone ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.P1: return chalk.red.bold('>>>');
    case Priority.P2: return chalk.yellow('>> ');
    case Priority.P3: return chalk.blue('>  ');
    default: return chalk.dim('·  ');
  }
}

export function formatDueDate(dueDate: string, isDone: boolean, now: Date = new Date()): string {
  if (!dueDate) return '';
  if (isDone) return chalk.dim(`  Due: ${dueDate}`);

  const diff = daysUntil(dueDate, now);
  if (diff === null) return chalk.dim(`  Due: ${dueDate}`);
  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  return chalk.dim(`  Due: ${dueDate}`);
}

/** Title styled by the row's style tag */
export function formatTitle(view: TaskView): string {
  const title = firstLine(view.task.title);
  switch (view.styleTag) {
    case 'Done': return chalk.dim.strikethrough(title);
    case Priority.P1: return chalk.bold(title);
    default: return title;
  }
}

export function formatRow(view: TaskView, now: Date = new Date()): string {
  const { task } = view;
  const id = chalk.dim(`(${task.id})`);
  const recurring = task.isRecurring ? chalk.cyan(' ↻') : '';
  const notes = task.notes ? chalk.dim(' ✎') : '';
  return `${id} ${formatPriority(task.priority)} ${formatCheckbox(task.isDone)} ${formatTitle(view)}`
    + `${formatDueDate(task.dueDate, task.isDone, now)}${recurring}${notes}`;
}

// --- Result output ---

export function printResult(result: TaskResult, describe: (task: Task) => string): void {
  switch (result.type) {
    case 'success':
      success(describe(result.data));
      if (result.warning) warning(`Changes were not saved: ${result.warning.message}`);
      break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'invalid': error(result.error.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.log(chalk.dim(message));
}

// --- Utilities ---

export function firstLine(s: string): string {
  return s.split('\n')[0] ?? '';
}

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
