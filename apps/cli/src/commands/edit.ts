import { Command } from 'commander';
import type { Priority, TaskUpdate } from '@docket/core';
import type { StoreAccess } from '../context.js';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg, requireTaskId } from '../helpers.js';

export type EditOptions = {
  title?: string;
  due?: string;
  priority?: string;
  notes?: string;
  recurring?: boolean;
};

export function createEditCommand(useStore: StoreAccess): Command {
  return new Command('edit')
    .description("Change a task's details")
    .argument('<id>', 'The task id; a unique prefix is enough')
    .option('-t, --title <text>', 'New title')
    .option('-d, --due <date>', "Due date (YYYY-MM-DD, today, tomorrow, or 'clear')")
    .option('-p, --priority <level>', "Priority (p1, p2, p3, high, medium, low, 1, 2, 3, or 'clear')")
    .option('-n, --notes <text>', "Free-form notes ('' to clear)")
    .option('-r, --recurring', 'Mark the task as recurring')
    .option('--no-recurring', 'Mark the task as not recurring')
    .action((input: string, opts: EditOptions, cmd: Command) => $try(() => {
      let priority: Priority | undefined;
      if (opts.priority !== undefined) {
        const parsed = parsePriorityArg(opts.priority);
        if (parsed === null) {
          out.error(`Unknown priority '${opts.priority}'. Use p1, p2, p3, high, medium, low or clear`);
          return;
        }
        priority = parsed;
      }

      const fields: TaskUpdate = {
        ...(opts.title !== undefined ? { title: opts.title } : {}),
        ...(opts.due !== undefined ? { dueDate: parseDueArg(opts.due) } : {}),
        ...(priority !== undefined ? { priority } : {}),
        ...(opts.notes !== undefined ? { notes: opts.notes } : {}),
        ...(opts.recurring !== undefined ? { isRecurring: opts.recurring } : {}),
      };
      if (Object.keys(fields).length === 0) {
        out.error('Nothing to change. Pass --title, --due, --priority, --notes or --recurring');
        return;
      }

      const store = useStore(cmd);
      const id = requireTaskId(store, input);
      if (id === null) return;
      out.printResult(store.update(id, fields), task => `Updated task (${task.id})`);
    }));
}
