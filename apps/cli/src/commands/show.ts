import { Command } from 'commander';
import chalk from 'chalk';
import { PriorityName, taskToRecord, toTaskView } from '@docket/core';
import type { Task } from '@docket/core';
import type { StoreAccess } from '../context.js';
import * as out from '../output.js';
import { $try, requireTaskId } from '../helpers.js';

export function createShowCommand(useStore: StoreAccess): Command {
  return new Command('show')
    .description('Show every detail of a task')
    .argument('<id>', 'The task id; a unique prefix is enough')
    .option('--json', 'Output the stored record as JSON')
    .action((input: string, opts: { json?: boolean }, cmd: Command) => $try(() => {
      const store = useStore(cmd);
      const id = requireTaskId(store, input);
      if (id === null) return;

      const task = store.get(id);
      if (!task) {
        out.error(`Could not find task with id ${id}`);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(taskToRecord(task), null, 2));
      } else {
        outputHumanReadable(task);
      }
    }));
}

function field(label: string, value: string): void {
  console.log(`${chalk.bold(`${label}:`.padEnd(13))}${value}`);
}

function outputHumanReadable(task: Task): void {
  const view = toTaskView(task);
  const priority = task.priority ? `${PriorityName[task.priority]} (${task.priority})` : PriorityName[task.priority];

  field('ID', task.id);
  field('List', task.listName);
  field('Status', `${out.formatCheckbox(task.isDone)} ${view.statusLabel}`);
  field('Priority', priority);
  field('Due', task.dueDate || '-');
  field('Recurring', task.isRecurring ? 'yes' : 'no');
  console.log(chalk.bold('Title:'));
  console.log(task.title);
  if (task.notes) {
    console.log(chalk.bold('Notes:'));
    console.log(task.notes);
  }
}
