import { Command } from 'commander';
import chalk from 'chalk';
import { viewList } from '@docket/core';
import type { ListName, ShowFilter } from '@docket/core';
import type { StoreAccess } from '../context.js';
import { globalOptions } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListCommand(useStore: StoreAccess): Command {
  return new Command('list')
    .description('Show the tasks of the current list')
    .option('--pending', 'Show only open tasks')
    .option('--done', 'Show only completed tasks')
    .action((opts: { pending?: boolean; done?: boolean }, cmd: Command) => $try(() => {
      if (opts.pending && opts.done) {
        out.error('Cannot use both --pending and --done at the same time');
        return;
      }

      const { list } = globalOptions(cmd);
      const show: ShowFilter = opts.pending ? 'pending' : opts.done ? 'done' : 'all';
      const views = viewList(useStore(cmd), list, { show });

      console.log(chalk.bold.underline(list));
      if (views.length === 0) {
        out.info(emptyMessage(show, list));
        return;
      }

      const now = new Date();
      for (const view of views) {
        console.log(out.formatRow(view, now));
      }
    }));
}

function emptyMessage(show: ShowFilter, list: ListName): string {
  switch (show) {
    case 'pending': return `No pending tasks in '${list}'`;
    case 'done': return `No done tasks in '${list}'`;
    case 'all': return `No tasks in '${list}' yet... use the add command to create one`;
  }
}
