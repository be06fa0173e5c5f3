import { Command } from 'commander';
import chalk from 'chalk';
import type { StoreAccess } from '../context.js';
import { globalOptions } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListsCommand(useStore: StoreAccess): Command {
  return new Command('lists')
    .description('Show every list that holds tasks')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const { list: current } = globalOptions(cmd);
      const store = useStore(cmd);
      const names = store.listNames();

      out.info('Available lists:');
      for (const name of names) {
        const pending = store.tasksIn(name).filter(t => !t.isDone).length;
        const label = name === current ? chalk.bold(`${name} (current)`) : name;
        console.log(`  ${label}  ${chalk.dim(`${pending} pending`)}`);
      }

      // A list only exists while it holds tasks
      if (!names.includes(current)) {
        console.log(`  ${chalk.bold(`${current} (current, empty)`)}`);
      }
    }));
}
