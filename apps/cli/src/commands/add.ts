import { Command } from 'commander';
import type { StoreAccess } from '../context.js';
import { globalOptions } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createAddCommand(useStore: StoreAccess): Command {
  return new Command('add')
    .description('Add a new task to the current list')
    .argument('<title...>', 'Task title (picks up p1/high, p2/medium, today and tomorrow)')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() => {
      const { list } = globalOptions(cmd);
      const result = useStore(cmd).create(words.join(' '), list);
      out.printResult(result, task =>
        `Task (${task.id}) saved to '${task.listName}'. Use the list command to see your tasks`);
    }));
}
