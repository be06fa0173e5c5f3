import { Command } from 'commander';
import type { StoreAccess } from '../context.js';
import * as out from '../output.js';
import { $try, requireTaskId } from '../helpers.js';

export function createDeleteCommand(useStore: StoreAccess): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<ids...>', 'The id(s) of the task(s) to delete; a unique prefix is enough')
    .action((inputs: string[], _opts: unknown, cmd: Command) => $try(() => {
      const store = useStore(cmd);
      for (const input of inputs) {
        const id = requireTaskId(store, input);
        if (id === null) continue;
        out.printResult(store.delete(id), task =>
          `Deleted task (${task.id}) ${out.truncate(out.firstLine(task.title), 40)}`);
      }
    }));
}
