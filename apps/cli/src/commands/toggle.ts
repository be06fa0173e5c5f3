import { Command } from 'commander';
import type { StoreAccess } from '../context.js';
import * as out from '../output.js';
import { $try, requireTaskId } from '../helpers.js';

export function createToggleCommand(useStore: StoreAccess): Command {
  return new Command('toggle')
    .description('Mark one or more tasks done, or open again')
    .argument('<ids...>', 'The id(s) of the task(s) to toggle; a unique prefix is enough')
    .action((inputs: string[], _opts: unknown, cmd: Command) => $try(() => {
      const store = useStore(cmd);
      for (const input of inputs) {
        const id = requireTaskId(store, input);
        if (id === null) continue;
        out.printResult(store.toggleDone(id), task =>
          `Task (${task.id}) marked ${task.isDone ? 'done' : 'pending'}`);
      }
    }));
}
