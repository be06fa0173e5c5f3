import { Command } from 'commander';
import { DEFAULT_LIST } from '@docket/core';
import { DATA_FILE_ENV } from './config.js';
import { createStoreAccess, openJsonStore } from './context.js';
import type { GlobalOptions, StoreOpener } from './context.js';
import * as out from './output.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createToggleCommand } from './commands/toggle.js';
import { createDeleteCommand } from './commands/delete.js';
import { createEditCommand } from './commands/edit.js';
import { createShowCommand } from './commands/show.js';
import { createListsCommand } from './commands/lists.js';

export function createProgram(
  opener: StoreOpener = openJsonStore,
  env: NodeJS.ProcessEnv = process.env,
): Command {
  const useStore = createStoreAccess(opener, env);

  const program = new Command()
    .name('docket')
    .description('Single-user task manager')
    .version('1.0.0')
    .option('-l, --list <name>', 'The list to work in', DEFAULT_LIST)
    .option('-f, --file <path>', `Data file (default: $${DATA_FILE_ENV}, then the platform data directory)`)
    .option('-v, --verbose', 'Print debug output');

  program.hook('preAction', (thisCommand: Command) => {
    out.setVerbose(thisCommand.opts<Partial<GlobalOptions>>().verbose === true);
  });

  // Register commands; a bare invocation lists the current list
  program.addCommand(createAddCommand(useStore));
  program.addCommand(createListCommand(useStore), { isDefault: true });
  program.addCommand(createToggleCommand(useStore));
  program.addCommand(createDeleteCommand(useStore));
  program.addCommand(createEditCommand(useStore));
  program.addCommand(createShowCommand(useStore));
  program.addCommand(createListsCommand(useStore));

  return program;
}
