import type { Command } from 'commander';
import { CorruptStoreError, JsonTaskFile, TaskStore, normalizeListName } from '@docket/core';
import type { ListName, OpenResult } from '@docket/core';
import { resolveDataPath } from './config.js';
import * as out from './output.js';

export type GlobalOptions = {
  list: ListName;
  file?: string;
  verbose?: boolean;
};

/** Opens the store kept in a data file */
export type StoreOpener = (filePath: string) => OpenResult;

/** Returns the store for this run, opening it on first use */
export type StoreAccess = (cmd: Command) => TaskStore;

export function openJsonStore(filePath: string): OpenResult {
  return TaskStore.open(new JsonTaskFile(filePath));
}

export function globalOptions(cmd: Command): GlobalOptions {
  const g = cmd.optsWithGlobals<Partial<GlobalOptions>>();
  return { list: normalizeListName(g.list), file: g.file, verbose: g.verbose };
}

function reportOpenProblems(opened: OpenResult): void {
  const { error, quarantinedTo } = opened;
  if (!error) return;

  out.warning(error.message);
  if (quarantinedTo) {
    out.warning(`The unreadable file was copied to ${quarantinedTo}`);
  } else if (error instanceof CorruptStoreError) {
    out.warning('The unreadable file could not be copied aside and will be replaced by the next change');
  }
  out.warning('Starting with an empty task list');
}

export function createStoreAccess(opener: StoreOpener, env: NodeJS.ProcessEnv): StoreAccess {
  let store: TaskStore | null = null;

  return (cmd: Command) => {
    if (store) return store;

    const filePath = resolveDataPath(globalOptions(cmd).file, env);
    out.debug(`Using data file ${filePath}`);
    const opened = opener(filePath);
    reportOpenProblems(opened);
    store = opened.store;
    return store;
  };
}
