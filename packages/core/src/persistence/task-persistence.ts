import type { Task } from '../types/task.js';
import type { CopyResult, LoadResult, SaveResult } from '../types/results.js';

/** Where the store reads its tasks at startup and writes them after each change */
export interface TaskPersistence {
  load(): LoadResult;
  save(tasks: readonly Task[]): SaveResult;
  /** Keep a copy of unreadable data before it gets overwritten */
  quarantine(): CopyResult;
}
