import type { CorruptStoreError, IOError, ValidationError } from '../errors.js';
import type { Task, TaskId } from './task.js';

/**
 * Outcome of a store operation. A failed save after a successful mutation
 * is not a failure: the change stays in memory and `warning` carries the error.
 */
export type TaskResult<T = Task> =
  | { readonly type: 'success'; readonly data: T; readonly warning: IOError | null }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'invalid'; readonly error: ValidationError };

export type LoadResult =
  | { readonly type: 'success'; readonly tasks: Task[] }
  | { readonly type: 'error'; readonly error: CorruptStoreError | IOError };

export type SaveResult =
  | { readonly type: 'success' }
  | { readonly type: 'error'; readonly error: IOError };

export type CopyResult =
  | { readonly type: 'success'; readonly path: string }
  | { readonly type: 'error'; readonly error: IOError };
