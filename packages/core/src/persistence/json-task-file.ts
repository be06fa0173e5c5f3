/**
 * Synchronous JSON persistence for the task store. The whole collection is
 * rewritten on every save through a temp file + rename, so an interrupted
 * or failed write leaves the previous file in place.
 */

import { copyFileSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { CorruptStoreError, IOError } from '../errors.js';
import type { Task } from '../types/task.js';
import type { CopyResult, LoadResult, SaveResult } from '../types/results.js';
import type { TaskPersistence } from './task-persistence.js';
import { describeIssue, parseTaskFile, taskToRecord } from './task-record.js';

const INDENT = 4;

/** Format a date as yyyy-MM-ddTHH-mm-ss (filesystem-safe) */
function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Serialize tasks exactly as they are written to disk */
export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(taskToRecord), null, INDENT) + '\n';
}

/** Parse file content into tasks; throws CorruptStoreError */
export function deserializeTasks(text: string, filePath: string): Task[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new CorruptStoreError(filePath, 'not valid JSON', { cause: err });
  }

  const result = parseTaskFile(parsed);
  if (!result.success) {
    throw new CorruptStoreError(filePath, describeIssue(result.error), { cause: result.error });
  }
  return result.tasks;
}

export class JsonTaskFile implements TaskPersistence {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** A missing file is a fresh start, not an error */
  load(): LoadResult {
    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return { type: 'success', tasks: [] };
      return { type: 'error', error: new IOError(this.filePath, 'read', { cause: err }) };
    }

    try {
      return { type: 'success', tasks: deserializeTasks(text, this.filePath) };
    } catch (err: unknown) {
      if (err instanceof CorruptStoreError) return { type: 'error', error: err };
      throw err;
    }
  }

  save(tasks: readonly Task[]): SaveResult {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, serializeTasks(tasks), 'utf-8');
      renameSync(tmpPath, this.filePath);
      return { type: 'success' };
    } catch (err: unknown) {
      const cause = this.removeTemp(tmpPath, err);
      return { type: 'error', error: new IOError(this.filePath, 'write', { cause }) };
    }
  }

  /** Copy the current file aside so the next save cannot overwrite it */
  quarantine(now: Date = new Date()): CopyResult {
    const dest = `${this.filePath}.corrupt-${formatTimestamp(now)}`;
    try {
      copyFileSync(this.filePath, dest);
      return { type: 'success', path: dest };
    } catch (err: unknown) {
      return { type: 'error', error: new IOError(dest, 'copy', { cause: err }) };
    }
  }

  /** Returns the error to report: the write error, joined by any cleanup error */
  private removeTemp(path: string, writeError: unknown): unknown {
    try {
      rmSync(path, { force: true });
      return writeError;
    } catch (cleanupError: unknown) {
      const message = writeError instanceof Error ? writeError.message : 'write failed';
      return new AggregateError([writeError, cleanupError], message);
    }
  }
}
