/**
 * Error taxonomy shared by the store and its persistence adapters.
 * Validation problems are plain values; file problems are Error subclasses
 * so they keep a cause and a stack for the shell to print.
 */

export type ValidationErrorCode = 'empty-title' | 'invalid-date-format';

export interface ValidationError {
  readonly code: ValidationErrorCode;
  readonly field: 'title' | 'dueDate';
  readonly message: string;
}

export function emptyTitle(): ValidationError {
  return { code: 'empty-title', field: 'title', message: 'Title cannot be empty' };
}

export function invalidDateFormat(value: string): ValidationError {
  return {
    code: 'invalid-date-format',
    field: 'dueDate',
    message: `Due date '${value}' must be in YYYY-MM-DD format or left empty`,
  };
}

/** The data file exists but cannot be read as a task list */
export class CorruptStoreError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not read tasks from ${filePath}: ${reason}`, options);
    this.name = 'CorruptStoreError';
    this.filePath = filePath;
  }
}

export type IOOperation = 'read' | 'write' | 'copy';

/** The data file could not be read or written */
export class IOError extends Error {
  readonly filePath: string;
  readonly operation: IOOperation;

  constructor(filePath: string, operation: IOOperation, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} ${filePath}${detail}`, options);
    this.name = 'IOError';
    this.filePath = filePath;
    this.operation = operation;
  }
}
