/**
 * Error kinds raised while building an update
 */

import { AppError } from './logger.js';

/**
 * An archive entry or file system path could not be read. Fatal.
 */
export class ReadError extends AppError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'READ_ERROR', 1, { path, cause: describeCause(cause) });
    this.name = 'ReadError';
  }
}

/**
 * A user selection was malformed or out of range. The prompt that raised it
 * asks again; it never leaves the placement step.
 */
export class ValidationError extends AppError {
  constructor(message: string, public readonly input: string) {
    super(message, 'VALIDATION_ERROR', 1, { input });
    this.name = 'ValidationError';
  }
}

/**
 * Writing into the staging area failed. Fatal.
 */
export class CopyError extends AppError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly destination: string,
    cause?: unknown
  ) {
    super(message, 'COPY_ERROR', 1, { source, destination, cause: describeCause(cause) });
    this.name = 'CopyError';
  }
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
