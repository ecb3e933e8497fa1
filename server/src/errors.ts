/**
 * Error taxonomy shared by the sandbox, the editor and the tool layer.
 *
 * Every classified failure carries a `code` so the tool layer can report it
 * as a structured MCP error without string matching. Unclassified I/O errors
 * are left as the `NodeJS.ErrnoException` fs threw.
 *
 * @module errors
 */

export type FsGateErrorCode =
  | 'ACCESS_DENIED'
  | 'INVALID_PATH'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'OUT_OF_RANGE'
  | 'NO_HISTORY'
  | 'INVALID_ARGUMENT';

export abstract class FsGateError extends Error {
  abstract readonly code: FsGateErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Path resolves outside every allowed root. */
export class AccessDeniedError extends FsGateError {
  readonly code = 'ACCESS_DENIED';

  constructor(readonly requestedPath: string, reason: string) {
    super(`Access denied - ${reason}: ${requestedPath}`);
  }
}

/** Path syntax, home directory, working directory or ancestors could not be resolved. */
export class InvalidPathError extends FsGateError {
  readonly code = 'INVALID_PATH';

  constructor(readonly requestedPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid path - ${reason}: ${requestedPath}`, options);
  }
}

export class NotFoundError extends FsGateError {
  readonly code = 'NOT_FOUND';
}

export class AmbiguousMatchError extends FsGateError {
  readonly code = 'AMBIGUOUS_MATCH';

  constructor(readonly occurrences: number) {
    super(`String appears ${occurrences} times in file; it must appear exactly once`);
  }
}

export class OutOfRangeError extends FsGateError {
  readonly code = 'OUT_OF_RANGE';

  constructor(readonly position: number, readonly lineCount: number) {
    super(
      `Invalid line number ${position}; file has ${lineCount} lines ` +
      `(use 0 to insert at beginning, ${lineCount} to append)`
    );
  }
}

export class NoHistoryError extends FsGateError {
  readonly code = 'NO_HISTORY';

  constructor(readonly filePath: string) {
    super(`No edit history found for file: ${filePath}`);
  }
}

export class InvalidArgumentError extends FsGateError {
  readonly code = 'INVALID_ARGUMENT';
}

export function isFsGateError(error: unknown): error is FsGateError {
  return error instanceof FsGateError;
}

/** Narrow an unknown catch value to a Node system error carrying an errno `code`. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isErrnoException(error) && error.code !== undefined && codes.includes(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
