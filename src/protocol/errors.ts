/**
 * Error taxonomy
 *
 * ProtocolError is fatal to a connection. CommandError, PathError and
 * TransferError are recoverable: the session maps each of them to exactly one
 * status code and keeps serving.
 */

import type { StatusName } from './constants.ts';

export type ProtocolErrorCode =
  | 'UNEXPECTED_EOF'
  | 'UNKNOWN_FRAME_TYPE'
  | 'OVERSIZED_LENGTH'
  | 'OUT_OF_ORDER'
  | 'MALFORMED_FRAME';

/**
 * The byte stream can no longer be trusted to be frame-aligned.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * Command text that does not match the grammar.
 */
export class CommandError extends Error {
  /** Usage line(s) for the command word, or for every command */
  readonly usage: string;

  constructor(message: string, usage: string) {
    super(message);
    this.name = 'CommandError';
    this.usage = usage;
  }
}

export type PathErrorCode = 'OUTSIDE_ROOT' | 'NOT_FOUND' | 'NOT_A_DIRECTORY' | 'INVALID_PATH' | 'INACCESSIBLE';

export class PathError extends Error {
  readonly code: PathErrorCode;
  /** The raw path as the user supplied it */
  readonly path: string;

  constructor(code: PathErrorCode, path: string, message: string) {
    super(message);
    this.name = 'PathError';
    this.code = code;
    this.path = path;
  }
}

export type TransferFailure = 'FILE_NOT_FOUND' | 'DIRECTORY_NOT_FOUND' | 'IO_ERROR';

/**
 * Local file I/O failed while a transfer was being prepared or streamed.
 */
export class TransferError extends Error {
  readonly code: TransferFailure;

  constructor(code: TransferFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferError';
    this.code = code;
  }
}

const PATH_ERROR_STATUS: Record<PathErrorCode, StatusName> = {
  OUTSIDE_ROOT: 'OUTSIDE_ROOT',
  NOT_FOUND: 'FILE_NOT_FOUND',
  NOT_A_DIRECTORY: 'NOT_A_DIRECTORY',
  INVALID_PATH: 'BAD_COMMAND',
  INACCESSIBLE: 'IO_ERROR',
};

/** Status code reported for a path error */
export function pathErrorStatus(err: PathError): StatusName {
  return PATH_ERROR_STATUS[err.code];
}

/** Normalize an unknown thrown value into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
