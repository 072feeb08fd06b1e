/**
 * @fileoverview Error taxonomy and result type for editor operations
 */

import { EditorErrorKind } from './types/editor-types';

/**
 * Error carrying an {@link EditorErrorKind} so callers can branch on it
 */
class EditorError extends Error {
  public readonly kind: EditorErrorKind;
  public readonly path: string | null;

  constructor(kind: EditorErrorKind, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EditorError';
    this.kind = kind;
    this.path = options.path ?? null;
  }
}

type Ok<T> = { ok: true; value: T };
type Fail<E> = { ok: false; error: E };

/**
 * Outcome of an operation that can fail for reasons outside the program
 * (I/O, user input). Programming errors still throw.
 */
type Result<T, E = EditorError> = Ok<T> | Fail<E>;

function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

function fail<E = EditorError>(error: E): Fail<E> {
  return { ok: false, error };
}

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = (error as { code: unknown }).code;
    return typeof code === 'string' ? code : null;
  }
  return null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a Node fs error onto the editor taxonomy
 */
function fromNodeError(error: unknown, action: string, filePath: string): EditorError {
  const code = errorCode(error);
  if (code === 'ENOENT') {
    return new EditorError(EditorErrorKind.FILE_NOT_FOUND, `File not found: ${filePath}`, {
      path: filePath,
      cause: error
    });
  }
  return new EditorError(
    EditorErrorKind.IO_FAILURE,
    `Failed to ${action} ${filePath}: ${errorMessage(error)}`,
    { path: filePath, cause: error }
  );
}

export {
  EditorError,
  ok,
  fail,
  fromNodeError,
  errorCode,
  errorMessage,
  type Result,
  type Ok,
  type Fail
};
