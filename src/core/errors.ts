/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogDigestErrorKind =
  | 'not-found'
  | 'permission-denied'
  | 'invalid-encoding'
  | 'no-matching-files'
  | 'no-entries-parsed'
  | 'analysis-failure'
  | 'invalid-arguments';

export interface LogDigestErrorOptions {
  path?: string;
  cause?: unknown;
}

/**
 * Terminal failure of a single run. The CLI reports it and exits non-zero.
 */
export class LogDigestError extends Error {
  readonly kind: LogDigestErrorKind;
  readonly path?: string;

  constructor(kind: LogDigestErrorKind, message: string, options: LogDigestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LogDigestError';
    this.kind = kind;
    this.path = options.path;
  }
}

export const isLogDigestError = (
  error: unknown,
  kind?: LogDigestErrorKind,
): error is LogDigestError =>
  error instanceof LogDigestError && (kind === undefined || error.kind === kind);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
};

/**
 * Maps Node file-system errors onto not-found / permission-denied.
 * Anything else is returned untouched.
 */
export const toFileSystemError = (error: unknown, path: string): unknown => {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new LogDigestError('not-found', `No such file or directory: ${path}`, {
        path,
        cause: error,
      });
    case 'EACCES':
    case 'EPERM':
      return new LogDigestError('permission-denied', `Permission denied: ${path}`, {
        path,
        cause: error,
      });
    default:
      return error;
  }
};

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
