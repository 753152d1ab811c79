/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { LogDigestError, formatErrorMessage, isLogDigestError, toFileSystemError } from './errors.js';

const fsError = (code: string): NodeJS.ErrnoException =>
  Object.assign(new Error(`${code}: failure`), { code });

describe('toFileSystemError', () => {
  it('maps missing paths to not-found', () => {
    const error = toFileSystemError(fsError('ENOENT'), '/logs/app.log');
    expect(isLogDigestError(error, 'not-found')).toBe(true);
    expect(formatErrorMessage(error)).toBe('No such file or directory: /logs/app.log');
  });

  it('maps access errors to permission-denied', () => {
    for (const code of ['EACCES', 'EPERM']) {
      const original = fsError(code);
      const error = toFileSystemError(original, '/logs/secret.log');
      if (!isLogDigestError(error, 'permission-denied')) {
        throw new Error(`expected permission-denied for ${code}`);
      }
      expect(error.path).toBe('/logs/secret.log');
      expect(error.cause).toBe(original);
    }
  });

  it('returns other errors untouched', () => {
    const original = fsError('EMFILE');
    expect(toFileSystemError(original, '/x')).toBe(original);
    expect(toFileSystemError('text', '/x')).toBe('text');
  });
});

describe('isLogDigestError', () => {
  it('checks the kind when one is given', () => {
    const error = new LogDigestError('no-entries-parsed', 'No log entries found.');
    expect(isLogDigestError(error)).toBe(true);
    expect(isLogDigestError(error, 'no-entries-parsed')).toBe(true);
    expect(isLogDigestError(error, 'not-found')).toBe(false);
    expect(isLogDigestError(new Error('plain'))).toBe(false);
  });
});

describe('formatErrorMessage', () => {
  it('uses error messages when available', () => {
    expect(formatErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies non-error values', () => {
    expect(formatErrorMessage('plain')).toBe('plain');
    expect(formatErrorMessage(42)).toBe('42');
  });
});
