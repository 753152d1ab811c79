/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import { formatLogBlock, indentLines, logConsole, type LogSink } from './logging.js';

describe('indentLines', () => {
  it('prefixes every non-blank line', () => {
    expect(indentLines('Line 1\nLine 2')).toBe('    Line 1\n    Line 2');
    expect(indentLines('a', '\t')).toBe('\ta');
  });

  it('blanks whitespace-only lines', () => {
    expect(indentLines('Line 1\n   \nLine 3')).toBe('    Line 1\n\n    Line 3');
    expect(indentLines('')).toBe('');
  });
});

describe('formatLogBlock', () => {
  it('aligns keys and drops empty fields', () => {
    expect(
      formatLogBlock('Analysis complete', [
        ['files', 2],
        ['entries', 10],
        ['out-file', undefined],
        ['model', ''],
      ]),
    ).toBe('[log-digest] Analysis complete:\n  files   = 2\n  entries = 10');
  });

  it('indents continuation lines under the value', () => {
    expect(formatLogBlock('Failure', [['error', 'first\nsecond']])).toBe(
      '[log-digest] Failure:\n  error = first\n          second',
    );
  });
});

describe('logConsole', () => {
  it('hands the formatted block to the sink with its level', () => {
    const sink = vi.fn<LogSink>();
    logConsole('warn', 'Heads up', [['path', '/tmp/a.log']], sink);
    expect(sink).toHaveBeenCalledWith('warn', '[log-digest] Heads up:\n  path = /tmp/a.log');
  });

  it('writes errors to console.error by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logConsole('error', 'Broken');
    expect(spy).toHaveBeenCalledWith('[log-digest] Broken:');
    spy.mockRestore();
  });
});
