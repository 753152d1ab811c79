/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogField = [string, string | number | undefined | null];

export type LogSink = (level: LogLevel, output: string) => void;

const consoleSink: LogSink = (level, output) => {
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

/**
 * Prefixes every non-blank line. Whitespace-only lines become empty.
 */
export const indentLines = (text: string, prefix = '    '): string =>
  text
    .split('\n')
    .map((line) => (line.trim() ? `${prefix}${line}` : ''))
    .join('\n');

/**
 * Formats a labelled block: one header line, then one aligned `key = value` line per
 * non-empty field. Continuation lines of multi-line values are indented under the value.
 */
export const formatLogBlock = (label: string, fields: LogField[] = []): string => {
  const filtered = fields.filter(
    (field): field is [string, string | number] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[log-digest] ${label}:`];
  for (const [key, value] of filtered) {
    const [first = '', ...rest] = String(value).split('\n');
    const continuation = rest.length > 0 ? `\n${indentLines(rest.join('\n'), ' '.repeat(width + 5))}` : '';
    lines.push(`  ${key.padEnd(width)} = ${first}${continuation}`);
  }
  return lines.join('\n');
};

/**
 * Unified console logger with structured, multiline output.
 */
export const logConsole = (
  level: LogLevel,
  label: string,
  fields: LogField[] = [],
  sink: LogSink = consoleSink,
): void => {
  sink(level, formatLogBlock(label, fields));
};
