/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogEntry, LogFormat } from '../types/index.js';

/** Minimum comma count for a plain-text line to be treated as a log record. */
export const TEXT_MIN_COMMAS = 2;

const looksLikeJson = (trimmed: string): boolean => trimmed.startsWith('{');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asText = (value: unknown): string | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
};

const countCommas = (line: string): number => {
  let count = 0;
  for (const char of line) {
    if (char === ',') count += 1;
  }
  return count;
};

const parseJsonEntry = (line: string): LogEntry | undefined => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(decoded)) {
    return undefined;
  }
  return {
    timestamp: asText(decoded['timestamp']),
    level: asText(decoded['level']),
    source: asText(decoded['source']),
    message: asText(decoded['message']) ?? JSON.stringify(decoded),
    raw: line,
  };
};

// TODO: the comma count is a stand-in for "looks tabular"; replace with per-format detectors (CSV, syslog, logfmt).
const parseTextEntry = (line: string): LogEntry | undefined => {
  if (countCommas(line) < TEXT_MIN_COMMAS) {
    return undefined;
  }
  return { message: line, raw: line };
};

/**
 * Parses one raw line. Blank and malformed lines produce `undefined`.
 * A line routed to JSON decoding never falls back to text parsing.
 */
export const parseLogLine = (line: string, format: LogFormat = 'auto'): LogEntry | undefined => {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }
  if (format === 'json' || (format === 'auto' && looksLikeJson(trimmed))) {
    return parseJsonEntry(line);
  }
  return parseTextEntry(line);
};

/**
 * Lazily parses a line sequence, yielding only the lines that produced an entry.
 */
export async function* parseLogLines(
  lines: AsyncIterable<string> | Iterable<string>,
  format: LogFormat = 'auto',
): AsyncGenerator<LogEntry> {
  for await (const line of lines) {
    const entry = parseLogLine(line, format);
    if (entry) {
      yield entry;
    }
  }
}
