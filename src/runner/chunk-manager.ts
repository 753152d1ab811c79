/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Chunk, LogEntry } from '../types/index.js';

export const DEFAULT_MAX_TOKENS = 2048;

/**
 * Rough token count: one token per four characters, never less than one.
 */
export const estimateTokens = (text: string): number => Math.max(1, Math.floor(text.length / 4));

/**
 * Groups entries into ordered chunks whose estimated token cost stays at or under
 * `maxTokens`. An entry is never split: one that alone exceeds the ceiling gets its
 * own chunk. Concatenating the result reproduces the input.
 *
 * @param entries - Parsed entries in input order
 * @param maxTokens - Token ceiling per chunk; zero or less puts every entry in its own chunk
 */
export function chunkEntries(entries: Iterable<LogEntry>, maxTokens: number): Chunk[] {
  const chunks: Chunk[] = [];
  let current: LogEntry[] = [];
  let tokens = 0;
  for (const entry of entries) {
    const entryTokens = estimateTokens(entry.raw);
    if (tokens + entryTokens > maxTokens && current.length > 0) {
      chunks.push(current);
      current = [];
      tokens = 0;
    }
    current.push(entry);
    tokens += entryTokens;
  }
  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

export const chunkTokens = (chunk: Chunk): number =>
  chunk.reduce((total, entry) => total + estimateTokens(entry.raw), 0);
