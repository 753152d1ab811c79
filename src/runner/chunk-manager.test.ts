/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { chunkEntries, chunkTokens, estimateTokens } from './chunk-manager.js';
import type { LogEntry } from '../types/index.js';

/** Entry whose raw text costs exactly `tokens` estimated tokens. */
const entryOfCost = (tokens: number, label: string): LogEntry => {
  const raw = label.padEnd(tokens * 4, '.');
  return { message: label, raw };
};

describe('estimateTokens', () => {
  it('divides length by four, rounding down, with a floor of one', () => {
    expect(estimateTokens('')).toBe(1);
    expect(estimateTokens('abc')).toBe(1);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('a'.repeat(11))).toBe(2);
    expect(estimateTokens('a'.repeat(400))).toBe(100);
  });
});

describe('chunkEntries', () => {
  it('returns no chunks for no entries', () => {
    expect(chunkEntries([], 10)).toEqual([]);
  });

  it('keeps everything in one chunk when it fits', () => {
    const entries = [entryOfCost(3, 'a'), entryOfCost(3, 'b'), entryOfCost(4, 'c')];
    const chunks = chunkEntries(entries, 10);
    expect(chunks).toEqual([entries]);
  });

  it('closes a chunk only when the next entry would go strictly over the ceiling', () => {
    const entries = [
      entryOfCost(4, 'a'),
      entryOfCost(6, 'b'),
      entryOfCost(1, 'c'),
      entryOfCost(5, 'd'),
      entryOfCost(5, 'e'),
    ];
    const chunks = chunkEntries(entries, 10);
    expect(chunks.map((chunk) => chunk.map((entry) => entry.message))).toEqual([
      ['a', 'b'],
      ['c', 'd'],
      ['e'],
    ]);
    expect(chunks.map(chunkTokens)).toEqual([10, 6, 5]);
  });

  it('places an oversized entry alone without splitting it', () => {
    const big = entryOfCost(50, 'big');
    const entries = [entryOfCost(2, 'a'), big, entryOfCost(2, 'b')];
    const chunks = chunkEntries(entries, 10);
    expect(chunks).toEqual([[entries[0]], [big], [entries[2]]]);
  });

  it('gives every entry its own chunk when each exceeds the ceiling', () => {
    const entries = [entryOfCost(5, 'a'), entryOfCost(6, 'b'), entryOfCost(7, 'c')];
    expect(chunkEntries(entries, 4)).toHaveLength(entries.length);
  });

  it.each([0, -5])('puts every entry in its own chunk when maxTokens is %i', (maxTokens) => {
    const entries = [entryOfCost(1, 'a'), entryOfCost(1, 'b'), entryOfCost(1, 'c')];
    expect(chunkEntries(entries, maxTokens)).toEqual([[entries[0]], [entries[1]], [entries[2]]]);
  });

  it('partitions the input exactly for a range of ceilings', () => {
    const entries = Array.from({ length: 40 }, (_, index) => entryOfCost((index % 7) + 1, `e${index}`));
    for (const maxTokens of [0, 1, 3, 8, 20, 1000]) {
      const chunks = chunkEntries(entries, maxTokens);
      expect(chunks.every((chunk) => chunk.length > 0)).toBe(true);
      expect(chunks.flat()).toEqual(entries);
      for (const chunk of chunks) {
        if (chunk.length > 1) {
          expect(chunkTokens(chunk)).toBeLessThanOrEqual(maxTokens);
        }
      }
    }
  });

  it('accepts any iterable', () => {
    function* source(): Generator<LogEntry> {
      yield entryOfCost(1, 'a');
      yield entryOfCost(1, 'b');
    }
    expect(chunkEntries(source(), 100)).toHaveLength(1);
  });
});
