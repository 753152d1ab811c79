/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Log entry and batching types shared by the ingestion and runner layers.
 */

export type LogFormat = 'auto' | 'json' | 'text';

export const LOG_FORMATS: readonly LogFormat[] = ['auto', 'json', 'text'];

export interface LogEntry {
  readonly timestamp?: string;
  readonly level?: string;
  readonly source?: string;
  readonly message: string;
  /** Original line, verbatim. Used for token estimates and prompt bodies. */
  readonly raw: string;
}

/**
 * Contiguous, order-preserving group of entries. Never empty when produced by the chunker.
 */
export type Chunk = readonly LogEntry[];

export type ReportStyle = 'text' | 'json';

export const REPORT_STYLES: readonly ReportStyle[] = ['text', 'json'];
