/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import type { ReportStyle } from '../types/index.js';

export const REPORT_SEPARATOR = '\n---\n';

/**
 * Joins per-chunk responses in order. No trimming, deduplication or reordering.
 */
export const aggregateResponses = (responses: readonly string[]): string =>
  responses.join(REPORT_SEPARATOR);

export interface ReportSummary {
  report: string;
  files: string[];
  entryCount: number;
  chunkCount: number;
}

/**
 * Renders the final report body for the requested output style.
 */
export const renderReport = (summary: ReportSummary, style: ReportStyle): string => {
  if (style === 'text') {
    return summary.report;
  }
  return JSON.stringify(
    {
      summary: summary.report,
      files: summary.files,
      entries: summary.entryCount,
      chunks: summary.chunkCount,
    },
    null,
    2,
  );
};

/**
 * Writes the report to a file, creating parent directories as needed.
 */
export async function writeReport(path: string, body: string): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, body, 'utf8');
}
