/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runLogDigest,
  type AnalyzerSource,
  type LogDigestOptions,
  type LogDigestResult,
} from './log-digest.js';

export {
  chunkEntries,
  chunkTokens,
  estimateTokens,
  DEFAULT_MAX_TOKENS,
} from './chunk-manager.js';

export {
  aggregateResponses,
  renderReport,
  writeReport,
  REPORT_SEPARATOR,
  type ReportSummary,
} from './report-writers.js';
