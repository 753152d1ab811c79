/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogAnalyzer, LogEntry, LogFormat, PipelineObserver } from '../types/index.js';
import { LogDigestError, formatErrorMessage } from '../core/errors.js';
import { resolveLogSources } from '../ingest/source-resolver.js';
import { readLogLinesFromPaths } from '../ingest/line-reader.js';
import { parseLogLines } from '../ingest/entry-parser.js';
import { buildAnalysisPrompt } from '../prompts/analysis.js';
import { DEFAULT_MAX_TOKENS, chunkEntries } from './chunk-manager.js';
import { aggregateResponses, type ReportSummary } from './report-writers.js';

/** An analyzer, or a factory called once entries are ready so input errors surface first. */
export type AnalyzerSource = LogAnalyzer | (() => LogAnalyzer);

export interface LogDigestOptions {
  inputPath: string;
  analyzer: AnalyzerSource;
  format?: LogFormat;
  maxTokens?: number;
  recursive?: boolean;
  include?: readonly string[];
  exclude?: readonly string[];
  observer?: PipelineObserver;
}

export interface LogDigestResult extends ReportSummary {
  prompts: string[];
  responses: string[];
}

/**
 * Runs resolve, read, parse, chunk, analyze and aggregate, strictly in sequence.
 * Analysis calls are issued one at a time in chunk order.
 */
export async function runLogDigest(options: LogDigestOptions): Promise<LogDigestResult> {
  const { observer } = options;
  const format = options.format ?? 'auto';
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  const files = await resolveLogSources(options.inputPath, {
    recursive: options.recursive,
    include: options.include,
    exclude: options.exclude,
  });
  if (files.length === 0) {
    throw new LogDigestError('no-matching-files', `No log files matched under ${options.inputPath}`, {
      path: options.inputPath,
    });
  }
  observer?.onFilesResolved?.({ files });
  observer?.onStage?.({ stage: 'resolve', message: `Resolved ${files.length} file(s)` });

  const entries: LogEntry[] = [];
  for await (const entry of parseLogLines(readLogLinesFromPaths(files), format)) {
    entries.push(entry);
  }
  if (entries.length === 0) {
    throw new LogDigestError('no-entries-parsed', 'No log entries found.', {
      path: options.inputPath,
    });
  }
  observer?.onEntriesParsed?.({ entries: entries.length });
  observer?.onStage?.({ stage: 'parse', message: `Parsed ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}` });

  const chunks = chunkEntries(entries, maxTokens);
  observer?.onChunksPlanned?.({ chunks: chunks.length });
  observer?.onStage?.({
    stage: 'chunk',
    message: `Planned ${chunks.length} chunk(s) at ${maxTokens} tokens`,
  });

  const analyzer = typeof options.analyzer === 'function' ? options.analyzer() : options.analyzer;
  const prompts = chunks.map((chunk) => buildAnalysisPrompt(chunk));
  const responses: string[] = [];
  for (const [index, prompt] of prompts.entries()) {
    observer?.onStage?.({ stage: 'analyze', message: `Analyzing chunk ${index + 1}/${prompts.length}` });
    try {
      responses.push(await analyzer.analyze(prompt));
    } catch (error) {
      throw new LogDigestError(
        'analysis-failure',
        `Analysis failed for chunk ${index + 1}/${prompts.length}: ${formatErrorMessage(error)}`,
        { cause: error },
      );
    }
    observer?.onChunkAnalyzed?.({ current: index + 1, total: prompts.length });
  }

  const report = aggregateResponses(responses);
  observer?.onStage?.({ stage: 'aggregate', message: 'Report ready' });

  return {
    report,
    files,
    entryCount: entries.length,
    chunkCount: chunks.length,
    prompts,
    responses,
  };
}
