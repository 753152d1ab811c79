/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Pipeline progress observer. Every hook is optional.
 */

export interface StageEvent {
  stage: 'resolve' | 'parse' | 'chunk' | 'analyze' | 'aggregate';
  message: string;
  data?: Record<string, unknown>;
}

export interface PipelineObserver {
  onStage?(event: StageEvent): void;
  onFilesResolved?(info: { files: string[] }): void;
  onEntriesParsed?(info: { entries: number }): void;
  onChunksPlanned?(info: { chunks: number }): void;
  onChunkAnalyzed?(info: { current: number; total: number }): void;
}
