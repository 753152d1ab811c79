/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface LlmCompletionRequest {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface LlmCompletionResponse {
  output: string;
  raw?: unknown;
}

export interface LlmClient {
  complete(request: LlmCompletionRequest): Promise<LlmCompletionResponse>;
  modelName?: string;
}

/**
 * Remote analysis capability consumed by the pipeline. One call per chunk prompt.
 */
export interface LogAnalyzer {
  analyze(prompt: string): Promise<string>;
}
