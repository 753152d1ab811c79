/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LlmClient, LogAnalyzer } from '../types/index.js';
import { ANALYSIS_SYSTEM_PROMPT } from '../prompts/analysis.js';

export interface LlmLogAnalyzerOptions {
  systemPrompt?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Adapts an {@link LlmClient} to the pipeline's analysis capability.
 */
export class LlmLogAnalyzer implements LogAnalyzer {
  constructor(
    private readonly client: LlmClient,
    private readonly options: LlmLogAnalyzerOptions = {},
  ) {}

  get modelName(): string | undefined {
    return this.client.modelName;
  }

  async analyze(prompt: string): Promise<string> {
    const response = await this.client.complete({
      prompt,
      systemPrompt: this.options.systemPrompt ?? ANALYSIS_SYSTEM_PROMPT,
      temperature: this.options.temperature,
      maxOutputTokens: this.options.maxOutputTokens,
    });
    return response.output;
  }
}
