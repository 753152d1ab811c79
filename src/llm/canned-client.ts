/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LlmClient, LlmCompletionRequest, LlmCompletionResponse } from '../types/index.js';

export const DEFAULT_CANNED_RESPONSE = 'Mocked summary: Something failed';

/**
 * Offline client that answers every prompt with the same text. Records what it was asked.
 */
export class CannedLlmClient implements LlmClient {
  readonly modelName = 'canned';
  readonly requests: LlmCompletionRequest[] = [];

  constructor(private readonly response: string = DEFAULT_CANNED_RESPONSE) {}

  async complete(request: LlmCompletionRequest): Promise<LlmCompletionResponse> {
    this.requests.push(request);
    return { output: this.response };
  }
}
