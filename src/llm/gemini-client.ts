/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  GoogleGenAI,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from '@google/genai';
import type { LlmClient, LlmCompletionRequest, LlmCompletionResponse } from '../types/index.js';

export interface GeminiLlmClientOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  apiVersion?: string;
}

type GenerationSettings = Required<Pick<LlmCompletionRequest, 'temperature' | 'maxOutputTokens'>>;

const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_API_VERSION = 'v1beta';

export const normalizeGeminiModel = (model: string): string => model.replace(/^google\//, '');

/**
 * One analysis prompt becomes a single-turn request; the system prompt rides in
 * `systemInstruction` instead of being prepended to the logs.
 */
export function buildGeminiRequest(
  model: string,
  request: LlmCompletionRequest,
  settings: GenerationSettings,
): GenerateContentParameters {
  const systemInstruction = request.systemPrompt?.trim();
  return {
    model,
    contents: request.prompt,
    config: {
      ...(systemInstruction ? { systemInstruction } : {}),
      temperature: request.temperature ?? settings.temperature,
      maxOutputTokens: request.maxOutputTokens ?? settings.maxOutputTokens,
    },
  };
}

/**
 * Text of the first candidate, skipping thought parts. Throws when the model
 * returned nothing usable, naming the finish reason when there is one.
 */
export function extractGeminiText(response: GenerateContentResponse): string {
  const candidate = response.candidates?.[0];
  const text = (candidate?.content?.parts ?? [])
    .filter((part) => !part.thought && typeof part.text === 'string')
    .map((part) => part.text)
    .join('')
    .trim();
  const output = text || response.text?.trim();
  if (output) {
    return output;
  }
  const reason = candidate?.finishReason ? ` (finish reason: ${candidate.finishReason})` : '';
  throw new Error(`Gemini response did not include text content${reason}.`);
}

export class GeminiLlmClient implements LlmClient {
  private readonly client: GoogleGenAI;
  private readonly settings: GenerationSettings;
  readonly modelName: string;

  constructor(options: GeminiLlmClientOptions) {
    this.client = new GoogleGenAI({
      apiKey: options.apiKey,
      httpOptions: { apiVersion: options.apiVersion ?? DEFAULT_API_VERSION },
    });
    this.modelName = normalizeGeminiModel(options.model ?? DEFAULT_GEMINI_MODEL);
    this.settings = {
      temperature: options.temperature ?? 0.2,
      maxOutputTokens: options.maxOutputTokens ?? 1024,
    };
  }

  async complete(request: LlmCompletionRequest): Promise<LlmCompletionResponse> {
    const response = await this.client.models.generateContent(
      buildGeminiRequest(this.modelName, request, this.settings),
    );
    return { output: extractGeminiText(response), raw: response };
  }
}
