/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LlmClient } from '../types/index.js';
import { AimlApiLlmClient } from './aimlapi-client.js';
import { CannedLlmClient } from './canned-client.js';
import { GeminiLlmClient } from './gemini-client.js';

export type LlmProvider = 'canned' | 'aimlapi' | 'gemini';

export interface LlmEnvConfig {
  provider: LlmProvider;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  apiVersion?: string;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = 'gemini-2.0-flash';

const DEPRECATED_MODELS = new Set([
  'gemini-1.5-pro-latest',
  'gemini-1.5-pro',
  'gemini-1.5-flash',
  'gemini-1.5-flash-latest',
]);

/**
 * Picks the model name: explicit option first, then the environment, then the default.
 */
export const resolveModel = (explicit?: string, env: Env = process.env): string => {
  const candidate = explicit?.trim() || env['LOG_DIGEST_LLM_MODEL'] || env['GEMINI_MODEL'];
  if (!candidate || DEPRECATED_MODELS.has(candidate)) {
    return DEFAULT_MODEL;
  }
  return candidate;
};

export function resolveLlmConfigFromEnv(
  env: Env = process.env,
  model?: string,
): LlmEnvConfig | undefined {
  const resolvedModel = resolveModel(model, env);

  if (env['LOG_DIGEST_MOCK_LLM'] === '1') {
    return { provider: 'canned', model: resolvedModel };
  }

  if (env['AIMLAPI_API_KEY']) {
    return {
      provider: 'aimlapi',
      apiKey: env['AIMLAPI_API_KEY'],
      model: resolvedModel,
      baseUrl: env['AIMLAPI_BASE_URL'],
    };
  }

  const geminiKey = env['GEMINI_API_KEY'] ?? env['GOOGLE_API_KEY'];
  if (geminiKey) {
    return {
      provider: 'gemini',
      apiKey: geminiKey,
      model: resolvedModel,
      apiVersion: env['LOG_DIGEST_GEMINI_API_VERSION'] ?? 'v1beta',
    };
  }

  return undefined;
}

export function createLlmClient(config: LlmEnvConfig | undefined): LlmClient | undefined {
  if (!config) {
    return undefined;
  }
  if (config.provider === 'canned') {
    return new CannedLlmClient();
  }
  if (!config.apiKey) {
    return undefined;
  }

  const common = {
    model: config.model,
    temperature: 0,
    maxOutputTokens: 1024,
  };

  if (config.provider === 'aimlapi') {
    return new AimlApiLlmClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      ...common,
    });
  }

  return new GeminiLlmClient({
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    ...common,
  });
}
