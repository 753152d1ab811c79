/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts from 'prompts';
import type { AnalyzeOptions } from './args.js';
import { resolveModel, type Env } from '../llm/config.js';

export async function runInteractiveSetup(options: AnalyzeOptions, env: Env): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'inputPath',
        message: 'Path to the log file or directory to analyze',
        initial: options.inputPath,
      },
      {
        type: 'toggle',
        name: 'recursive',
        message: 'Walk subdirectories?',
        initial: options.recursive,
        active: 'yes',
        inactive: 'no',
      },
      {
        type: 'number',
        name: 'maxTokens',
        message: 'Estimated tokens per chunk',
        initial: options.maxTokens,
      },
      {
        type: 'text',
        name: 'model',
        message: 'Preferred LLM model (e.g., gemini-2.0-flash)',
        initial: resolveModel(options.model, env),
      },
      {
        type: 'password',
        name: 'aimlApiKey',
        message: 'AimlAPI API key (leave empty to skip)',
      },
      {
        type: 'password',
        name: 'geminiApiKey',
        message: 'Gemini API key (leave empty to skip)',
      },
    ],
    {
      onCancel: () => {
        throw new Error('Interactive setup cancelled.');
      },
    },
  );

  if (typeof responses.aimlApiKey === 'string' && responses.aimlApiKey) {
    env['AIMLAPI_API_KEY'] = responses.aimlApiKey;
  }
  if (typeof responses.geminiApiKey === 'string' && responses.geminiApiKey) {
    env['GEMINI_API_KEY'] = responses.geminiApiKey;
  }
  if (typeof responses.model === 'string' && responses.model.trim()) {
    options.model = responses.model.trim();
  }
  if (typeof responses.inputPath === 'string' && responses.inputPath.trim()) {
    options.inputPath = responses.inputPath.trim();
  }
  if (typeof responses.recursive === 'boolean') {
    options.recursive = responses.recursive;
  }
  if (typeof responses.maxTokens === 'number' && !Number.isNaN(responses.maxTokens)) {
    options.maxTokens = responses.maxTokens;
  }
}
