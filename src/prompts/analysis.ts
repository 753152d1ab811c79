/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Chunk } from '../types/index.js';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are a site reliability engineer reviewing production application logs. Be concise and concrete.';

export const ANALYSIS_TASKS = [
  'Identify critical issues',
  'Explain likely causes',
  'Suggest next debugging steps',
] as const;

export const buildAnalysisPrompt = (chunk: Chunk): string => {
  const logs = chunk.map((entry) => entry.raw).join('\n');
  return [
    'You are analyzing application logs.',
    'Logs:',
    logs,
    'Tasks:',
    ...ANALYSIS_TASKS.map((task, index) => `${index + 1}. ${task}`),
    '',
  ].join('\n');
};
