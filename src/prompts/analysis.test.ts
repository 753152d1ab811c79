/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { buildAnalysisPrompt } from './analysis.js';

describe('buildAnalysisPrompt', () => {
  it('places the raw lines between the intro and the task list', () => {
    const prompt = buildAnalysisPrompt([
      { message: 'a', raw: 'line one' },
      { message: 'b', raw: 'line two' },
    ]);
    expect(prompt).toBe(
      [
        'You are analyzing application logs.',
        'Logs:',
        'line one',
        'line two',
        'Tasks:',
        '1. Identify critical issues',
        '2. Explain likely causes',
        '3. Suggest next debugging steps',
        '',
      ].join('\n'),
    );
  });

  it('uses the raw text rather than the message', () => {
    const prompt = buildAnalysisPrompt([{ message: 'boom', raw: '{"message":"boom"}' }]);
    expect(prompt).toContain('Logs:\n{"message":"boom"}\nTasks:');
  });

  it('renders the full template for an empty chunk', () => {
    expect(buildAnalysisPrompt([])).toBe(
      'You are analyzing application logs.\nLogs:\n\nTasks:\n1. Identify critical issues\n2. Explain likely causes\n3. Suggest next debugging steps\n',
    );
  });
});
