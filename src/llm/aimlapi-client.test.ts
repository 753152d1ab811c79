/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import { AimlApiLlmClient, normalizeAimlModel } from './aimlapi-client.js';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('AimlApiLlmClient', () => {
  it('posts a chat completion and returns the message content', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: 'all good' } }] }),
    );
    const client = new AimlApiLlmClient({
      apiKey: 'test-key',
      model: 'gemini-2.0-flash',
      baseUrl: 'http://llm.local/',
      fetch: fetchMock,
    });

    const response = await client.complete({ prompt: 'hello', systemPrompt: 'be brief' });

    expect(response.output).toBe('all good');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.local/v1/chat/completions');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'google/gemini-2.0-flash',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hello' },
      ],
      temperature: 0,
      max_tokens: 1024,
    });
  });

  it('joins array content parts', async () => {
    const client = new AimlApiLlmClient({
      apiKey: 'test-key',
      fetch: vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ choices: [{ message: { content: [{ text: 'a' }, { text: 'b' }] } }] }),
      ),
    });
    expect((await client.complete({ prompt: 'x' })).output).toBe('a\nb');
  });

  it('raises with the API message on a failed request', async () => {
    const client = new AimlApiLlmClient({
      apiKey: 'test-key',
      fetch: vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ message: 'rate limited' }, 429)),
    });
    await expect(client.complete({ prompt: 'x' })).rejects.toThrow(
      'AIMLAPI request failed (429): rate limited',
    );
  });

  it('raises when the payload has no text', async () => {
    const client = new AimlApiLlmClient({
      apiKey: 'test-key',
      fetch: vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] })),
    });
    await expect(client.complete({ prompt: 'x' })).rejects.toThrow(
      'AIMLAPI response did not include text content.',
    );
  });
});

describe('normalizeAimlModel', () => {
  it('prefixes bare Gemini names', () => {
    expect(normalizeAimlModel('gemini-2.0-flash')).toBe('google/gemini-2.0-flash');
    expect(normalizeAimlModel('google/gemini-2.0-flash')).toBe('google/gemini-2.0-flash');
    expect(normalizeAimlModel('gpt-4o')).toBe('gpt-4o');
  });
});
