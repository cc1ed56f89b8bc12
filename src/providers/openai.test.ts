/**
 * @fileoverview Unit tests for the OpenAI-compatible completion client helpers
 */

import { describe, it, expect } from 'vitest';
import { APIError, APIUserAbortError } from 'openai';
import { toChatMessages, classifyCompletionError, OpenAICompletionClient } from './openai.js';
import { CompletionError } from './base.js';

describe('toChatMessages()', () => {
  it('should send tool results back as user turns', () => {
    expect(
      toChatMessages([
        { role: 'system', content: 'You are helpful.' },
        { role: 'user', content: 'What is trending?' },
        { role: 'assistant', content: 'ACTION: google_trends\nINPUT: US' },
        { role: 'tool_result', content: 'Tool result (google_trends):\n1. eclipse' },
      ]),
    ).toEqual([
      { role: 'system', content: 'You are helpful.' },
      { role: 'user', content: 'What is trending?' },
      { role: 'assistant', content: 'ACTION: google_trends\nINPUT: US' },
      { role: 'user', content: 'Tool result (google_trends):\n1. eclipse' },
    ]);
  });
});

describe('classifyCompletionError()', () => {
  it('should map HTTP 429 to QUOTA_EXCEEDED', () => {
    const error = classifyCompletionError(new APIError(429, undefined, 'Rate limit reached', undefined));

    expect(error.code).toBe('QUOTA_EXCEEDED');
    expect(error.status).toBe(429);
  });

  it('should map other API errors to UPSTREAM_UNAVAILABLE', () => {
    const error = classifyCompletionError(new APIError(503, undefined, 'Service Unavailable', undefined));

    expect(error.code).toBe('UPSTREAM_UNAVAILABLE');
    expect(error.status).toBe(503);
  });

  it('should map aborts to ABORTED', () => {
    expect(classifyCompletionError(new APIUserAbortError()).code).toBe('ABORTED');

    const controller = new AbortController();
    controller.abort();
    expect(classifyCompletionError(new Error('socket closed'), controller.signal).code).toBe('ABORTED');
  });

  it('should map unknown failures to UPSTREAM_UNAVAILABLE and keep the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = classifyCompletionError(cause);

    expect(error.code).toBe('UPSTREAM_UNAVAILABLE');
    expect(error.message).toBe('ECONNREFUSED');
    expect(error.cause).toBe(cause);
  });

  it('should pass CompletionErrors through', () => {
    const original = new CompletionError('EMPTY_COMPLETION', 'no choices');

    expect(classifyCompletionError(original)).toBe(original);
  });
});

describe('OpenAICompletionClient', () => {
  it('should name itself after the model', () => {
    const client = new OpenAICompletionClient({
      apiKey: 'test-secret',
      baseURL: 'http://127.0.0.1:9/v1',
      model: 'llama-3.3-70b-versatile',
      temperature: 0.7,
      maxTokens: 1024,
    });

    expect(client.name).toBe('openai:llama-3.3-70b-versatile');
  });

  it('should report ABORTED when the signal is already aborted', async () => {
    const client = new OpenAICompletionClient({
      apiKey: 'test-secret',
      baseURL: 'http://127.0.0.1:9/v1',
      model: 'llama-3.3-70b-versatile',
      temperature: 0.7,
      maxTokens: 1024,
      timeoutMs: 1_000,
    });
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.complete([{ role: 'user', content: 'Hi' }], { signal: controller.signal }),
    ).rejects.toMatchObject({ code: 'ABORTED' });
  });
});
