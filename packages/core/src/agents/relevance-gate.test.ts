import { describe, it, expect, vi } from 'vitest';
import type { LlmClient } from '../llm/llm-client.js';
import { LlmError } from '@verita/shared/src/utils/errors.js';
import { createRelevanceGate, EMPTY_INPUT_REASON, FAIL_OPEN_REASON } from './relevance-gate.js';

const { debug } = vi.hoisted(() => ({ debug: vi.fn() }));

vi.mock('@verita/shared/src/logger.js', () => ({
  createChildLogger: () => ({ debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

function createScriptedClient(invoke: LlmClient['invoke']) {
  const fn = vi.fn(invoke);
  const client: LlmClient = { invoke: fn };
  return { client, invoke: fn };
}

describe('RelevanceGate', () => {
  it('should return the model decision', async () => {
    const { client } = createScriptedClient(() =>
      Promise.resolve({ content: '{"is_news": false, "reason": "Greeting"}' }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('Hi, how are you?');

    expect(result).toEqual({ isNews: false, reason: 'Greeting' });
  });

  it('should read a decision wrapped in a code fence', async () => {
    const { client } = createScriptedClient(() =>
      Promise.resolve({
        content: '```json\n{"is_news": true, "reason": "Claim about a public figure"}\n```',
      }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('The mayor resigned today.');

    expect(result).toEqual({ isNews: true, reason: 'Claim about a public figure' });
  });

  it('should send the text as the user message', async () => {
    const { client, invoke } = createScriptedClient(() =>
      Promise.resolve({ content: '{"is_news": true}' }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('A dam burst upstream.');

    expect(invoke.mock.calls[0]?.[0].userMessage).toBe('A dam burst upstream.');
    expect(invoke.mock.calls[0]?.[0].systemPrompt).toContain('fact-checkable');
    expect(result).toEqual({ isNews: true, reason: '' });
  });

  it('should log token usage reported by the client', async () => {
    const { client } = createScriptedClient(() =>
      Promise.resolve({
        content: '{"is_news": true, "reason": "Claim about a public figure"}',
        tokenUsage: { input: 120, output: 18 },
      }),
    );

    await createRelevanceGate(client).isFactCheckable('The mayor resigned today.');

    expect(debug).toHaveBeenCalledWith(
      { tokenUsage: { input: 120, output: 18 } },
      'Relevance gate token usage',
    );
  });

  it('should fail open when the request fails', async () => {
    const { client } = createScriptedClient(() =>
      Promise.reject(new LlmError('Vertex AI invocation failed', true)),
    );

    const result = await createRelevanceGate(client).isFactCheckable('A dam burst upstream.');

    expect(result).toEqual({ isNews: true, reason: FAIL_OPEN_REASON });
  });

  it('should fail open on output without JSON', async () => {
    const { client } = createScriptedClient(() =>
      Promise.resolve({ content: 'I think this is probably news.' }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('A dam burst upstream.');

    expect(result).toEqual({ isNews: true, reason: FAIL_OPEN_REASON });
  });

  it('should fail open when is_news is not a boolean', async () => {
    const { client } = createScriptedClient(() =>
      Promise.resolve({ content: '{"is_news": "no", "reason": "Greeting"}' }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('Hello there');

    expect(result).toEqual({ isNews: true, reason: FAIL_OPEN_REASON });
  });

  it('should answer empty input locally', async () => {
    const { client, invoke } = createScriptedClient(() =>
      Promise.resolve({ content: '{"is_news": true}' }),
    );

    const result = await createRelevanceGate(client).isFactCheckable('   \n ');

    expect(result).toEqual({ isNews: false, reason: EMPTY_INPUT_REASON });
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should propagate a caller abort', async () => {
    const controller = new AbortController();
    const { client } = createScriptedClient(() => {
      controller.abort();
      return Promise.reject(new Error('aborted'));
    });

    await expect(
      createRelevanceGate(client).isFactCheckable('A dam burst upstream.', controller.signal),
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});
