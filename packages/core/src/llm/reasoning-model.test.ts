import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AIMessage, HumanMessage, SystemMessage, ToolMessage } from '@langchain/core/messages';
import type { Turn } from '@verita/shared/src/types/conversation.types.js';
import {
  contentText,
  createReasoningModel,
  stringifyArguments,
  toLangChainMessages,
  toLangChainTool,
} from './reasoning-model.js';

const llmConfig = {
  model: 'gemini-2.0-flash',
  location: 'europe-west1',
  requestTimeoutMs: 60000,
};

describe('toLangChainMessages', () => {
  it('should map every turn kind to its message class', () => {
    const turns: Turn[] = [
      { kind: 'system', content: 'You are a fact-checker.' },
      { kind: 'user', content: 'Check this.' },
      {
        kind: 'assistant',
        content: '',
        toolInvocations: [
          { toolName: 'general_search', arguments: { query: 'statue' }, correlationId: 'call_1' },
        ],
      },
      { kind: 'tool-result', correlationId: 'call_1', toolName: 'general_search', content: '[]' },
    ];

    const messages = toLangChainMessages(turns);

    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[2]).toBeInstanceOf(AIMessage);
    expect(messages[3]).toBeInstanceOf(ToolMessage);

    const assistant = messages[2];
    expect(assistant instanceof AIMessage ? assistant.tool_calls : undefined).toEqual([
      { id: 'call_1', name: 'general_search', args: { query: 'statue' }, type: 'tool_call' },
    ]);

    const toolResult = messages[3];
    expect(toolResult instanceof ToolMessage ? toolResult.tool_call_id : undefined).toBe('call_1');
  });
});

describe('toLangChainTool', () => {
  it('should wrap the definition as a function tool', () => {
    const parameters = { type: 'object', properties: { query: { type: 'string' } } };

    expect(
      toLangChainTool({ name: 'general_search', description: 'Search the web', parameters }),
    ).toEqual({
      type: 'function',
      function: { name: 'general_search', description: 'Search the web', parameters },
    });
  });
});

describe('contentText', () => {
  it('should join the text parts of structured content', () => {
    expect(contentText('plain')).toBe('plain');
    expect(
      contentText([
        { type: 'text', text: 'first ' },
        { type: 'image_url', image_url: 'https://example.com/a.png' },
        { type: 'text', text: 'second' },
      ]),
    ).toBe('first second');
  });
});

describe('stringifyArguments', () => {
  it('should keep strings and serialize other values', () => {
    expect(stringifyArguments({ query: 'statue', limit: 3, nested: { a: 1 }, missing: null })).toEqual({
      query: 'statue',
      limit: '3',
      nested: '{"a":1}',
    });
  });
});

describe('createReasoningModel', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should create the mock model when VERITA_MOCK_LLM is true', async () => {
    process.env['VERITA_MOCK_LLM'] = 'true';

    const model = await createReasoningModel(llmConfig);
    const response = await model.complete({ turns: [{ kind: 'user', content: 'hello' }] });

    expect(response.toolCalls).toEqual([]);
  });

  it('should throw ConfigurationError when GCP_PROJECT_ID is missing', async () => {
    delete process.env['VERITA_MOCK_LLM'];
    delete process.env['GCP_PROJECT_ID'];

    await expect(createReasoningModel(llmConfig)).rejects.toThrow('GCP_PROJECT_ID');
  });
});
