import { randomUUID } from 'node:crypto';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';
import type { ToolDefinition as LangChainToolDefinition } from '@langchain/core/language_models/base';
import type { LlmConfig } from '@verita/schemas/src/verification-config.schema.js';
import type { ToolInvocation, Turn } from '@verita/shared/src/types/conversation.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@verita/shared/src/utils/errors.js';
import { sleep, throwIfAborted, withTimeout } from '@verita/shared/src/utils/async.js';
import { computeBackoffMs, isTransientError } from './transient-errors.js';
import { createMockReasoningModel } from './mock-reasoning-model.js';

const log = createChildLogger('llm:reasoning-model');

const MAX_TRANSIENT_RETRIES = 3;

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

export interface ReasoningRequest {
  readonly turns: readonly Turn[];
  readonly tools?: readonly ToolDefinition[];
}

export interface ReasoningResponse {
  readonly content: string;
  readonly toolCalls: readonly ToolInvocation[];
}

/**
 * A chat model that can answer with text or ask for tool calls. Tool choice is
 * always "auto": the model decides whether to call a tool.
 */
export interface ReasoningModel {
  complete(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningResponse>;
}

export function toLangChainMessages(turns: readonly Turn[]): BaseMessage[] {
  return turns.map((turn) => {
    switch (turn.kind) {
      case 'system':
        return new SystemMessage(turn.content);
      case 'user':
        return new HumanMessage(turn.content);
      case 'assistant':
        return new AIMessage({
          content: turn.content,
          tool_calls: turn.toolInvocations.map((invocation) => ({
            id: invocation.correlationId,
            name: invocation.toolName,
            args: { ...invocation.arguments },
            type: 'tool_call' as const,
          })),
        });
      case 'tool-result':
        return new ToolMessage({
          content: turn.content,
          tool_call_id: turn.correlationId,
          name: turn.toolName,
        });
    }
  });
}

export function toLangChainTool(tool: ToolDefinition): LangChainToolDefinition {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function contentText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * Tool arguments arrive as parsed JSON; the conversation keeps them as strings.
 */
export function stringifyArguments(args: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      result[key] = value;
    } else if (value !== undefined && value !== null) {
      result[key] = typeof value === 'object' ? JSON.stringify(value) : String(value);
    }
  }
  return result;
}

async function createVertexReasoningModel(config: LlmConfig): Promise<ReasoningModel> {
  const projectId = process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? config.location;

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI reasoning model',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: config.model,
    location,
    temperature: 0.2,
    authOptions: { projectId },
  });

  log.info({ projectId, location, model: config.model }, 'Using Vertex AI reasoning model');

  return {
    async complete(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningResponse> {
      const messages = toLangChainMessages(request.turns);
      const tools = (request.tools ?? []).map(toLangChainTool);

      log.debug(
        { turnCount: messages.length, toolCount: tools.length },
        'Vertex AI reasoning invocation',
      );

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const options = { signal: withTimeout(config.requestTimeoutMs, signal) };
          const response =
            tools.length > 0
              ? await model.bindTools(tools).invoke(messages, options)
              : await model.invoke(messages, options);

          return {
            content: contentText(response.content),
            toolCalls: (response.tool_calls ?? []).map((call) => ({
              toolName: call.name,
              arguments: stringifyArguments(call.args),
              correlationId: call.id ?? `call_${randomUUID()}`,
            })),
          };
        } catch (error) {
          throwIfAborted(signal);
          lastError = error instanceof Error ? error : new Error(String(error));

          if (!isTransientError(error)) {
            throw new LlmError(
              `Vertex AI reasoning invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient reasoning model error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt), signal);
          }
        }
      }

      throw new LlmError(
        `Vertex AI reasoning invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createReasoningModel(config: LlmConfig): Promise<ReasoningModel> {
  if (process.env['VERITA_MOCK_LLM'] === 'true') {
    return createMockReasoningModel();
  }

  return createVertexReasoningModel(config);
}
