import type { LlmConfig } from '@verita/schemas/src/verification-config.schema.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@verita/shared/src/utils/errors.js';
import { sleep, throwIfAborted, withTimeout } from '@verita/shared/src/utils/async.js';
import { computeBackoffMs, isTransientError } from './transient-errors.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}

const GREETING_PATTERN = /^(hi|hey|hello|hallo|good (morning|evening)|how are you|thanks|thank you)\b/i;

function createMockResponse(request: LlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();

  if (prompt.includes('fact-checkable')) {
    const text = request.userMessage.trim();
    const wordCount = text.split(/\s+/).filter(Boolean).length;
    if (GREETING_PATTERN.test(text) || wordCount < 5) {
      return JSON.stringify({
        is_news: false,
        reason: 'Conversational message without a verifiable claim.',
      });
    }
    return JSON.stringify({
      is_news: true,
      reason: 'The message makes a factual claim about real-world events.',
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    async invoke(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
      throwIfAborted(signal);
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return {
        content: createMockResponse(request),
        tokenUsage: { input: 100, output: 50 },
      };
    },
  };
}

async function createVertexClient(config: LlmConfig): Promise<LlmClient> {
  const projectId = process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? config.location;

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: config.model,
    location,
    temperature: 0.1,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location, model: config.model }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await model.invoke(
            [
              ['system', request.systemPrompt],
              ['human', request.userMessage],
            ],
            { signal: withTimeout(config.requestTimeoutMs, signal) },
          );

          const content =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          return {
            content,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          throwIfAborted(signal);
          lastError = error instanceof Error ? error : new Error(String(error));

          if (!isTransientError(error)) {
            throw new LlmError(
              `Vertex AI invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt), signal);
          }
        }
      }

      throw new LlmError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(config: LlmConfig): Promise<LlmClient> {
  if (process.env['VERITA_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient(config);
}
