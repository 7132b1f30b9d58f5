import { HumanMessage } from '@langchain/core/messages';
import type { LlmConfig } from '@verita/schemas/src/verification-config.schema.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { ConfigurationError, IngestionError } from '@verita/shared/src/utils/errors.js';
import { throwIfAborted, withTimeout } from '@verita/shared/src/utils/async.js';

const log = createChildLogger('ingestion:image-describer');

export const NO_TEXT_FOUND = 'No text found';

export interface ImageInput {
  readonly data: Uint8Array;
  readonly mimeType: string;
}

export interface ImageDescription {
  readonly extractedText: string;
  readonly description: string;
}

export interface ImageDescriber {
  describe(image: ImageInput, signal?: AbortSignal): Promise<ImageDescription>;
}

const OCR_PROMPT = `Extract all text visible in this image.
If there is no text, respond with '${NO_TEXT_FOUND}'.
Only return the extracted text, nothing else.`;

const DESCRIPTION_PROMPT = `Provide a detailed description of this image.
Focus on: main subjects, context, setting, any notable elements, and overall theme.
Keep it concise but informative (2-3 sentences).`;

function createMockDescriber(): ImageDescriber {
  log.info('Using mock image describer');

  return {
    async describe(image: ImageInput, signal?: AbortSignal): Promise<ImageDescription> {
      throwIfAborted(signal);
      return {
        extractedText: NO_TEXT_FOUND,
        description: `Mock description of a ${image.mimeType} image (${String(image.data.length)} bytes).`,
      };
    },
  };
}

async function createVertexDescriber(config: LlmConfig): Promise<ImageDescriber> {
  const projectId = process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? config.location;

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for the Vertex AI image describer',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: config.model,
    location,
    temperature: 0.1,
    authOptions: { projectId },
  });

  log.info({ projectId, location, model: config.model }, 'Using Vertex AI image describer');

  async function ask(prompt: string, dataUrl: string, signal?: AbortSignal): Promise<string> {
    const response = await model.invoke(
      [
        new HumanMessage({
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url: dataUrl } },
          ],
        }),
      ],
      { signal: withTimeout(config.requestTimeoutMs, signal) },
    );
    const content =
      typeof response.content === 'string' ? response.content : JSON.stringify(response.content);
    return content.trim();
  }

  return {
    async describe(image: ImageInput, signal?: AbortSignal): Promise<ImageDescription> {
      const dataUrl = `data:${image.mimeType};base64,${Buffer.from(image.data).toString('base64')}`;

      try {
        const extractedText = await ask(OCR_PROMPT, dataUrl, signal);
        const description = await ask(DESCRIPTION_PROMPT, dataUrl, signal);
        return { extractedText, description };
      } catch (error) {
        throwIfAborted(signal);
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new IngestionError(`Image description failed: ${cause.message}`, cause);
      }
    },
  };
}

export async function createImageDescriber(config: LlmConfig): Promise<ImageDescriber> {
  if (process.env['VERITA_MOCK_LLM'] === 'true') {
    return createMockDescriber();
  }

  return createVertexDescriber(config);
}
