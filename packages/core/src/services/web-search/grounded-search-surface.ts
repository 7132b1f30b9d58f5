import { createChildLogger } from '@verita/shared/src/logger.js';
import { ConfigurationError, SearchError } from '@verita/shared/src/utils/errors.js';
import type { RawSearchHit, SearchSurface, SearchSurfaceFetchOptions } from './types.js';

const log = createChildLogger('web-search:grounded');

export interface GroundedSearchSurfaceConfig {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
}

interface GroundingChunk {
  readonly web?: {
    readonly uri?: string;
    readonly title?: string;
    readonly domain?: string;
  };
}

interface GroundingSupport {
  readonly segment?: {
    readonly text?: string;
  };
  readonly groundingChunkIndices?: readonly number[];
}

interface GroundingMetadata {
  readonly groundingChunks?: readonly GroundingChunk[];
  readonly groundingSupports?: readonly GroundingSupport[];
}

interface GenAiCandidate {
  readonly groundingMetadata?: GroundingMetadata;
}

export interface GroundedResponse {
  readonly candidates?: readonly GenAiCandidate[];
}

/**
 * Turns grounding chunks into hits. A chunk's snippet is the first answer
 * segment the model attributed to it.
 */
export function hitsFromGrounding(response: GroundedResponse): RawSearchHit[] {
  const hits: RawSearchHit[] = [];

  for (const candidate of response.candidates ?? []) {
    const chunks = candidate.groundingMetadata?.groundingChunks ?? [];
    const supports = candidate.groundingMetadata?.groundingSupports ?? [];

    chunks.forEach((chunk, index) => {
      const uri = chunk.web?.uri;
      if (!uri) {
        return;
      }
      const support = supports.find((s) => s.groundingChunkIndices?.includes(index));
      hits.push({
        title: chunk.web?.title ?? chunk.web?.domain ?? uri,
        url: uri,
        snippet: support?.segment?.text ?? '',
        sourceDomain: chunk.web?.domain,
      });
    });
  }

  return hits;
}

export function createGroundedSearchSurface(config: GroundedSearchSurfaceConfig): SearchSurface {
  const { projectId, location, model } = config;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for the grounded search surface');
  }

  log.info({ projectId, location }, 'Using grounded search surface');

  return {
    name: 'grounded',

    async fetch(query: string, options: SearchSurfaceFetchOptions): Promise<readonly RawSearchHit[]> {
      const { GoogleGenAI } = await import('@google/genai');

      const client = new GoogleGenAI({
        vertexai: true,
        project: projectId,
        location,
      });

      try {
        const response = await client.models.generateContent({
          model,
          contents: `Find reliable, citable sources about the following:\n${query}`,
          config: {
            tools: [{ googleSearch: {} }],
            abortSignal: options.signal,
          },
        });

        const hits = hitsFromGrounding(response);
        log.debug({ query, hitCount: hits.length }, 'Grounded search completed');
        return hits;
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new SearchError(`Grounded search failed: ${cause.message}`, cause);
      }
    },
  };
}
