import { describe, it, expect } from 'vitest';
import { createGroundedSearchSurface, hitsFromGrounding } from './grounded-search-surface.js';
import { normalizeHits } from './search-provider.js';
import { ConfigurationError } from '@verita/shared/src/utils/errors.js';

describe('hitsFromGrounding', () => {
  it('should map grounding chunks to hits with their supporting segment', () => {
    const hits = hitsFromGrounding({
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              { web: { uri: 'https://example.com/one', title: 'example.com' } },
              { web: { uri: 'https://example.org/two', domain: 'example.org' } },
              { web: {} },
            ],
            groundingSupports: [
              { segment: { text: 'Supported by the second source.' }, groundingChunkIndices: [1] },
            ],
          },
        },
      ],
    });

    expect(hits).toEqual([
      { title: 'example.com', url: 'https://example.com/one', snippet: '' },
      {
        title: 'example.org',
        url: 'https://example.org/two',
        snippet: 'Supported by the second source.',
        sourceDomain: 'example.org',
      },
    ]);
  });

  it('should report the outlet domain for redirect links', () => {
    const hits = hitsFromGrounding({
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              {
                web: {
                  uri: 'https://vertexaisearch.cloud.google.com/grounding-api-redirect/abc',
                  title: 'snopes.com',
                  domain: 'snopes.com',
                },
              },
              {
                web: {
                  uri: 'https://vertexaisearch.cloud.google.com/grounding-api-redirect/def',
                  title: 'reuters.com',
                  domain: 'reuters.com',
                },
              },
            ],
          },
        },
      ],
    });

    const results = normalizeHits(hits, { maxResults: 5, minTitleLength: 5 });

    expect(results.map((r) => r.sourceDomain)).toEqual(['snopes.com', 'reuters.com']);
  });

  it('should return no hits for a response without grounding', () => {
    expect(hitsFromGrounding({})).toEqual([]);
    expect(hitsFromGrounding({ candidates: [{}] })).toEqual([]);
  });
});

describe('createGroundedSearchSurface', () => {
  it('should require a project ID', () => {
    expect(() =>
      createGroundedSearchSurface({ projectId: '', location: 'europe-west1', model: 'gemini-2.0-flash' }),
    ).toThrow(ConfigurationError);
  });
});
