import { createChildLogger } from '@verita/shared/src/logger.js';
import { throwIfAborted } from '@verita/shared/src/utils/async.js';
import type { RawSearchHit, SearchSurface, SearchSurfaceFetchOptions } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_HITS: readonly RawSearchHit[] = [
  {
    title: 'Mock search result with general information',
    url: 'https://example.com/source1',
    snippet: 'General background information about the topic.',
  },
  {
    title: 'Second mock search result',
    url: 'https://example.org/source2',
    snippet: 'Further coverage of the topic from another outlet.',
  },
];

/**
 * Serves canned hits. Lookup is by exact query first, then by the first
 * configured key the query contains, so shaped queries still match.
 */
export function createMockSearchSurface(
  responses?: ReadonlyMap<string, readonly RawSearchHit[]>,
): SearchSurface {
  log.info('Using mock search surface');

  return {
    name: 'mock',

    async fetch(query: string, options: SearchSurfaceFetchOptions): Promise<readonly RawSearchHit[]> {
      throwIfAborted(options.signal);
      log.debug({ query }, 'Mock search');

      const exact = responses?.get(query);
      if (exact) {
        return exact;
      }

      for (const [key, hits] of responses ?? []) {
        if (query.includes(key)) {
          return hits;
        }
      }

      return DEFAULT_HITS;
    },
  };
}
