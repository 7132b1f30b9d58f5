import type { SearchConfig } from '@verita/schemas/src/verification-config.schema.js';
import type { SearchRecord, SearchResult } from '@verita/shared/src/types/verification.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { sleep, throwIfAborted, withTimeout } from '@verita/shared/src/utils/async.js';
import type { RawSearchHit, SearchProvider, SearchSurface } from './types.js';

const log = createChildLogger('web-search:provider');

const DEFAULT_MAX_RESULTS = 5;

export interface SearchProviderOptions {
  readonly config: SearchConfig;
  readonly defaultMaxResults?: number;
  readonly now?: () => Date;
}

export function buildFactCheckQuery(claim: string, sites: readonly string[]): string {
  const filters = sites.map((site) => `site:${site}`).join(' OR ');
  return `${claim} ${filters}`;
}

export function buildNewsQuery(
  topic: string,
  keywords: readonly string[],
  year?: number,
): string {
  const terms = year === undefined ? keywords : [...keywords, String(year)];
  return [topic, ...terms].join(' ');
}

function parseHttpUrl(value: string): URL | undefined {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
  } catch {
    return undefined;
  }
}

function isOwnDomain(host: string, ownDomain: string | undefined): boolean {
  if (!ownDomain) {
    return false;
  }
  const normalized = host.toLowerCase();
  return normalized === ownDomain || normalized.endsWith(`.${ownDomain}`);
}

export function normalizeHits(
  hits: readonly RawSearchHit[],
  options: { readonly maxResults: number; readonly minTitleLength: number; readonly ownDomain?: string },
): SearchResult[] {
  const results: SearchResult[] = [];
  const seenUrls = new Set<string>();

  for (const hit of hits) {
    if (results.length >= options.maxResults) {
      break;
    }

    const url = parseHttpUrl(hit.url.trim());
    if (!url || isOwnDomain(url.hostname, options.ownDomain)) {
      continue;
    }

    const title = hit.title.trim();
    if (title.length < options.minTitleLength) {
      continue;
    }

    const href = url.href;
    if (seenUrls.has(href)) {
      continue;
    }
    seenUrls.add(href);

    results.push({
      title,
      snippet: hit.snippet?.trim() ?? '',
      url: href,
      sourceDomain: hit.sourceDomain?.trim() || url.host,
    });
  }

  return results;
}

export function createSearchProvider(
  surface: SearchSurface,
  options: SearchProviderOptions,
): SearchProvider {
  const { config } = options;
  const defaultMaxResults = options.defaultMaxResults ?? DEFAULT_MAX_RESULTS;
  const now = options.now ?? ((): Date => new Date());

  async function search(
    query: string,
    maxResults: number = defaultMaxResults,
    signal?: AbortSignal,
  ): Promise<readonly SearchRecord[]> {
    log.debug({ surface: surface.name, query }, 'Executing search');

    let lastFailure: string | undefined;

    for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
      throwIfAborted(signal);

      try {
        const hits = await surface.fetch(query, {
          signal: withTimeout(config.attemptTimeoutMs, signal),
        });
        const results = normalizeHits(hits, {
          maxResults,
          minTitleLength: config.minTitleLength,
          ownDomain: surface.ownDomain,
        });

        if (results.length > 0) {
          log.debug(
            { surface: surface.name, query, resultCount: results.length, attempt: attempt + 1 },
            'Search completed',
          );
          return results;
        }

        // Blocked or empty pages look like zero results; retry them like errors.
        lastFailure = undefined;
        log.warn(
          { surface: surface.name, query, attempt: attempt + 1, rawHitCount: hits.length },
          'Search returned no usable results',
        );
      } catch (error) {
        throwIfAborted(signal);
        lastFailure = error instanceof Error ? error.message : String(error);
        log.warn(
          { surface: surface.name, query, attempt: attempt + 1, error: lastFailure },
          'Search attempt failed',
        );
      }

      if (attempt < config.maxAttempts - 1) {
        await sleep(config.retryDelayMs, signal);
      }
    }

    const error =
      lastFailure === undefined
        ? 'No results found'
        : `Search failed after ${String(config.maxAttempts)} attempts: ${lastFailure}`;

    log.warn({ surface: surface.name, query, error }, 'Search exhausted, returning error marker');
    return [{ error }];
  }

  return {
    search,

    generalSearch(query: string, signal?: AbortSignal): Promise<readonly SearchRecord[]> {
      return search(query, defaultMaxResults, signal);
    },

    newsSearch(topic: string, signal?: AbortSignal): Promise<readonly SearchRecord[]> {
      const year = config.appendCurrentYear ? now().getFullYear() : undefined;
      return search(buildNewsQuery(topic, config.newsKeywords, year), defaultMaxResults, signal);
    },

    factCheckSearch(claim: string, signal?: AbortSignal): Promise<readonly SearchRecord[]> {
      return search(buildFactCheckQuery(claim, config.factCheckSites), defaultMaxResults, signal);
    },
  };
}
