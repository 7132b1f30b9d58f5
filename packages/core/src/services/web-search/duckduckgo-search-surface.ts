import { JSDOM } from 'jsdom';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { SearchError } from '@verita/shared/src/utils/errors.js';
import type { RawSearchHit, SearchSurface, SearchSurfaceFetchOptions } from './types.js';

const log = createChildLogger('web-search:duckduckgo');

const ENDPOINT = 'https://html.duckduckgo.com/html/';
const OWN_DOMAIN = 'duckduckgo.com';

const HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

/**
 * Result links point at a DuckDuckGo redirect carrying the target in `uddg`.
 */
export function resolveResultLink(href: string): string {
  try {
    const url = new URL(href, `https://${OWN_DOMAIN}`);
    return url.searchParams.get('uddg') ?? url.href;
  } catch {
    return href;
  }
}

function collapseWhitespace(text: string | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function parseDuckDuckGoHtml(html: string): RawSearchHit[] {
  const { document } = new JSDOM(html).window;
  const hits: RawSearchHit[] = [];

  for (const container of Array.from(document.querySelectorAll('.result'))) {
    if (container.classList.contains('result--ad')) {
      continue;
    }

    const link = container.querySelector('a.result__a');
    const href = link?.getAttribute('href');
    if (!link || !href) {
      continue;
    }

    hits.push({
      title: collapseWhitespace(link.textContent),
      url: resolveResultLink(href),
      snippet: collapseWhitespace(container.querySelector('.result__snippet')?.textContent ?? null),
    });
  }

  return hits;
}

export function createDuckDuckGoSearchSurface(): SearchSurface {
  log.info('Using DuckDuckGo search surface');

  return {
    name: 'duckduckgo',
    ownDomain: OWN_DOMAIN,

    async fetch(query: string, options: SearchSurfaceFetchOptions): Promise<readonly RawSearchHit[]> {
      const url = `${ENDPOINT}?q=${encodeURIComponent(query)}`;
      const response = await fetch(url, { headers: HEADERS, signal: options.signal });

      if (!response.ok) {
        throw new SearchError(`DuckDuckGo responded with HTTP ${String(response.status)}`);
      }

      const hits = parseDuckDuckGoHtml(await response.text());
      log.debug({ query, hitCount: hits.length }, 'Parsed DuckDuckGo results');
      return hits;
    },
  };
}
