import type { SearchRecord } from '@verita/shared/src/types/verification.types.js';

/** One hit as the backend returned it, before filtering and normalization. */
export interface RawSearchHit {
  readonly title: string;
  readonly url: string;
  readonly snippet?: string;
  /** Outlet the hit came from, when the URL is a redirect that hides it. */
  readonly sourceDomain?: string;
}

export interface SearchSurfaceFetchOptions {
  readonly signal?: AbortSignal;
}

/**
 * A backend that turns a query into raw hits. Surfaces do not retry; they
 * throw on any failure and the SearchProvider decides what happens next.
 */
export interface SearchSurface {
  readonly name: string;
  /** Host whose own navigation links must not be reported as results. */
  readonly ownDomain?: string;
  fetch(query: string, options: SearchSurfaceFetchOptions): Promise<readonly RawSearchHit[]>;
}

export interface SearchProvider {
  search(query: string, maxResults?: number, signal?: AbortSignal): Promise<readonly SearchRecord[]>;
  generalSearch(query: string, signal?: AbortSignal): Promise<readonly SearchRecord[]>;
  newsSearch(topic: string, signal?: AbortSignal): Promise<readonly SearchRecord[]>;
  factCheckSearch(claim: string, signal?: AbortSignal): Promise<readonly SearchRecord[]>;
}
