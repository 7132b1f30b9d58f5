import type { LlmConfig } from '@verita/schemas/src/verification-config.schema.js';
import { ConfigurationError } from '@verita/shared/src/utils/errors.js';
import type { SearchSurface } from './types.js';
import { createDuckDuckGoSearchSurface } from './duckduckgo-search-surface.js';
import { createGroundedSearchSurface } from './grounded-search-surface.js';
import { createMockSearchSurface } from './mock-search-surface.js';

export type SearchBackend = 'duckduckgo' | 'grounded' | 'mock';

function resolveBackend(): SearchBackend {
  const backend = process.env['VERITA_SEARCH_BACKEND'] ?? 'duckduckgo';
  if (backend === 'duckduckgo' || backend === 'grounded' || backend === 'mock') {
    return backend;
  }
  throw new ConfigurationError(
    `Unknown VERITA_SEARCH_BACKEND "${backend}". Expected duckduckgo, grounded or mock`,
  );
}

export function createSearchSurface(llmConfig: LlmConfig): SearchSurface {
  const backend = resolveBackend();

  switch (backend) {
    case 'mock':
      return createMockSearchSurface();
    case 'grounded':
      return createGroundedSearchSurface({
        projectId: process.env['GCP_PROJECT_ID'] ?? '',
        location: process.env['VERTEX_AI_LOCATION'] ?? llmConfig.location,
        model: llmConfig.model,
      });
    case 'duckduckgo':
      return createDuckDuckGoSearchSurface();
  }
}
