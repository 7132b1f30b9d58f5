import { describe, it, expect } from 'vitest';
import { createMockSearchSurface } from './mock-search-surface.js';
import type { RawSearchHit } from './types.js';

describe('MockSearchSurface', () => {
  it('should return default hits for unknown queries', async () => {
    const surface = createMockSearchSurface();
    const hits = await surface.fetch('test query', {});

    expect(hits.length).toBeGreaterThan(0);
    expect(hits[0]?.url).toBe('https://example.com/source1');
  });

  it('should return configured hits for an exact query', async () => {
    const responses = new Map<string, readonly RawSearchHit[]>([
      ['specific query', [{ title: 'Specific result', url: 'https://specific.example.com' }]],
    ]);

    const surface = createMockSearchSurface(responses);
    const hits = await surface.fetch('specific query', {});

    expect(hits).toEqual([{ title: 'Specific result', url: 'https://specific.example.com' }]);
  });

  it('should match a shaped query that contains a configured key', async () => {
    const responses = new Map<string, readonly RawSearchHit[]>([
      ['statue', [{ title: 'Statue fact check', url: 'https://snopes.com/statue' }]],
    ]);

    const surface = createMockSearchSurface(responses);
    const hits = await surface.fetch('statue moved site:snopes.com OR site:factcheck.org', {});

    expect(hits[0]?.title).toBe('Statue fact check');
  });

  it('should reject when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const surface = createMockSearchSurface();

    await expect(surface.fetch('query', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
  });
});
