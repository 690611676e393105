import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchImpact, sourceIdOf } from './openalex.js';

function okJson(body: unknown) {
  return { ok: true, status: 200, json: async () => body };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('sourceIdOf', () => {
  it('prefers host_venue, then primary_location', () => {
    expect(sourceIdOf({ host_venue: { id: 'https://openalex.org/S1' } })).toBe('S1');
    expect(sourceIdOf({ primary_location: { source: { id: 'https://openalex.org/S2' } } })).toBe('S2');
    expect(sourceIdOf({ primary_location: { source: null } })).toBeNull();
  });
});

describe('fetchImpact', () => {
  it('reads the 2-year mean citedness of the source of a DOI', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(okJson({ id: 'W1', primary_location: { source: { id: 'https://openalex.org/S123' } } }))
      .mockResolvedValueOnce(okJson({ summary_stats: { '2yr_mean_citedness': 4.2 } }));
    vi.stubGlobal('fetch', mockFetch);

    expect(await fetchImpact({ doi: '10.1000/xyz', title: 'T' }, 'me@example.org')).toBe(4.2);

    const first = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(first.pathname).toBe('/works/doi:10.1000/xyz');
    expect(first.searchParams.get('mailto')).toBe('me@example.org');
    expect(new URL(String(mockFetch.mock.calls[1]?.[0])).pathname).toBe('/sources/S123');
  });

  it('falls back to a title search', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(okJson({ results: [{ host_venue: { id: 'https://openalex.org/S9' } }] }))
      .mockResolvedValueOnce(okJson({ summary_stats: {} }));
    vi.stubGlobal('fetch', mockFetch);

    expect(await fetchImpact({ doi: '', title: 'A VLA model' })).toBeNull();
    const search = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(search.pathname).toBe('/works');
    expect(search.searchParams.get('search')).toBe('A VLA model');
    expect(search.searchParams.get('per_page')).toBe('1');
    expect(search.searchParams.has('mailto')).toBe(false);
  });

  it('gives null when the work is not found', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 404, statusText: 'Not Found' }));
    expect(await fetchImpact({ doi: 'arXiv:2510.00001', title: '' })).toBeNull();
  });
});
