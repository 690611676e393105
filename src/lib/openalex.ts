import { z } from 'zod';

import { errorMessage } from './errors.js';
import { fetchJson, withQuery } from './http.js';
import { getLogger } from './logger.js';
import type { Paper } from './types.js';

export const OPENALEX_API = 'https://api.openalex.org';

const WorkSchema = z
  .object({
    id: z.string().nullish(),
    host_venue: z.object({ id: z.string().nullish() }).passthrough().nullish(),
    primary_location: z
      .object({ source: z.object({ id: z.string().nullish() }).passthrough().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const WorkSearchSchema = z.object({ results: z.array(WorkSchema).nullish() });

const SourceSchema = z
  .object({
    summary_stats: z.object({ '2yr_mean_citedness': z.number().nullish() }).passthrough().nullish(),
  })
  .passthrough();

type Work = z.infer<typeof WorkSchema>;

async function tryJson<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S> | null> {
  try {
    return await fetchJson(url, schema, {}, { maxAttempts: 1, timeoutMs: 20_000 });
  } catch (e) {
    getLogger().debug({ url, err: errorMessage(e) }, 'OpenAlex request failed');
    return null;
  }
}

export function sourceIdOf(work: Work): string | null {
  const id = work.host_venue?.id ?? work.primary_location?.source?.id ?? null;
  if (!id) return null;
  // https://openalex.org/S123456789 → S123456789
  return id.split('/').pop() ?? null;
}

/**
 * Approximate venue impact: the 2-year mean citedness of the work's source.
 * Not an official impact factor.
 */
export async function fetchImpact(paper: Pick<Paper, 'doi' | 'title'>, mailto?: string): Promise<number | null> {
  const params = { mailto };
  let work: Work | null = null;

  const doi = paper.doi;
  if (doi.startsWith('10.')) {
    work = await tryJson(withQuery(`${OPENALEX_API}/works/doi:${doi}`, params), WorkSchema);
  } else if (doi.toLowerCase().startsWith('arxiv:')) {
    work = await tryJson(withQuery(`${OPENALEX_API}/works/arXiv:${doi.slice(doi.indexOf(':') + 1)}`, params), WorkSchema);
  }

  if (!work && paper.title) {
    const search = await tryJson(
      withQuery(`${OPENALEX_API}/works`, { ...params, search: paper.title, per_page: 1 }),
      WorkSearchSchema
    );
    work = search?.results?.[0] ?? null;
  }
  if (!work) return null;

  const sourceId = sourceIdOf(work);
  if (!sourceId) return null;

  const source = await tryJson(withQuery(`${OPENALEX_API}/sources/${sourceId}`, params), SourceSchema);
  return source?.summary_stats?.['2yr_mean_citedness'] ?? null;
}
