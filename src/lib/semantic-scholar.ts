import { z } from 'zod';

import { errorMessage } from './errors.js';
import { fetchWithRetry, withQuery } from './http.js';
import { getLogger, short } from './logger.js';
import { matchVla } from './vla-filter.js';
import type { FilterRules, Paper } from './types.js';

export const S2_API = 'https://api.semanticscholar.org/graph/v1';

const MAX_INSTITUTIONS = 15;

const AffiliationSchema = z.union([
  z.string(),
  z.object({ name: z.string().nullish(), displayName: z.string().nullish() }).passthrough(),
]);

const AuthorSchema = z
  .object({
    name: z.string().nullish(),
    affiliations: z.array(AffiliationSchema).nullish(),
  })
  .passthrough();

const SearchItemSchema = z
  .object({
    paperId: z.string().nullish(),
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    url: z.string().nullish(),
    year: z.number().nullish(),
    venue: z.string().nullish(),
    publicationDate: z.string().nullish(),
    authors: z.array(AuthorSchema).nullish(),
    openAccessPdf: z.object({ url: z.string().nullish() }).passthrough().nullish(),
    externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
    citationCount: z.number().nullish(),
    influentialCitationCount: z.number().nullish(),
  })
  .passthrough();

const SearchResponseSchema = z.object({
  data: z.array(SearchItemSchema).nullish(),
});

export type S2Paper = z.infer<typeof SearchItemSchema>;

/** Unique affiliation names from an author list, capped at 15. */
export function collectInstitutions(authors: z.infer<typeof AuthorSchema>[], maxAuthors: number): string[] {
  const institutions: string[] = [];
  for (const author of authors.slice(0, maxAuthors)) {
    for (const aff of author.affiliations ?? []) {
      const name = typeof aff === 'string' ? aff : aff.name || aff.displayName;
      if (name && !institutions.includes(name)) institutions.push(name);
      if (institutions.length >= MAX_INSTITUTIONS) return institutions;
    }
  }
  return institutions;
}

function cutoffDate(daysBack: number, now: Date): string {
  const d = new Date(now.getTime() - daysBack * 24 * 60 * 60 * 1000);
  return d.toISOString().slice(0, 10);
}

export function s2ItemToPaper(item: S2Paper, institutions: string[]): Paper {
  const ids = item.externalIds ?? {};
  const doi = ids['DOI'] !== undefined ? String(ids['DOI']) : '';
  const arxivId = ids['ArXiv'] !== undefined ? String(ids['ArXiv']) : '';

  let pdfUrl = item.openAccessPdf?.url ?? '';
  if (!pdfUrl && arxivId) pdfUrl = `https://arxiv.org/pdf/${arxivId}.pdf`;

  const year = item.year ?? null;
  const publishedDate = item.publicationDate ? item.publicationDate : year ? `${year}-01-01` : '';

  return {
    title: (item.title ?? '').replace(/\s+/g, ' ').trim() || 'Untitled',
    authors: (item.authors ?? []).map((a) => a.name ?? '').join(', '),
    year: year ? String(year) : '',
    abstract: (item.abstract ?? '').slice(0, 2000),
    url: item.url ?? '',
    pdfUrl,
    doi: doi || (arxivId ? `arXiv:${arxivId}` : ''),
    venue: item.venue || 'Conference',
    tags: ['VLA', 'Semantic Scholar'],
    publishedDate,
    institutions,
  };
}

export interface S2SearchOptions {
  keywords: string[];
  daysBack: number;
  maxResults: number;
  enrichInstitutions: boolean;
  filter?: FilterRules;
  now?: Date;
}

/**
 * Keyword search restricted to recent publications. Rate limiting (429)
 * and other failures yield an empty list; this source is optional.
 */
export async function searchSemanticScholar(opts: S2SearchOptions): Promise<Paper[]> {
  const { keywords, daysBack, maxResults, enrichInstitutions, filter, now = new Date() } = opts;
  const log = getLogger();
  const query = keywords.join(' ');

  const url = withQuery(`${S2_API}/paper/search`, {
    query,
    limit: maxResults,
    fields:
      'title,authors.name,authors.affiliations,year,abstract,url,openAccessPdf,externalIds,venue,publicationDate',
    publicationDateOrYear: `${cutoffDate(daysBack, now)}:`,
  });

  try {
    log.info({ query }, 'Searching Semantic Scholar');
    const res = await fetchWithRetry(url, {}, { maxAttempts: 1, timeoutMs: 30_000, passthroughStatus: [429] });
    if (res.status === 429) {
      log.warn('Semantic Scholar rate limited (429), skipping this source');
      return [];
    }

    const body = SearchResponseSchema.parse(await res.json());
    const papers: Paper[] = [];
    for (const item of body.data ?? []) {
      const title = item.title ?? 'Untitled';
      if (!matchVla(title, item.abstract ?? '', filter).related) {
        log.debug({ title: short(title) }, 'Dropped non-VLA paper');
        continue;
      }
      const institutions = enrichInstitutions ? collectInstitutions(item.authors ?? [], 20) : [];
      papers.push(s2ItemToPaper(item, institutions));
    }

    log.info({ count: papers.length }, 'Semantic Scholar search finished');
    return papers;
  } catch (e) {
    log.error({ err: errorMessage(e) }, 'Semantic Scholar search failed');
    return [];
  }
}

type PaperRef = Pick<Paper, 'title' | 'doi' | 'url'>;

/** Semantic Scholar paper id for a DOI, an arXiv doi, or an arXiv/doi.org URL. */
export function resolveS2PaperId(paper: PaperRef): string | null {
  const doi = paper.doi ?? '';
  if (doi.startsWith('10.')) return `DOI:${doi}`;
  if (doi.toLowerCase().startsWith('doi:')) return `DOI:${doi.slice(4)}`;
  if (doi.toLowerCase().startsWith('arxiv:')) return `arXiv:${doi.slice(doi.indexOf(':') + 1)}`;

  const url = paper.url ?? '';
  if (url.includes('arxiv.org') && url.includes('/abs/')) {
    const tail = url.split('/abs/').pop() ?? '';
    return `arXiv:${tail.replace(/v\d+$/, '')}`;
  }
  const m = url.match(/doi\.org\/(10\.\S+)/);
  if (m?.[1]) return `DOI:${m[1]}`;
  return null;
}

async function searchFirst(title: string, fields: string): Promise<S2Paper | null> {
  const url = withQuery(`${S2_API}/paper/search`, { query: title, limit: 1, fields });
  const res = await fetchWithRetry(url, {}, { maxAttempts: 1, timeoutMs: 20_000, passthroughStatus: [429] });
  if (res.status === 429) {
    getLogger().warn('Semantic Scholar rate limited (429)');
    return null;
  }
  const body = SearchResponseSchema.parse(await res.json());
  return body.data?.[0] ?? null;
}

async function getPaper(paperId: string, fields: string): Promise<S2Paper | null> {
  const url = withQuery(`${S2_API}/paper/${paperId}`, { fields });
  const res = await fetchWithRetry(url, {}, { maxAttempts: 1, timeoutMs: 20_000, passthroughStatus: [404, 429] });
  if (res.status === 404) {
    getLogger().warn({ paperId }, 'Paper not found on Semantic Scholar');
    return null;
  }
  if (res.status === 429) {
    getLogger().warn('Semantic Scholar rate limited (429)');
    return null;
  }
  return SearchItemSchema.parse(await res.json());
}

/**
 * Author affiliations of a paper (first 15 authors). Looks the paper up by
 * DOI, arXiv id or URL, then by title search. Never throws.
 */
export async function fetchInstitutions(paper: PaperRef): Promise<string[]> {
  const log = getLogger();
  try {
    let paperId = resolveS2PaperId(paper);
    if (!paperId) {
      if (!paper.title) {
        log.warn('Paper has neither DOI nor title, cannot look up institutions');
        return [];
      }
      const hit = await searchFirst(paper.title, 'paperId');
      paperId = hit?.paperId ?? null;
      if (!paperId) return [];
    }

    const details = await getPaper(paperId, 'authors.affiliations,authors.name');
    if (!details) return [];
    const institutions = collectInstitutions(details.authors ?? [], 15);
    log.debug({ paperId, count: institutions.length }, 'Fetched institutions');
    return institutions;
  } catch (e) {
    log.error({ err: errorMessage(e) }, 'Institution lookup failed');
    return [];
  }
}

export interface CitationCounts {
  citations: number | null;
  influentialCitations: number | null;
}

/** Citation counts by DOI, then arXiv id, then title search. */
export async function fetchCitationCounts(paper: PaperRef): Promise<CitationCounts> {
  const fields = 'citationCount,influentialCitationCount,title,venue';
  const doi = paper.doi ?? '';

  const candidates: string[] = [];
  if (doi.toLowerCase().startsWith('doi:')) candidates.push(`DOI:${doi.slice(4)}`);
  else if (doi.startsWith('10.')) candidates.push(`DOI:${doi}`);
  if (doi.toLowerCase().startsWith('arxiv:')) candidates.push(`arXiv:${doi.slice(doi.indexOf(':') + 1)}`);

  for (const id of candidates) {
    try {
      const data = await getPaper(id, fields);
      if (data && data.citationCount !== undefined && data.citationCount !== null) {
        return { citations: data.citationCount, influentialCitations: data.influentialCitationCount ?? null };
      }
    } catch (e) {
      getLogger().debug({ id, err: errorMessage(e) }, 'Citation lookup failed');
    }
  }

  if (paper.title) {
    try {
      const hit = await searchFirst(paper.title, fields);
      if (hit) {
        return { citations: hit.citationCount ?? null, influentialCitations: hit.influentialCitationCount ?? null };
      }
    } catch (e) {
      getLogger().debug({ err: errorMessage(e) }, 'Citation title search failed');
    }
  }

  return { citations: null, influentialCitations: null };
}
