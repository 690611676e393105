import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';

import { DEFAULT_QUERY_PHRASES } from './config.js';
import { errorMessage } from './errors.js';
import { fetchWithRetry, withQuery } from './http.js';
import { getLogger, short } from './logger.js';
import { matchVla } from './vla-filter.js';
import type { FilterRules, Paper } from './types.js';

export const ARXIV_API = 'https://export.arxiv.org/api/query';

export interface ArxivEntry {
  arxivId: string; // canonical, no version
  version: string; // v1, v2, ...
  title: string;
  summary: string;
  authors: string[];
  categories: string[];
  publishedAt: string;
  updatedAt: string;
  pdfUrl: string | null;
  absUrl: string | null;
  rawIdUrl: string;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  // Titles like "1000" would otherwise come back as numbers.
  parseTagValue: false,
});

// Loose shape of what fast-xml-parser hands back for an Atom feed.
const textish = z.union([z.string(), z.number()]).transform(String).optional().catch(undefined);

const AuthorSchema = z.object({ name: textish }).passthrough();
const CategorySchema = z.object({ '@_term': textish }).passthrough();
const LinkSchema = z
  .object({ '@_href': textish, '@_type': textish, '@_title': textish, '@_rel': textish })
  .passthrough();

const AtomEntrySchema = z
  .object({
    id: textish,
    title: textish,
    summary: textish,
    published: textish,
    updated: textish,
    author: z.union([z.array(AuthorSchema), AuthorSchema]).optional(),
    category: z.union([z.array(CategorySchema), CategorySchema]).optional(),
    link: z.union([z.array(LinkSchema), LinkSchema]).optional(),
  })
  .passthrough();

const AtomFeedSchema = z.object({
  feed: z
    .object({
      entry: z.union([z.array(AtomEntrySchema), AtomEntrySchema]).optional(),
    })
    .passthrough()
    .optional()
    .catch(undefined),
});

function asArray<T>(x: T | T[] | undefined | null): T[] {
  if (!x) return [];
  return Array.isArray(x) ? x : [x];
}

// Example id URL: http://arxiv.org/abs/2502.12345v2
export function parseArxivId(idUrl: string): { arxivId: string; version: string } {
  const m = idUrl.match(/arxiv\.org\/abs\/(.+)$/);
  const tail = m?.[1] ?? idUrl;
  const mv = tail.match(/^(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?$/);
  const arxivId = mv?.groups?.['id'] ?? tail.replace(/v\d+$/, '');
  const version = mv?.groups?.['v'] ?? 'v1';
  return { arxivId, version };
}

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function buildSearchQuery(phrases: string[] = DEFAULT_QUERY_PHRASES): string {
  return phrases.map((p) => `all:"${p}"`).join(' OR ');
}

export async function fetchAtom(query: string, start: number, maxResults: number): Promise<string> {
  const url = withQuery(ARXIV_API, {
    search_query: query,
    start,
    max_results: maxResults,
    sortBy: 'submittedDate',
    sortOrder: 'descending',
  });
  // arXiv rate-limits aggressively; be conservative with attempts.
  const res = await fetchWithRetry(url, {}, { maxAttempts: 5, timeoutMs: 30_000 });
  return await res.text();
}

export function parseAtom(xml: string): ArxivEntry[] {
  const doc = AtomFeedSchema.safeParse(parser.parse(xml));
  if (!doc.success) return [];
  const entries = asArray(doc.data.feed?.entry);

  return entries.map((e) => {
    const rawIdUrl = e.id ?? '';
    const { arxivId, version } = parseArxivId(rawIdUrl);

    const authors = asArray(e.author).map((a) => collapse(a.name ?? '')).filter(Boolean);
    const categories = asArray(e.category).map((c) => c['@_term'] ?? '').filter(Boolean);

    const links = asArray(e.link);
    const absUrl = links.map((l) => l['@_href'] ?? '').find((href) => href.includes('/abs/')) ?? null;
    const pdfUrl =
      links.find((l) => l['@_type'] === 'application/pdf' || l['@_title'] === 'pdf')?.['@_href'] ?? null;

    return {
      arxivId,
      version,
      title: collapse(e.title ?? ''),
      summary: collapse(e.summary ?? ''),
      authors,
      categories,
      publishedAt: e.published ?? '',
      updatedAt: e.updated ?? '',
      pdfUrl,
      absUrl,
      rawIdUrl,
    } satisfies ArxivEntry;
  });
}

export function withinLastDays(iso: string, days: number, now = new Date()): boolean {
  const t = Date.parse(iso);
  if (Number.isNaN(t)) return false;
  const windowMs = days * 24 * 60 * 60 * 1000;
  return t >= now.getTime() - windowMs;
}

export function entryToPaper(entry: ArxivEntry): Paper {
  const idWithVersion = `${entry.arxivId}${entry.version}`;
  return {
    title: entry.title || 'Untitled',
    authors: entry.authors.join(', '),
    year: entry.publishedAt.length >= 4 ? entry.publishedAt.slice(0, 4) : '',
    abstract: entry.summary.slice(0, 2000),
    url: entry.absUrl ?? entry.rawIdUrl,
    pdfUrl: entry.pdfUrl ?? '',
    doi: `arXiv:${idWithVersion}`,
    venue: 'ArXiv',
    tags: ['VLA', 'arXiv'],
    publishedDate: entry.publishedAt,
    institutions: [],
  };
}

export interface ArxivSearchOptions {
  daysBack: number;
  maxResults: number;
  pageSize?: number;
  queryPhrases?: string[];
  filter?: FilterRules;
  now?: Date;
}

/**
 * Page through the newest submissions matching the VLA query. Paging stops
 * at the first entry older than the window, an empty page, or maxResults.
 * A failed request ends the search with what was collected so far.
 */
export async function searchArxiv(opts: ArxivSearchOptions): Promise<Paper[]> {
  const { daysBack, maxResults, pageSize = 100, queryPhrases, filter, now = new Date() } = opts;
  const log = getLogger();
  const query = buildSearchQuery(queryPhrases);
  const papers: Paper[] = [];

  let fetched = 0;
  let start = 0;

  try {
    while (fetched < maxResults) {
      const thisPage = Math.min(pageSize, maxResults - fetched);
      log.info({ query, start, maxResults: thisPage }, 'Searching arXiv');

      const entries = parseAtom(await fetchAtom(query, start, thisPage));
      if (entries.length === 0) {
        log.info('arXiv returned no more results');
        break;
      }

      let reachedCutoff = false;
      for (const entry of entries) {
        // An unparseable date skips the check instead of ending the search.
        const datable = !Number.isNaN(Date.parse(entry.publishedAt));
        if (datable && !withinLastDays(entry.publishedAt, daysBack, now)) {
          reachedCutoff = true;
          break;
        }

        const m = matchVla(entry.title, entry.summary, filter);
        if (!m.related) {
          log.debug({ title: short(entry.title) }, 'Dropped non-VLA paper');
          continue;
        }
        papers.push(entryToPaper(entry));
      }

      fetched += thisPage;
      start += thisPage;
      if (reachedCutoff) break;
    }
  } catch (e) {
    log.error({ err: errorMessage(e) }, 'arXiv search failed');
    return papers;
  }

  log.info({ count: papers.length }, 'arXiv search finished');
  return papers;
}
