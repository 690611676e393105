import { errorMessage } from './errors.js';
import { getLogger, short } from './logger.js';
import type { NotionClient } from './notion/client.js';
import { institutionOptions, scoreProperties } from './notion/properties.js';
import type { PageProperties } from './notion/properties.js';
import type { LlmScorer } from './scoring/llm.js';
import type { CitationCounts } from './semantic-scholar.js';
import { sleep } from './sleep.js';
import type { AppConfig, ExistingPaper, Paper, PatchField } from './types.js';

/** Fields the patch phase knows how to fill, in the order it fills them. */
export const PATCH_ORDER = ['pdfUrl', 'citations', 'institutions', 'recommendScore'] as const;
export type PatchableField = (typeof PATCH_ORDER)[number];

/**
 * PDF link for a row that has none: from an `arXiv:<id>` doi, an arxiv.org
 * abstract URL, or an arxiv.org PDF URL as is.
 */
export function derivePdfLink(paper: Pick<ExistingPaper, 'pdfUrl' | 'doi' | 'url'>): string | null {
  if (paper.pdfUrl) return null;

  const doi = paper.doi ?? '';
  if (doi.toLowerCase().startsWith('arxiv:')) {
    return `https://arxiv.org/pdf/${doi.slice(doi.indexOf(':') + 1)}.pdf`;
  }

  const url = paper.url ?? '';
  if (url.includes('arxiv.org')) {
    if (url.includes('/abs/')) {
      const id = (url.split('/abs/').pop() ?? '').replace(/v\d+$/, '');
      return `https://arxiv.org/pdf/${id}.pdf`;
    }
    if (url.includes('/pdf/')) return url;
  }
  return null;
}

/** null, blank strings and empty lists are missing; 0 is a value. */
export function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function detectMissingFields(
  papers: ExistingPaper[],
  fields: readonly PatchField[]
): Partial<Record<PatchField, ExistingPaper[]>> {
  const missing: Partial<Record<PatchField, ExistingPaper[]>> = {};
  for (const field of fields) missing[field] = [];

  for (const paper of papers) {
    if (!paper.pageId) continue;
    for (const field of fields) {
      if (isMissing(paper[field])) missing[field]?.push(paper);
    }
  }

  const counts: Partial<Record<PatchField, number>> = {};
  for (const field of fields) {
    const n = missing[field]?.length ?? 0;
    if (n > 0) counts[field] = n;
  }
  if (Object.keys(counts).length > 0) getLogger().info({ missing: counts }, 'Missing fields');
  return missing;
}

/** A database row in the shape the scorer expects. */
export function existingToPaper(row: ExistingPaper): Paper {
  return {
    title: row.title ?? '',
    authors: row.authors ?? '',
    year: row.year === null ? '' : String(row.year),
    abstract: row.abstract ?? '',
    url: row.url ?? '',
    pdfUrl: row.pdfUrl ?? '',
    doi: row.doi ?? '',
    venue: '',
    tags: [],
    publishedDate: '',
    institutions: row.institutions ?? [],
    citations: row.citations ?? undefined,
    influentialCitations: row.influentialCitations ?? undefined,
  };
}

export interface PatchDeps {
  fetchCitations?: (paper: { title: string; doi: string; url: string }) => Promise<CitationCounts>;
  fetchInstitutions?: (paper: { title: string; doi: string; url: string }) => Promise<string[]>;
  scorer?: Pick<LlmScorer, 'scorePaper'>;
  useFullPdf?: boolean;
  /** Pause after each row. */
  delayMs?: number;
  /** Extra pause after each model call. */
  llmDelayMs?: number;
}

export interface PatchResult {
  success: number;
  failed: number;
}

async function updatesFor(field: PatchableField, row: ExistingPaper, deps: PatchDeps): Promise<PageProperties> {
  const log = getLogger();
  const ref = { title: row.title ?? '', doi: row.doi ?? '', url: row.url ?? '' };

  switch (field) {
    case 'pdfUrl': {
      const pdfUrl = derivePdfLink(row);
      if (!pdfUrl) return {};
      log.info({ title: short(ref.title, 40), pdfUrl }, 'Derived PDF link');
      return { 'PDF Link': { url: pdfUrl } };
    }
    case 'citations': {
      if (!deps.fetchCitations) return {};
      const { citations, influentialCitations } = await deps.fetchCitations(ref);
      if (citations === null) return {};
      const props: PageProperties = { Citations: { number: Math.trunc(citations) } };
      if (influentialCitations !== null) props['Influential Citations'] = { number: Math.trunc(influentialCitations) };
      log.info({ title: short(ref.title, 40), citations }, 'Found citations');
      return props;
    }
    case 'institutions': {
      if (!deps.fetchInstitutions) return {};
      const options = institutionOptions(await deps.fetchInstitutions(ref));
      if (options.length === 0) return {};
      log.info({ title: short(ref.title, 40), count: options.length }, 'Found institutions');
      return { Institutions: { multi_select: options } };
    }
    case 'recommendScore': {
      if (!deps.scorer) return {};
      const result = await deps.scorer.scorePaper(existingToPaper(row), { useFullPdf: deps.useFullPdf });
      if (!result) return {};
      log.info({ title: short(ref.title, 40), score: result.score }, 'Scored with LLM');
      await sleep(deps.llmDelayMs ?? 500);
      return scoreProperties(result.score, result.rationale);
    }
  }
}

/** Fill one field on up to maxPapers rows. Rows with nothing found count as neither. */
export async function patchMissingFields(
  client: Pick<NotionClient, 'updatePaperFields'>,
  rows: ExistingPaper[],
  field: PatchableField,
  deps: PatchDeps,
  maxPapers = 10
): Promise<PatchResult> {
  const log = getLogger();
  const result: PatchResult = { success: 0, failed: 0 };

  for (const row of rows.slice(0, maxPapers)) {
    try {
      const updates = await updatesFor(field, row, deps);
      if (Object.keys(updates).length > 0) {
        if (await client.updatePaperFields(row.pageId, updates)) result.success += 1;
        else result.failed += 1;
      }
    } catch (e) {
      log.error({ field, title: short(row.title ?? '', 40), err: errorMessage(e) }, 'Patching field failed');
      result.failed += 1;
    }
    await sleep(deps.delayMs ?? 300);
  }

  log.info({ field, ...result }, 'Patch pass finished');
  return result;
}

export interface PatchSummary {
  scanned: number;
  fields: Partial<Record<PatchableField, PatchResult>>;
}

/** Scan existing rows and fill missing fields, each field behind its own flag and limit. */
export async function runPatch(
  client: Pick<NotionClient, 'fetchExistingPapers' | 'updatePaperFields'>,
  config: AppConfig['patch'],
  deps: PatchDeps
): Promise<PatchSummary> {
  const log = getLogger();
  const summary: PatchSummary = { scanned: 0, fields: {} };

  const rows = await client.fetchExistingPapers({ maxPapers: config.maxPapersToScan });
  summary.scanned = rows.length;
  if (rows.length === 0) {
    log.info('No existing papers found, nothing to patch');
    return summary;
  }

  const missing = detectMissingFields(rows, PATCH_ORDER);
  for (const field of PATCH_ORDER) {
    const fieldConfig = config[field];
    if (!fieldConfig.enabled) {
      log.debug({ field }, 'Patch disabled for field');
      continue;
    }
    const candidates = missing[field] ?? [];
    if (candidates.length === 0) continue;
    summary.fields[field] = await patchMissingFields(client, candidates, field, deps, fieldConfig.maxPapers);
  }
  return summary;
}
