import crypto from 'node:crypto';

import { searchArxiv } from '../arxiv.js';
import { migrate, openDb } from '../db.js';
import type { Db } from '../db.js';
import { enrichMetrics } from '../enrich.js';
import { errorMessage } from '../errors.js';
import { hasPoppler } from '../extract.js';
import { FigureExtractor } from '../figures.js';
import { getLogger, short } from '../logger.js';
import { NotionClient } from '../notion/client.js';
import { ENRICHMENT_PROPERTIES, METRICS_PROPERTIES } from '../notion/properties.js';
import { runPatch } from '../patch.js';
import type { PatchDeps, PatchSummary } from '../patch.js';
import { finalizeRun, insertRun, isSynced, recordSyncedPaper } from '../repo.js';
import type { RunStatus } from '../repo.js';
import { LlmScorer } from '../scoring/llm.js';
import type { LlmClient } from '../scoring/llm.js';
import { computeRuleScore } from '../scoring/rule-score.js';
import { fetchCitationCounts, fetchInstitutions, searchSemanticScholar } from '../semantic-scholar.js';
import { sleep } from '../sleep.js';
import { dbPath as defaultDbPath } from '../storage.js';
import type { AppConfig, Paper } from '../types.js';

/** What the crawl needs from the workspace database. */
export type PaperStore = Pick<
  NotionClient,
  | 'ensureProperties'
  | 'filterDuplicates'
  | 'addPaper'
  | 'updateFrameworkDiagram'
  | 'updateFrameworkImage'
  | 'fetchExistingPapers'
  | 'updatePaperFields'
>;

export type FigureSource = Pick<FigureExtractor, 'isAvailable' | 'processPaper'>;

export interface CrawlOptions {
  config: AppConfig;
  now?: Date;
  /** Read-only run: nothing is written to the workspace database. */
  dryRun?: boolean;
  /** Overrides `sync.maxPapers`. */
  maxPapers?: number;
  dbPath?: string;
  store?: PaperStore;
  llmClient?: LlmClient;
  figures?: FigureSource;
  /** Pause before querying Semantic Scholar. */
  sourcePauseMs?: number;
}

export interface CrawlStats {
  dryRun: boolean;
  arxiv: number;
  semanticScholar: number;
  candidates: number;
  alreadySynced: number;
  newPapers: number;
  withCitations: number;
  withImpact: number;
  llmScored: number;
  ruleScored: number;
  added: number;
  addFailed: number;
  figures: number;
  patch?: PatchSummary;
  startedAt: string;
  error?: string;
}

export interface CrawlResult {
  runId: string;
  status: RunStatus;
  stats: CrawlStats;
}

export function notionPageUrl(pageId: string): string {
  return `https://www.notion.so/${pageId.replace(/-/g, '')}`;
}

/** Fetchers and scorer for the patch phase, per the patch config. */
export function patchDepsFor(config: AppConfig, llmClient?: LlmClient): PatchDeps {
  const deps: PatchDeps = {
    fetchCitations: fetchCitationCounts,
    fetchInstitutions,
    useFullPdf: config.patch.recommendScore.useFullPdf && hasPoppler('pdftotext'),
  };
  if (config.patch.recommendScore.enabled) deps.scorer = new LlmScorer(config.scoring.llm, llmClient);
  return deps;
}

/** Dedup key: whitespace collapsed, case folded. */
export function titleKey(title: string): string {
  return title.replace(/\s+/g, ' ').trim().toLowerCase();
}

/** First paper per title wins; order is kept. */
export function dedupeByTitle(papers: Paper[]): Paper[] {
  const seen = new Set<string>();
  return papers.filter((paper) => {
    const key = titleKey(paper.title);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

async function discover(config: AppConfig, now: Date, sourcePauseMs: number, stats: CrawlStats): Promise<Paper[]> {
  const log = getLogger();
  const { discovery, filter } = config;

  const papers = await searchArxiv({
    daysBack: discovery.daysBack,
    maxResults: discovery.arxivMaxResults,
    pageSize: discovery.arxivPageSize,
    queryPhrases: discovery.queryPhrases,
    filter,
    now,
  });
  stats.arxiv = papers.length;

  if (discovery.useSemanticScholar) {
    log.info({ waitMs: sourcePauseMs }, 'Pausing before Semantic Scholar');
    await sleep(sourcePauseMs);
    const more = await searchSemanticScholar({
      keywords: discovery.keywords,
      daysBack: discovery.daysBack,
      maxResults: discovery.semanticScholarMaxResults,
      enrichInstitutions: discovery.enrichInstitutions,
      filter,
      now,
    });
    stats.semanticScholar = more.length;
    papers.push(...more);
  }

  // arXiv results come first, so they win over the Semantic Scholar copy.
  const unique = dedupeByTitle(papers);
  if (unique.length < papers.length) {
    log.info({ dropped: papers.length - unique.length }, 'Dropped papers found by both sources');
  }

  // Newest first; ISO strings sort chronologically.
  unique.sort((a, b) => (a.publishedDate < b.publishedDate ? 1 : a.publishedDate > b.publishedDate ? -1 : 0));
  stats.candidates = unique.length;
  log.info({ count: unique.length }, 'Candidates found');
  return unique;
}

/** Drop papers this tool already wrote in an earlier run. */
function dropSynced(db: Db, papers: Paper[], stats: CrawlStats): Paper[] {
  const fresh = papers.filter((paper) => !isSynced(db, paper.title));
  stats.alreadySynced = papers.length - fresh.length;
  if (stats.alreadySynced > 0) getLogger().info({ count: stats.alreadySynced }, 'Skipping papers synced in earlier runs');
  return fresh;
}

async function score(papers: Paper[], config: AppConfig, llmClient: LlmClient | undefined, now: Date, stats: CrawlStats) {
  const log = getLogger();
  const { weights, llm } = config.scoring;

  let scorer: LlmScorer | null = null;
  if (llm.enabled) {
    scorer = new LlmScorer(llm, llmClient);
    if (!scorer.available) {
      log.warn('LLM scoring enabled without an API key, using rule scores');
      scorer = null;
    }
  }
  const useFullPdf = llm.pdf.enabled && hasPoppler('pdftotext');
  if (scorer && llm.pdf.enabled && !useFullPdf) {
    log.warn('pdftotext not installed, LLM scores from metadata only');
  }

  for (const [idx, paper] of papers.entries()) {
    try {
      if (scorer && idx < llm.maxPapers) {
        const result = await scorer.scorePaper(paper, { useFullPdf });
        if (result) {
          paper.recommendScore = result.score;
          if (result.rationale) paper.recommendRationale = result.rationale;
          stats.llmScored += 1;
        } else {
          paper.recommendScore = computeRuleScore(paper, weights, now);
          stats.ruleScored += 1;
        }
        await sleep(llm.callIntervalMs);
      } else {
        paper.recommendScore = computeRuleScore(paper, weights, now);
        stats.ruleScored += 1;
      }
    } catch (e) {
      log.debug({ title: short(paper.title), err: errorMessage(e) }, 'Scoring failed');
    }
  }
}

async function attachFigure(store: PaperStore, figures: FigureSource, paper: Paper, pageId: string): Promise<boolean> {
  const log = getLogger();
  const found = await figures.processPaper(paper);
  if (!found) return false;

  if (found.startsWith('http')) {
    await store.updateFrameworkDiagram(pageId, found);
    await store.updateFrameworkImage(pageId, found, `${paper.title.slice(0, 50)}.png`);
    log.info({ url: found }, 'Framework diagram updated');
  } else {
    log.info({ file: found, page: notionPageUrl(pageId) }, 'Framework figure saved locally; upload it by hand');
  }
  return true;
}

/**
 * One crawl: discover → drop known papers → metrics → scores → write rows →
 * figures → patch older rows. The run is recorded in the local ledger.
 */
export async function runCrawl(opts: CrawlOptions): Promise<CrawlResult> {
  const {
    config,
    now = new Date(),
    dryRun = false,
    maxPapers = config.sync.maxPapers,
    dbPath = defaultDbPath(config.storage.root),
    store = new NotionClient(config.notion.token, config.notion.databaseId),
    llmClient,
    sourcePauseMs = 3000,
  } = opts;
  const log = getLogger();

  const db = openDb(dbPath);
  migrate(db);

  const runId = crypto.randomUUID();
  const startedAt = new Date().toISOString();
  const stats: CrawlStats = {
    dryRun,
    arxiv: 0,
    semanticScholar: 0,
    candidates: 0,
    alreadySynced: 0,
    newPapers: 0,
    withCitations: 0,
    withImpact: 0,
    llmScored: 0,
    ruleScored: 0,
    added: 0,
    addFailed: 0,
    figures: 0,
    startedAt,
  };
  insertRun(db, runId, 'crawl', startedAt);

  try {
    let papers = await discover(config, now, sourcePauseMs, stats);

    papers = dropSynced(db, papers, stats);
    papers = await store.filterDuplicates(papers);
    stats.newPapers = papers.length;

    const { enrichment } = config;
    if (enrichment.citations || enrichment.impact) {
      if (!dryRun) await store.ensureProperties(METRICS_PROPERTIES);
      const e = await enrichMetrics(papers, enrichment);
      stats.withCitations = e.withCitations;
      stats.withImpact = e.withImpact;
    }

    if (config.scoring.enabled) {
      if (!dryRun) await store.ensureProperties(ENRICHMENT_PROPERTIES);
      await score(papers, config, llmClient, now, stats);
    }

    let figures: FigureSource | null = null;
    if (config.figures.enabled && !dryRun) {
      figures =
        opts.figures ?? new FigureExtractor({ outputDir: config.figures.outputDir, maxFigures: config.figures.maxFigures });
      if (!figures.isAvailable()) {
        log.warn('poppler tools not installed, skipping figure extraction');
        figures = null;
      }
    }

    for (const paper of papers) {
      if (stats.added >= maxPapers) {
        log.info({ maxPapers }, 'Reached the per-run paper limit');
        break;
      }

      if (dryRun) {
        log.info({ title: short(paper.title), score: paper.recommendScore }, 'Would add paper (dry run)');
        stats.added += 1;
        continue;
      }

      const pageId = await store.addPaper(paper, { skipDuplicateCheck: true });
      if (pageId) {
        stats.added += 1;
        recordSyncedPaper(db, paper, pageId);
        if (figures && paper.pdfUrl) {
          try {
            if (await attachFigure(store, figures, paper, pageId)) stats.figures += 1;
          } catch (e) {
            log.warn({ title: short(paper.title), err: errorMessage(e) }, 'Figure step failed');
          }
        }
      } else {
        stats.addFailed += 1;
      }
      await sleep(config.sync.requestIntervalMs);
    }

    if (config.patch.enabled && !dryRun) {
      log.info('Patching missing fields of existing papers');
      stats.patch = await runPatch(store, config.patch, patchDepsFor(config, llmClient));
    }

    const status: RunStatus = stats.addFailed > 0 ? 'warn' : 'ok';
    finalizeRun(db, runId, status, stats);
    log.info({ runId, status, added: stats.added, candidates: stats.candidates }, 'Crawl finished');
    return { runId, status, stats };
  } catch (e) {
    stats.error = errorMessage(e);
    finalizeRun(db, runId, 'error', stats);
    throw e;
  } finally {
    db.sqlite.close();
  }
}
