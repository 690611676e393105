import type { Paper, RuleWeights } from '../types.js';

export const DEFAULT_WEIGHTS: RuleWeights = {
  freshness: 2.0,
  citations: 1.5,
  influential_citations: 1.0,
  impact: 1.0,
  abstract_length: 0.5,
  has_pdf: 0.5,
  source_quality: 1.0,
};

const DAY_MS = 24 * 60 * 60 * 1000;

function freshnessOf(publishedDate: string, now: Date): number {
  const day = publishedDate.slice(0, 10);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) return 0;
  const t = Date.parse(`${day}T00:00:00Z`);
  if (Number.isNaN(t)) return 0;
  // A date after `now` counts as today.
  const days = Math.max(0, Math.floor((now.getTime() - t) / DAY_MS));
  return Math.max(0, 1 - Math.min(days / 365, 1));
}

function sourceQualityOf(tags: string[]): number {
  let q = 0.8;
  if (tags.includes('Semantic Scholar') && !tags.includes('ArXiv')) q = 0.75;
  if (tags.includes('ArXiv')) q = 0.85;
  return q;
}

/**
 * Fallback recommendation score in [0, 100]: a weighted mean of normalised
 * freshness, citation, impact and completeness signals.
 */
export function computeRuleScore(
  paper: Paper,
  weights: Partial<RuleWeights> = {},
  now: Date = new Date()
): number {
  const w: RuleWeights = { ...DEFAULT_WEIGHTS, ...weights };
  const totalW = Object.values(w).reduce((a, b) => a + b, 0);
  if (totalW === 0) return 0;

  const c = paper.citations ?? 0;
  const citations = c <= 0 ? 0 : Math.min(1, Math.log10(c + 1) / 3);
  const ic = paper.influentialCitations ?? 0;
  const influential = ic <= 0 ? 0 : Math.min(1, Math.log10(ic + 1) / 2.5);
  const impact = Math.min(1, (paper.impact2yrMean ?? 0) / 5);
  const abstractLength = Math.min(1, (paper.abstract ?? '').length / 1500);
  const hasPdf = paper.pdfUrl ? 1 : 0;

  const score =
    w.freshness * freshnessOf(paper.publishedDate ?? '', now) +
    w.citations * citations +
    w.influential_citations * influential +
    w.impact * impact +
    w.abstract_length * abstractLength +
    w.has_pdf * hasPdf +
    w.source_quality * sourceQualityOf(paper.tags ?? []);

  return Math.round((score / totalW) * 100 * 100) / 100;
}
