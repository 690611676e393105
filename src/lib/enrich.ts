import { errorMessage } from './errors.js';
import { getLogger, short } from './logger.js';
import { fetchImpact } from './openalex.js';
import { fetchCitationCounts } from './semantic-scholar.js';
import { sleep } from './sleep.js';
import type { Paper } from './types.js';

export interface EnrichOptions {
  citations: boolean;
  impact: boolean;
  openalexMailto?: string;
  delayMs?: number;
}

export interface EnrichStats {
  withCitations: number;
  withImpact: number;
}

/**
 * Fill citation counts (Semantic Scholar) and venue impact (OpenAlex) in
 * place. A failed lookup leaves the paper untouched.
 */
export async function enrichMetrics(papers: Paper[], opts: EnrichOptions): Promise<EnrichStats> {
  const { citations, impact, openalexMailto, delayMs = 200 } = opts;
  const stats: EnrichStats = { withCitations: 0, withImpact: 0 };
  if (!citations && !impact) return stats;

  for (const p of papers) {
    try {
      if (citations) {
        const c = await fetchCitationCounts(p);
        if (c.citations !== null) {
          p.citations = c.citations;
          stats.withCitations += 1;
        }
        if (c.influentialCitations !== null) p.influentialCitations = c.influentialCitations;
      }
      if (impact) {
        const imp = await fetchImpact(p, openalexMailto);
        if (imp !== null) {
          p.impact2yrMean = imp;
          stats.withImpact += 1;
        }
      }
    } catch (e) {
      getLogger().debug({ title: short(p.title), err: errorMessage(e) }, 'Metric enrichment failed');
    }
    await sleep(delayMs);
  }

  return stats;
}
