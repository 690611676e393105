import { DEFAULT_CONTEXTS, DEFAULT_FULL_PHRASES } from './config.js';
import type { FilterRules } from './types.js';

export interface VlaMatch {
  related: boolean;
  matchedTerms: string[];
}

const DEFAULT_RULES: FilterRules = {
  fullPhrases: DEFAULT_FULL_PHRASES,
  contexts: DEFAULT_CONTEXTS,
};

// Only lowercase; the contexts are plain substrings of the joined text.
function normalize(s: string): string {
  return s.toLowerCase();
}

function hasStandaloneVla(text: string): boolean {
  return text.includes(' vla ') || text.startsWith('vla ') || text.endsWith(' vla');
}

/**
 * Strict VLA relevance check over title + abstract.
 *
 * A paper is related when the text names "vision-language-action" in one of
 * its spellings, or uses "VLA" as a standalone word together with a model,
 * policy, agent, robot, framework or architecture context.
 */
export function matchVla(title: string, abstract: string, rules: FilterRules = DEFAULT_RULES): VlaMatch {
  const text = normalize(`${title} ${abstract}`);

  const phrases = rules.fullPhrases.map(normalize).filter(Boolean);
  const fullHits = phrases.filter((p) => text.includes(p));
  if (fullHits.length > 0) {
    return { related: true, matchedTerms: fullHits };
  }

  if (hasStandaloneVla(text)) {
    const contextHits = rules.contexts.map(normalize).filter((c) => c && text.includes(c));
    if (contextHits.length > 0) {
      return { related: true, matchedTerms: contextHits };
    }
  }

  return { related: false, matchedTerms: [] };
}

export function isVlaRelated(title: string, abstract: string, rules?: FilterRules): boolean {
  return matchVla(title, abstract, rules).related;
}
