import type { Paper } from '../types.js';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image_url';
  image_url: { url: string; detail: 'high' | 'low' | 'auto' };
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | Array<TextPart | ImagePart> };

export interface PromptOptions {
  rationaleLanguage?: string;
  extraInstructions?: string;
  /** Extracted full text of the PDF, already truncated. */
  pdfText?: string;
  /** data: URLs of page images. */
  pdfImages?: string[];
}

const CRITERIA = [
  '1. VLA relevance (30%): does it directly address vision-language-action fusion, embodied agents or robot manipulation? Generic multimodal work does not score high.',
  '2. Novelty (25%): a new architecture, training paradigm or data strategy, or only fine-tuning and recombining existing methods?',
  '3. Experimental rigour (20%): real robots > simulation > offline datasets; many scenes and tasks > one; ablations count in favour.',
  '4. Technical depth (15%): does it tackle a core difficulty (long-horizon planning, sim2real, generalisation, safety) or stay a shallow application?',
  '5. Impact potential (10%): top venue, citations, well-known institutions, open code, reproducibility.',
];

const PDF_CRITERIA_HINTS = [
  ' Check the method section and the architecture figures.',
  '',
  ' Read the experiments section and the result figures and tables closely.',
  ' Check the technical details.',
  '',
];

const BANDS = [
  '- 90-100: breakthrough (new paradigm, state of the art, top-venue oral, highly cited, open benchmark)',
  '- 75-89: strong (novel method, solid experiments, validated on real robots, accepted at a top venue)',
  '- 60-74: average (some novelty but not outstanding, mostly simulation, ordinary venue)',
  '- 40-59: marginal (weak VLA relevance, mediocre method, thin experiments, preprint only)',
  '- 0-39: not recommended (little to do with VLA, survey without new insight, missing experiments)',
];

export function buildSystemPrompt(opts: { withPdf: boolean; rationaleLanguage: string; extraInstructions?: string }): string {
  const { withPdf, rationaleLanguage, extraInstructions } = opts;

  const intro = withPdf
    ? 'You are a senior reviewer of VLA (Vision-Language-Action) papers. You have the full PDF text and its key images. Read it closely, analyse the images, then give a strict, discriminating score from 0 to 100.'
    : 'You are a senior reviewer of VLA (Vision-Language-Action) papers. Based on the metadata, give a strict, discriminating score from 0 to 100.';

  const criteria = CRITERIA.map((c, i) => (withPdf ? c + (PDF_CRITERIA_HINTS[i] ?? '') : c));

  const rules = ['- Avoid clustering scores in 70-80; spread them out. Give top work full marks and mediocre work low marks.'];
  if (withPdf) {
    rules.push(
      '- You must analyse the images (architecture diagrams, result plots, comparison tables) and refer to them in the rationale.',
      '- Cite specific sections, experiments or figures of the PDF to support the score.',
      '- If the PDF is incomplete or key content could not be read, say so in the rationale.'
    );
  }
  rules.push(`- Write the rationale in ${rationaleLanguage}.`);

  const rationaleHint = withPdf
    ? `<at most 300 words in ${rationaleLanguage}, citing concrete PDF content and image analysis>`
    : `<at most 200 words in ${rationaleLanguage}, explaining what raised or lowered the score>`;

  let prompt = [
    intro,
    '',
    'Criteria (in decreasing weight):',
    ...criteria,
    '',
    'Score bands:',
    ...BANDS,
    '',
    'Rules:',
    ...rules,
    '',
    `Reply with JSON only: {"score": <number>, "rationale": "${rationaleHint}"}. Nothing else.`,
  ].join('\n');

  if (extraInstructions) prompt += `\n\nAdditional instructions: ${extraInstructions}`;
  return prompt;
}

/** Metadata block sent as the user message. */
export function paperMetadata(paper: Paper, pdfText?: string): Record<string, unknown> {
  const meta: Record<string, unknown> = {
    title: paper.title,
    abstract: (paper.abstract ?? '').slice(0, 1500),
    venue: paper.venue,
    year: paper.year,
    published_date: paper.publishedDate,
    citations: paper.citations ?? null,
    influential_citations: paper.influentialCitations ?? null,
    impact_2yr_mean: paper.impact2yrMean ?? null,
    has_pdf: Boolean(paper.pdfUrl),
    tags: paper.tags,
    institutions: (paper.institutions ?? []).slice(0, 5),
  };
  if (pdfText) meta['full_pdf_text'] = pdfText;
  return meta;
}

export function buildScoringMessages(paper: Paper, opts: PromptOptions = {}): ChatMessage[] {
  const { rationaleLanguage = 'Chinese', extraInstructions, pdfText, pdfImages = [] } = opts;
  const withPdf = Boolean(pdfText) || pdfImages.length > 0;

  const system: ChatMessage = {
    role: 'system',
    content: buildSystemPrompt({ withPdf, rationaleLanguage, extraInstructions }),
  };
  const metadata = JSON.stringify(paperMetadata(paper, pdfText), null, 2);

  if (pdfImages.length === 0) {
    return [system, { role: 'user', content: metadata }];
  }

  const parts: Array<TextPart | ImagePart> = [
    {
      type: 'text',
      text: `Paper metadata and full text:\n${metadata}\n\nPDF images (${pdfImages.length}, analyse each):`,
    },
  ];
  for (const url of pdfImages) {
    parts.push({ type: 'image_url', image_url: { url, detail: 'high' } });
  }
  return [system, { role: 'user', content: parts }];
}
