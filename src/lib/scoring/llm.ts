import OpenAI from 'openai';
import { z } from 'zod';

import { HttpError, RateLimitError, errorMessage } from '../errors.js';
import { getLogger, short } from '../logger.js';
import { downloadAndExtract } from '../extract.js';
import type { PdfContent } from '../extract.js';
import type { LlmConfig, Paper, PdfOptions } from '../types.js';
import { buildScoringMessages } from './prompt.js';
import type { ChatMessage } from './prompt.js';

export interface CompletionParams {
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Anything that turns chat messages into a reply text. */
export interface LlmClient {
  complete(messages: ChatMessage[], params: CompletionParams): Promise<string>;
}

/** Chat completions on the OpenAI SDK; `apiBase` points it at any compatible endpoint. */
export class OpenAiLlmClient implements LlmClient {
  private readonly openai: OpenAI;

  constructor(config: Pick<LlmConfig, 'apiKey' | 'apiBase' | 'timeoutMs' | 'maxRetries'>) {
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }

  async complete(messages: ChatMessage[], params: CompletionParams): Promise<string> {
    try {
      const res = await this.openai.chat.completions.create({
        model: params.model,
        messages,
        temperature: params.temperature,
        max_tokens: params.maxTokens,
      });
      return res.choices[0]?.message.content ?? '';
    } catch (e) {
      if (e instanceof OpenAI.RateLimitError) throw new RateLimitError(e.message);
      throw e;
    }
  }
}

export interface ScoreReply {
  score: number | null;
  rationale: string | null;
}

const ReplySchema = z.object({
  score: z.union([z.number(), z.string()]),
  rationale: z.unknown().optional(),
});

function clampScore(n: number): number {
  return Math.round(Math.min(100, Math.max(0, n)) * 100) / 100;
}

function stripFences(text: string): string {
  const m = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return m?.[1] ?? text;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Score and rationale from a model reply. Expects `{"score", "rationale"}`;
 * otherwise takes the first 1-3 digit number and keeps the whole reply as
 * the rationale.
 */
export function parseScoreReply(reply: string): ScoreReply {
  const content = reply.trim();
  const parsed = ReplySchema.safeParse(tryJson(stripFences(content)));
  if (parsed.success) {
    const score = Number(parsed.data.score);
    if (Number.isFinite(score)) {
      const rationale = parsed.data.rationale === undefined ? '' : String(parsed.data.rationale).trim();
      return { score: clampScore(score), rationale: rationale.slice(0, 2000) };
    }
  }

  const m = content.match(/(\d{1,3})/);
  if (m?.[1]) return { score: clampScore(Number(m[1])), rationale: content.slice(0, 2000) };
  return { score: null, rationale: content ? content.slice(0, 2000) : null };
}

export interface LlmScore {
  score: number;
  rationale: string;
}

export type PdfExtractor = (url: string, opts: PdfOptions) => Promise<PdfContent>;

export interface ScoreOptions {
  /** Overrides `config.pdf.enabled`. */
  useFullPdf?: boolean;
}

export class LlmScorer {
  private readonly client: LlmClient | null;

  constructor(
    private readonly config: LlmConfig,
    client?: LlmClient,
    private readonly extractPdf: PdfExtractor = downloadAndExtract
  ) {
    this.client = client ?? (config.apiKey ? new OpenAiLlmClient(config) : null);
  }

  get available(): boolean {
    return this.client !== null;
  }

  /** Null when there is no key, the endpoint is rate limited, or the call fails. */
  async scorePaper(paper: Paper, opts: ScoreOptions = {}): Promise<LlmScore | null> {
    const log = getLogger();
    if (!this.client) {
      log.warn('LLM scoring enabled but no API key configured, skipping');
      return null;
    }

    const useFullPdf = opts.useFullPdf ?? this.config.pdf.enabled;
    let pdfText: string | undefined;
    let pdfImages: string[] = [];
    if (useFullPdf && paper.pdfUrl) {
      log.info({ title: short(paper.title, 50) }, 'Downloading PDF for scoring');
      const content = await this.extractPdf(paper.pdfUrl, this.config.pdf);
      if (content.fullText) {
        pdfText = content.fullText;
        pdfImages = content.images;
        log.info(
          { pages: content.numPages, chars: content.fullText.length, images: pdfImages.length },
          'PDF extracted'
        );
      } else {
        log.warn({ title: short(paper.title, 50) }, 'PDF extraction gave no text, scoring from abstract');
      }
    }

    const messages = buildScoringMessages(paper, {
      rationaleLanguage: this.config.rationaleLanguage,
      extraInstructions: this.config.extraInstructions,
      pdfText,
      pdfImages,
    });

    try {
      log.info({ model: this.config.model, images: pdfImages.length }, 'Calling LLM');
      const reply = await this.client.complete(messages, {
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });
      const { score, rationale } = parseScoreReply(reply);
      if (score === null) return null;
      return { score, rationale: rationale ?? '' };
    } catch (e) {
      if (e instanceof RateLimitError || (e instanceof HttpError && e.status === 429)) {
        log.warn('LLM endpoint rate limited (429), skipping this paper');
        return null;
      }
      log.debug({ err: errorMessage(e) }, 'LLM scoring failed');
      return null;
    }
  }
}
