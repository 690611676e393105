import { z } from 'zod';

import { localDate } from '../storage.js';
import type { ExistingPaper, Paper } from '../types.js';

const MAX_TEXT = 2000;
const MAX_TAGS = 10;
const MAX_INSTITUTIONS = 15;
const MAX_OPTION_NAME = 100;

export interface RichText {
  text: { content: string };
}

export type PropertyValue =
  | { title: RichText[] }
  | { rich_text: RichText[] }
  | { select: { name: string } }
  | { multi_select: Array<{ name: string }> }
  | { number: number | null }
  | { url: string | null }
  | { date: { start: string } }
  | { files: Array<{ name: string; external: { url: string } }> };

export type PageProperties = Record<string, PropertyValue>;

/** Database schema entries, keyed by property name. */
export type PropertySchema = Record<string, Record<string, Record<string, never>>>;

export const METRICS_PROPERTIES: PropertySchema = {
  Citations: { number: {} },
  'Influential Citations': { number: {} },
  'Impact (2yr mean)': { number: {} },
};

export const ENRICHMENT_PROPERTIES: PropertySchema = {
  Institutions: { multi_select: {} },
  'Recommend Score': { number: {} },
  'Recommend Rationale': { rich_text: {} },
};

export function richText(content: string): RichText[] {
  return [{ text: { content: content.slice(0, MAX_TEXT) } }];
}

/** Trimmed, unique option names capped at 100 chars, at most 15. */
export function institutionOptions(institutions: string[]): Array<{ name: string }> {
  const unique: string[] = [];
  for (const inst of institutions) {
    const name = inst.trim().slice(0, MAX_OPTION_NAME);
    if (name && !unique.includes(name)) unique.push(name);
  }
  return unique.slice(0, MAX_INSTITUTIONS).map((name) => ({ name }));
}

export function scoreProperties(score: number, rationale?: string | null): PageProperties {
  const props: PageProperties = { 'Recommend Score': { number: score } };
  if (rationale) props['Recommend Rationale'] = { rich_text: richText(rationale) };
  return props;
}

/** Page properties for a new paper row. Empty optional fields are left out. */
export function buildPaperProperties(paper: Paper, today = new Date()): PageProperties {
  const props: PageProperties = {
    Name: { title: richText(paper.title || 'Untitled') },
    Status: { select: { name: 'To Read' } },
    Venue: { select: { name: paper.venue || 'ArXiv' } },
    Added: { date: { start: localDate(today) } },
  };

  if (paper.authors) props['Authors'] = { rich_text: richText(paper.authors) };

  const year = Number.parseInt(paper.year, 10);
  if (Number.isFinite(year)) props['Year'] = { number: year };

  if (paper.abstract) props['Abstract'] = { rich_text: richText(paper.abstract) };
  if (paper.url) props['userDefined:URL'] = { url: paper.url };
  if (paper.pdfUrl) props['PDF Link'] = { url: paper.pdfUrl };
  if (paper.doi) props['DOI'] = { rich_text: richText(paper.doi) };
  if (paper.tags.length > 0) {
    props['Tags'] = { multi_select: paper.tags.slice(0, MAX_TAGS).map((name) => ({ name })) };
  }

  if (paper.citations !== undefined) props['Citations'] = { number: Math.trunc(paper.citations) };
  if (paper.influentialCitations !== undefined) {
    props['Influential Citations'] = { number: Math.trunc(paper.influentialCitations) };
  }
  if (paper.impact2yrMean !== undefined) props['Impact (2yr mean)'] = { number: paper.impact2yrMean };

  const institutions = institutionOptions(paper.institutions);
  if (institutions.length > 0) props['Institutions'] = { multi_select: institutions };

  if (paper.recommendScore !== undefined) {
    Object.assign(props, scoreProperties(paper.recommendScore, paper.recommendRationale));
  }
  return props;
}

// Reading pages back. Only the property types the tracker writes are decoded.

const TextItem = z
  .object({
    plain_text: z.string().optional(),
    text: z.object({ content: z.string() }).partial().optional(),
  })
  .passthrough();

const PropertyRead = z
  .object({
    type: z.string(),
    title: z.array(TextItem).optional(),
    rich_text: z.array(TextItem).optional(),
    url: z.string().nullable().optional(),
    number: z.number().nullable().optional(),
    multi_select: z.array(z.object({ name: z.string() }).passthrough()).optional(),
  })
  .passthrough();

export const PageSchema = z
  .object({
    id: z.string(),
    properties: z.record(PropertyRead).default({}),
  })
  .passthrough();

export type NotionPage = z.infer<typeof PageSchema>;
type PropertyReadValue = z.infer<typeof PropertyRead>;

function joinText(items: z.infer<typeof TextItem>[] | undefined): string {
  return (items ?? []).map((t) => t.text?.content ?? t.plain_text ?? '').join('');
}

function readText(prop: PropertyReadValue | undefined): string | null {
  if (!prop) return null;
  if (prop.type === 'title') return joinText(prop.title);
  if (prop.type === 'rich_text') return joinText(prop.rich_text);
  if (prop.type === 'url') return prop.url ?? null;
  return null;
}

function readNumber(prop: PropertyReadValue | undefined): number | null {
  return prop?.type === 'number' ? prop.number ?? null : null;
}

function readOptions(prop: PropertyReadValue | undefined): string[] | null {
  return prop?.type === 'multi_select' ? (prop.multi_select ?? []).map((o) => o.name) : null;
}

export function readExistingPaper(page: NotionPage): ExistingPaper {
  const p = page.properties;
  return {
    pageId: page.id,
    title: readText(p['Name']),
    url: readText(p['userDefined:URL']),
    pdfUrl: readText(p['PDF Link']),
    doi: readText(p['DOI']),
    year: readNumber(p['Year']),
    citations: readNumber(p['Citations']),
    influentialCitations: readNumber(p['Influential Citations']),
    institutions: readOptions(p['Institutions']),
    recommendScore: readNumber(p['Recommend Score']),
    recommendRationale: readText(p['Recommend Rationale']),
    frameworkDiagram: readText(p['Framework Diagram']),
    authors: readText(p['Authors']),
    abstract: readText(p['Abstract']),
  };
}
