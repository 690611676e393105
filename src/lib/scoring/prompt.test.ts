import { describe, expect, it } from 'vitest';

import type { Paper } from '../types.js';
import { buildScoringMessages, buildSystemPrompt, paperMetadata } from './prompt.js';

function paper(overrides: Partial<Paper> = {}): Paper {
  return {
    title: 'Scaling Vision-Language-Action Models',
    authors: 'Ada Example',
    year: '2026',
    abstract: 'We train a VLA policy.',
    url: 'http://arxiv.org/abs/2510.00001v1',
    pdfUrl: 'http://arxiv.org/pdf/2510.00001v1',
    doi: 'arXiv:2510.00001v1',
    venue: 'ArXiv',
    tags: ['VLA', 'arXiv'],
    publishedDate: '2026-10-18T08:00:00Z',
    institutions: [],
    ...overrides,
  };
}

describe('buildSystemPrompt', () => {
  it('carries criteria, bands and the reply format', () => {
    const prompt = buildSystemPrompt({ withPdf: false, rationaleLanguage: 'Chinese' });
    expect(prompt).toContain('1. VLA relevance (30%)');
    expect(prompt).toContain('5. Impact potential (10%)');
    expect(prompt).toContain('- 90-100: breakthrough');
    expect(prompt).toContain('- 0-39: not recommended');
    expect(prompt).toContain('- Write the rationale in Chinese.');
    expect(prompt).toContain('at most 200 words in Chinese');
    expect(prompt).not.toContain('analyse the images');
  });

  it('asks for figure analysis when the PDF is attached', () => {
    const prompt = buildSystemPrompt({ withPdf: true, rationaleLanguage: 'English' });
    expect(prompt).toContain('You have the full PDF text and its key images.');
    expect(prompt).toContain('- You must analyse the images');
    expect(prompt).toContain('at most 300 words in English');
  });

  it('appends extra instructions last', () => {
    const prompt = buildSystemPrompt({ withPdf: false, rationaleLanguage: 'Chinese', extraInstructions: 'Favour real-robot results.' });
    expect(prompt.endsWith('\n\nAdditional instructions: Favour real-robot results.')).toBe(true);
  });
});

describe('paperMetadata', () => {
  it('trims the abstract and institutions', () => {
    const meta = paperMetadata(
      paper({ abstract: 'a'.repeat(2000), institutions: ['A', 'B', 'C', 'D', 'E', 'F'], citations: 3 })
    );
    expect(meta['abstract']).toBe('a'.repeat(1500));
    expect(meta['institutions']).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(meta['has_pdf']).toBe(true);
    expect(meta['citations']).toBe(3);
    expect(meta['influential_citations']).toBeNull();
    expect('full_pdf_text' in meta).toBe(false);
  });
});

describe('buildScoringMessages', () => {
  it('sends metadata as pretty JSON without a PDF', () => {
    const p = paper();
    const messages = buildScoringMessages(p);
    expect(messages).toHaveLength(2);
    expect(messages[0]?.role).toBe('system');
    expect(messages[1]).toEqual({ role: 'user', content: JSON.stringify(paperMetadata(p), null, 2) });
  });

  it('adds the PDF text to the metadata', () => {
    const messages = buildScoringMessages(paper(), { pdfText: '\n--- Page 1 ---\nIntro' });
    const user = messages[1];
    expect(typeof user?.content).toBe('string');
    expect(JSON.parse(String(user?.content))).toMatchObject({ full_pdf_text: '\n--- Page 1 ---\nIntro' });
    expect(String(messages[0]?.content)).toContain('at most 300 words');
  });

  it('sends images as high-detail parts after the text', () => {
    const p = paper();
    const messages = buildScoringMessages(p, {
      pdfText: 'body',
      pdfImages: ['data:image/png;base64,AAA', 'data:image/jpeg;base64,BBB'],
    });
    const metadata = JSON.stringify(paperMetadata(p, 'body'), null, 2);
    expect(messages[1]).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: `Paper metadata and full text:\n${metadata}\n\nPDF images (2, analyse each):` },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AAA', detail: 'high' } },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,BBB', detail: 'high' } },
      ],
    });
  });
});
