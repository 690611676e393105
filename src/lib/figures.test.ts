import { describe, expect, it, vi } from 'vitest';

import { FigureExtractor, architectureConfidence, figureFileName, pickFigures } from './figures.js';

const CAPTION = 'Figure 1: Overview of our framework architecture';

describe('architectureConfidence', () => {
  it('rewards large, detailed images on pages that talk about architecture', () => {
    expect(architectureConfidence({ width: 1200, height: 800, bytes: 60 * 1024, pageText: CAPTION })).toBeCloseTo(0.9);
  });

  it('gives little to small images without context', () => {
    expect(architectureConfidence({ width: 300, height: 300, bytes: 10_000, pageText: 'Results table' })).toBeCloseTo(0.2);
  });

  it('caps the keyword bonus', () => {
    const pageText = 'architecture framework model pipeline overview system';
    expect(architectureConfidence({ width: 100, height: 1000, bytes: 0, pageText })).toBeCloseTo(0.6);
  });

  it('matches Chinese keywords', () => {
    expect(architectureConfidence({ width: 10, height: 0, bytes: 0, pageText: '图1 系统框架' })).toBeCloseTo(0.2);
  });
});

describe('pickFigures', () => {
  const pageTexts = [CAPTION, 'Table 2'];
  const images = [
    { file: 'a.png', page: 1, num: 0, bytes: 60 * 1024, width: 1200, height: 800 },
    { file: 'b.png', page: 1, num: 1, bytes: 60 * 1024, width: 150, height: 900 },
    { file: 'c.png', page: 2, num: 2, bytes: 60 * 1024, width: 900, height: 300 },
    { file: 'd.png', page: 1, num: 3, bytes: 60 * 1024, width: 700, height: 500 },
  ];

  it('keeps confident candidates, best first', () => {
    expect(pickFigures(images, pageTexts, 3).map((f) => f.file)).toEqual(['a.png', 'd.png']);
  });

  it('respects maxFigures', () => {
    expect(pickFigures(images, pageTexts, 1)).toEqual([{ file: 'a.png', page: 1, confidence: expect.closeTo(0.9) }]);
  });
});

describe('figureFileName', () => {
  it('replaces unsafe characters and keeps letters', () => {
    expect(figureFileName('VLA: A/B Test', 1, 3, '.png', 123)).toBe('VLA_ A_B Test_fig1_p3_123.png');
    expect(figureFileName('机器人 VLA', 1, 2, '.jpg', 7)).toBe('机器人 VLA_fig1_p2_7.jpg');
  });

  it('falls back to a generic name', () => {
    expect(figureFileName('', 2, 1, '.jpg', 5)).toBe('paper_fig2_p1_5.jpg');
  });
});

describe('FigureExtractor', () => {
  it('skips papers without a PDF link', async () => {
    const download = vi.fn();
    const extractor = new FigureExtractor({ outputDir: 'unused', maxFigures: 3, download });
    expect(await extractor.processPaper({ title: 'No PDF', pdfUrl: '' })).toBeNull();
    expect(download).not.toHaveBeenCalled();
  });

  it('returns null when the download fails', async () => {
    const download = vi.fn(async () => {
      throw new Error('HTTP 404');
    });
    const extractor = new FigureExtractor({ outputDir: 'unused', maxFigures: 3, download });
    expect(await extractor.processPaper({ title: 'Gone', pdfUrl: 'https://example.org/p.pdf' })).toBeNull();
    expect(download).toHaveBeenCalledWith('https://example.org/p.pdf', expect.stringMatching(/paper\.pdf$/));
  });
});
