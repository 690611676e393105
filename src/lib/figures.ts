import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { downloadToFile } from './download.js';
import { errorMessage } from './errors.js';
import { dumpImages, hasPoppler, listImages, readPageTexts } from './extract.js';
import type { ExtractedImage } from './extract.js';
import { getLogger, short } from './logger.js';
import { ensureDir } from './storage.js';
import type { Paper } from './types.js';

export const ARCHITECTURE_KEYWORDS = [
  'architecture',
  'framework',
  'model',
  'pipeline',
  'overview',
  'structure',
  'diagram',
  'flow',
  'system',
  'network',
  '架构',
  '框架',
  '模型',
  '流程',
  '系统',
  '网络',
];

const SCAN_PAGES = 10;
const MIN_SIDE = 200;
const MIN_CONFIDENCE = 0.6;
const DETAILED_BYTES = 50 * 1024;

export interface FigureCandidate {
  width: number;
  height: number;
  bytes: number;
  pageText: string;
}

/** Likelihood in [0, 1] that an image is the paper's architecture figure. */
export function architectureConfidence(c: FigureCandidate): number {
  let score = 0;
  const aspect = c.height > 0 ? c.width / c.height : 0;
  if (aspect > 0.5 && aspect < 2.5) score += 0.2;
  if (c.width > 800 || c.height > 600) score += 0.2;

  const text = c.pageText.toLowerCase();
  const hits = ARCHITECTURE_KEYWORDS.filter((kw) => text.includes(kw)).length;
  score += Math.min(hits * 0.1, 0.4);

  // Encoded size stands in for visual detail.
  if (c.bytes > DETAILED_BYTES) score += 0.2;
  return Math.min(score, 1);
}

export interface Figure {
  file: string;
  page: number;
  confidence: number;
}

/**
 * Architecture figure candidates among extracted images: at least 200×200,
 * confidence above 0.6, best first.
 */
export function pickFigures(
  images: Array<ExtractedImage & { width: number; height: number }>,
  pageTexts: string[],
  maxFigures: number
): Figure[] {
  const figures: Figure[] = [];
  for (const img of images) {
    if (img.width < MIN_SIDE || img.height < MIN_SIDE) continue;
    const confidence = architectureConfidence({
      width: img.width,
      height: img.height,
      bytes: img.bytes,
      pageText: pageTexts[img.page - 1] ?? '',
    });
    if (confidence > MIN_CONFIDENCE) figures.push({ file: img.file, page: img.page, confidence });
  }
  return figures.sort((a, b) => b.confidence - a.confidence).slice(0, maxFigures);
}

export function figureFileName(title: string, index: number, page: number, ext: string, stamp = Date.now()): string {
  const base = `${(title || 'paper').slice(0, 50)}_fig${index}_p${page}`.replace(/[^\p{L}\p{N}_\-. ]/gu, '_');
  return `${base}_${stamp}${ext}`;
}

export interface FigureExtractorOptions {
  outputDir: string;
  maxFigures: number;
  download?: typeof downloadToFile;
}

/** Finds likely architecture figures in a paper's PDF and saves them locally. */
export class FigureExtractor {
  private readonly download: typeof downloadToFile;

  constructor(private readonly opts: FigureExtractorOptions) {
    this.download = opts.download ?? downloadToFile;
  }

  isAvailable(): boolean {
    return hasPoppler('pdftotext') && hasPoppler('pdfimages');
  }

  /** Path of the best saved figure, or null. */
  async processPaper(paper: Pick<Paper, 'title' | 'pdfUrl'>): Promise<string | null> {
    const log = getLogger();
    if (!paper.pdfUrl) {
      log.warn({ title: short(paper.title) }, 'No PDF link, skipping figure extraction');
      return null;
    }

    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vla-fig-'));
    try {
      const pdfPath = path.join(workDir, 'paper.pdf');
      await this.download(paper.pdfUrl, pdfPath);

      const pageTexts = readPageTexts(pdfPath, SCAN_PAGES);
      const dims = new Map(
        listImages(pdfPath, SCAN_PAGES)
          .filter((info) => info.type === 'image')
          .map((info) => [info.num, info] as const)
      );
      const images = dumpImages(pdfPath, path.join(workDir, 'images'), SCAN_PAGES).flatMap((img) => {
        const info = dims.get(img.num);
        return info ? [{ ...img, width: info.width, height: info.height }] : [];
      });

      const figures = pickFigures(images, pageTexts, this.opts.maxFigures);
      if (figures.length === 0) {
        log.info({ title: short(paper.title) }, 'No architecture figure found');
        return null;
      }

      ensureDir(this.opts.outputDir);
      const saved: string[] = [];
      figures.forEach((fig, i) => {
        const target = path.join(
          this.opts.outputDir,
          figureFileName(paper.title, i + 1, fig.page, path.extname(fig.file))
        );
        fs.copyFileSync(fig.file, target);
        log.info({ file: target, page: fig.page, confidence: fig.confidence.toFixed(2) }, 'Saved figure');
        saved.push(target);
      });
      return saved[0] ?? null;
    } catch (e) {
      log.warn({ title: short(paper.title), err: errorMessage(e) }, 'Figure extraction failed');
      return null;
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }
}
