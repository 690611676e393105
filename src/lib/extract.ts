import { execFileSync } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { downloadToFile } from './download.js';
import { errorMessage } from './errors.js';
import { encodeImage } from './images.js';
import { getLogger } from './logger.js';
import type { PdfOptions } from './types.js';

export interface PdfContent {
  fullText: string;
  /** data: URLs, largest first. */
  images: string[];
  numPages: number;
  numImages: number;
  truncated: boolean;
}

export function emptyContent(): PdfContent {
  return { fullText: '', images: [], numPages: 0, numImages: 0, truncated: false };
}

const MAX_BUFFER = 64 * 1024 * 1024;

export function hasPoppler(tool: 'pdftotext' | 'pdfimages' = 'pdftotext'): boolean {
  try {
    execFileSync(tool, ['-v'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/** Text of pages firstPage..lastPage, one string per page. */
export function readPageTexts(pdfPath: string, lastPage: number, firstPage = 1): string[] {
  if (!fs.existsSync(pdfPath)) throw new Error(`PDF not found: ${pdfPath}`);
  const out = execFileSync(
    'pdftotext',
    ['-f', String(firstPage), '-l', String(lastPage), '-enc', 'UTF-8', pdfPath, '-'],
    { encoding: 'utf8', maxBuffer: MAX_BUFFER, stdio: ['ignore', 'pipe', 'ignore'] }
  );
  // Pages are separated by form feeds, with one after the last page too.
  const pages = out.split('\f');
  if (pages.length > 0 && pages[pages.length - 1]?.trim() === '') pages.pop();
  return pages;
}

/** Join pages under `--- Page N ---` headers, cutting at maxChars. */
export function assemblePages(pages: string[], maxChars: number): { text: string; truncated: boolean } {
  let text = '';
  for (let i = 0; i < pages.length; i += 1) {
    text += `\n--- Page ${i + 1} ---\n${pages[i] ?? ''}`;
    if (text.length >= maxChars) {
      return { text: text.slice(0, maxChars), truncated: true };
    }
  }
  return { text, truncated: false };
}

export interface ExtractedImage {
  file: string;
  page: number;
  num: number;
  bytes: number;
}

const IMAGE_FILE = /-(\d+)-(\d+)\.(png|jpg)$/;

/** Write the embedded images of the first pages to outDir (`pdfimages -p -j -png`). */
export function dumpImages(pdfPath: string, outDir: string, lastPage: number, firstPage = 1): ExtractedImage[] {
  fs.mkdirSync(outDir, { recursive: true });
  execFileSync(
    'pdfimages',
    ['-f', String(firstPage), '-l', String(lastPage), '-p', '-j', '-png', pdfPath, path.join(outDir, 'img')],
    { stdio: 'ignore' }
  );

  const images: ExtractedImage[] = [];
  for (const name of fs.readdirSync(outDir).sort()) {
    const m = name.match(IMAGE_FILE);
    if (!m?.[1] || !m[2]) continue;
    const file = path.join(outDir, name);
    images.push({ file, page: Number(m[1]), num: Number(m[2]), bytes: fs.statSync(file).size });
  }
  return images;
}

/** Drop images under minBytes, then keep the largest maxImages. */
export function selectImages<T extends { bytes: number }>(
  images: T[],
  opts: { minBytes: number; maxImages: number }
): T[] {
  return images
    .filter((img) => img.bytes >= opts.minBytes)
    .sort((a, b) => b.bytes - a.bytes)
    .slice(0, opts.maxImages);
}

export interface ImageInfo {
  page: number;
  num: number;
  type: string;
  width: number;
  height: number;
}

/** Rows of `pdfimages -list` output. */
export function parseImageList(out: string): ImageInfo[] {
  const rows: ImageInfo[] = [];
  for (const line of out.split('\n')) {
    const cols = line.trim().split(/\s+/);
    if (cols.length < 5 || !/^\d+$/.test(cols[0] ?? '')) continue;
    rows.push({
      page: Number(cols[0]),
      num: Number(cols[1]),
      type: cols[2] ?? '',
      width: Number(cols[3]),
      height: Number(cols[4]),
    });
  }
  return rows;
}

export function listImages(pdfPath: string, lastPage: number, firstPage = 1): ImageInfo[] {
  const out = execFileSync('pdfimages', ['-f', String(firstPage), '-l', String(lastPage), '-list', pdfPath], {
    encoding: 'utf8',
    maxBuffer: MAX_BUFFER,
    stdio: ['ignore', 'pipe', 'ignore'],
  });
  return parseImageList(out);
}

/**
 * Text (first maxPages, capped at maxChars) and the largest embedded images
 * of a local PDF. Missing poppler tools or a failed extraction give an empty
 * result.
 */
export async function extractPdfContent(pdfPath: string, opts: PdfOptions, workDir?: string): Promise<PdfContent> {
  const log = getLogger();
  if (!hasPoppler('pdftotext')) {
    log.warn('pdftotext not found (install poppler-utils), skipping PDF extraction');
    return emptyContent();
  }

  const result = emptyContent();
  try {
    const pages = readPageTexts(pdfPath, opts.maxPages);
    const { text, truncated } = assemblePages(pages, opts.maxChars);
    result.fullText = text;
    result.truncated = truncated;
    result.numPages = pages.length;
  } catch (e) {
    log.warn({ err: errorMessage(e) }, 'PDF text extraction failed');
    return emptyContent();
  }

  if (!opts.extractImages || opts.maxImages <= 0) return result;
  if (!hasPoppler('pdfimages')) {
    log.warn('pdfimages not found, scoring without images');
    return result;
  }

  const imgDir = workDir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'vla-img-'));
  try {
    const all = dumpImages(pdfPath, path.join(imgDir, 'images'), opts.maxPages);
    const chosen = selectImages(all, { minBytes: opts.minImageBytes, maxImages: opts.maxImages });
    for (const img of chosen) result.images.push(await encodeImage(img.file));
    result.numImages = result.images.length;
    log.debug({ found: all.length, kept: chosen.length }, 'Extracted PDF images');
  } catch (e) {
    log.warn({ err: errorMessage(e) }, 'PDF image extraction failed');
  } finally {
    if (!workDir) fs.rmSync(imgDir, { recursive: true, force: true });
  }
  return result;
}

/** Download a PDF to a temp dir, extract it, and remove the temp dir. */
export async function downloadAndExtract(url: string, opts: PdfOptions): Promise<PdfContent> {
  const log = getLogger();
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vla-pdf-'));
  try {
    const pdfPath = path.join(dir, 'paper.pdf');
    const { bytes } = await downloadToFile(url, pdfPath);
    log.debug({ url, bytes }, 'Downloaded PDF');
    return await extractPdfContent(pdfPath, opts, dir);
  } catch (e) {
    log.warn({ url, err: errorMessage(e) }, 'PDF download or extraction failed');
    return emptyContent();
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
