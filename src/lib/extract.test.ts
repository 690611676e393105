import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { PdfOptions } from './types.js';

const { execMock, downloadMock } = vi.hoisted(() => ({
  execMock: vi.fn((_cmd: string, _args?: readonly string[], _opts?: unknown): string => ''),
  downloadMock: vi.fn(async (_url: string, _outPath: string) => ({ bytes: 0, sha256: '' })),
}));

vi.mock('node:child_process', () => ({ execFileSync: execMock }));
vi.mock('./download.js', () => ({ downloadToFile: downloadMock }));

import {
  assemblePages,
  downloadAndExtract,
  emptyContent,
  extractPdfContent,
  parseImageList,
  selectImages,
} from './extract.js';

const pdfOptions: PdfOptions = {
  enabled: true,
  maxPages: 30,
  maxChars: 50_000,
  extractImages: true,
  maxImages: 10,
  minImageBytes: 2000,
};

// pdftotext prints two pages; pdfimages is not installed.
function fakePoppler(cmd: string, args: readonly string[] = []): string {
  if (cmd === 'pdftotext' && args.includes('-v')) return '';
  if (cmd === 'pdftotext') return 'Intro\fMethod\f';
  throw new Error(`spawnSync ${cmd} ENOENT`);
}

describe('assemblePages', () => {
  it('joins pages under headers', () => {
    expect(assemblePages(['Intro', 'Method'], 1000)).toEqual({
      text: '\n--- Page 1 ---\nIntro\n--- Page 2 ---\nMethod',
      truncated: false,
    });
  });

  it('cuts at maxChars', () => {
    expect(assemblePages(['Intro', 'Method'], 20)).toEqual({ text: '\n--- Page 1 ---\nIntr', truncated: true });
  });
});

describe('selectImages', () => {
  it('drops small images and keeps the largest', () => {
    const images = [{ bytes: 1000 }, { bytes: 5000 }, { bytes: 3000 }, { bytes: 9000 }];
    expect(selectImages(images, { minBytes: 2000, maxImages: 2 })).toEqual([{ bytes: 9000 }, { bytes: 5000 }]);
  });
});

describe('parseImageList', () => {
  it('reads image rows and skips the header', () => {
    const out = [
      'page   num  type   width height color comp bpc  enc interp  object ID x-ppi y-ppi size ratio',
      '--------------------------------------------------------------------------------------------',
      '   1     0 image    1200   800  rgb     3   8  jpeg   no        12  0   150   150 98.2K 3.4%',
      '   2     1 smask     640   480  gray    1   8  image  no        15  0    72    72 1024B 0.3%',
      '',
    ].join('\n');
    expect(parseImageList(out)).toEqual([
      { page: 1, num: 0, type: 'image', width: 1200, height: 800 },
      { page: 2, num: 1, type: 'smask', width: 640, height: 480 },
    ]);
  });
});

describe('extractPdfContent', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vla-extract-'));
    execMock.mockReset();
    downloadMock.mockReset();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns empty content without pdftotext', async () => {
    execMock.mockImplementation(() => {
      throw new Error('ENOENT');
    });
    expect(await extractPdfContent(path.join(tmpDir, 'paper.pdf'), pdfOptions)).toEqual(emptyContent());
  });

  it('extracts page text and skips images when pdfimages is missing', async () => {
    execMock.mockImplementation(fakePoppler);
    const pdfPath = path.join(tmpDir, 'paper.pdf');
    fs.writeFileSync(pdfPath, '%PDF-1.4\n');

    expect(await extractPdfContent(pdfPath, pdfOptions)).toEqual({
      fullText: '\n--- Page 1 ---\nIntro\n--- Page 2 ---\nMethod',
      images: [],
      numPages: 2,
      numImages: 0,
      truncated: false,
    });
    expect(execMock).toHaveBeenCalledWith(
      'pdftotext',
      ['-f', '1', '-l', '30', '-enc', 'UTF-8', pdfPath, '-'],
      expect.objectContaining({ encoding: 'utf8' })
    );
  });

  it('sends the largest images above minImageBytes as data URLs', async () => {
    execMock.mockImplementation((cmd: string, args: readonly string[] = []) => {
      if (cmd === 'pdfimages' && !args.includes('-v')) {
        const prefix = args[args.length - 1] ?? '';
        fs.writeFileSync(`${prefix}-001-000.png`, 'a'.repeat(3000));
        fs.writeFileSync(`${prefix}-002-001.jpg`, 'b'.repeat(1000));
        return '';
      }
      return cmd === 'pdfimages' ? '' : fakePoppler(cmd, args);
    });
    const pdfPath = path.join(tmpDir, 'paper.pdf');
    fs.writeFileSync(pdfPath, '%PDF-1.4\n');

    const content = await extractPdfContent(pdfPath, pdfOptions, tmpDir);

    expect(content.numImages).toBe(1);
    expect(content.images).toEqual([`data:image/png;base64,${Buffer.from('a'.repeat(3000)).toString('base64')}`]);
  });
});

describe('downloadAndExtract', () => {
  beforeEach(() => {
    execMock.mockReset();
    downloadMock.mockReset();
  });

  it('extracts the downloaded file', async () => {
    execMock.mockImplementation(fakePoppler);
    downloadMock.mockImplementation(async (_url, outPath) => {
      fs.writeFileSync(outPath, '%PDF-1.4\n');
      return { bytes: 9, sha256: 'x' };
    });

    const content = await downloadAndExtract('https://example.org/p.pdf', { ...pdfOptions, extractImages: false });
    expect(content.fullText).toBe('\n--- Page 1 ---\nIntro\n--- Page 2 ---\nMethod');
    expect(content.numPages).toBe(2);
  });

  it('gives empty content when the download fails', async () => {
    downloadMock.mockRejectedValue(new Error('HTTP 404'));
    expect(await downloadAndExtract('https://example.org/missing.pdf', pdfOptions)).toEqual(emptyContent());
  });
});
