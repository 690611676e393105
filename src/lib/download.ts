import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { once } from 'node:events';
import { request } from 'undici';

import { USER_AGENT } from './http.js';
import { ensureDir } from './storage.js';

export interface DownloadResult {
  bytes: number;
  sha256: string;
}

const MAX_REDIRECTS = 5;

/** True when the file starts with the `%PDF-` magic. */
export function hasPdfHeader(filePath: string): boolean {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buf = Buffer.alloc(5);
    const n = fs.readSync(fd, buf, 0, 5, 0);
    return n === 5 && buf.toString('latin1') === '%PDF-';
  } finally {
    fs.closeSync(fd);
  }
}

export async function downloadToFile(url: string, outPath: string, timeoutMs = 60_000): Promise<DownloadResult> {
  ensureDir(path.dirname(outPath));

  // undici's request() does not follow redirects; arxiv.org answers http:// links with a 301.
  let current = url;
  let response = await request(current, {
    method: 'GET',
    headers: { 'User-Agent': USER_AGENT },
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  for (let hop = 0; hop < MAX_REDIRECTS && response.statusCode >= 300 && response.statusCode < 400; hop += 1) {
    const location = response.headers['location'];
    await response.body.dump();
    if (typeof location !== 'string') break;
    current = new URL(location, current).toString();
    response = await request(current, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      bodyTimeout: timeoutMs,
      headersTimeout: timeoutMs,
    });
  }

  const { body, statusCode, headers } = response;
  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new Error(`Download failed: ${statusCode} for ${url}`);
  }

  const ct = String(headers['content-type'] ?? '');
  // A text/html answer is an error or captcha page, not the paper.
  if (ct && !ct.includes('pdf') && !ct.includes('octet-stream')) {
    await body.dump();
    throw new Error(`Unexpected content-type for ${url}: ${ct}`);
  }

  const tmpPath = `${outPath}.tmp`;
  const hash = crypto.createHash('sha256');
  let bytes = 0;

  const ws = fs.createWriteStream(tmpPath);
  try {
    for await (const chunk of body) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      bytes += buf.length;
      hash.update(buf);
      if (!ws.write(buf)) await once(ws, 'drain');
    }
  } finally {
    ws.end();
    await once(ws, 'finish');
  }

  if (!hasPdfHeader(tmpPath)) {
    fs.rmSync(tmpPath, { force: true });
    throw new Error(`Downloaded file is not a valid PDF (missing %PDF- header): ${url}`);
  }

  fs.renameSync(tmpPath, outPath);
  return { bytes, sha256: hash.digest('hex') };
}
