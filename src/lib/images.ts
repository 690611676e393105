import fs from 'node:fs';

import sharp from 'sharp';

import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';

/** Images larger than this are shrunk and re-encoded before they are sent. */
export const COMPRESS_OVER_BYTES = 200 * 1024;
const MAX_EDGE_PX = 1024;
const JPEG_QUALITY = 85;

export function imageMime(file: string): string {
  return file.toLowerCase().endsWith('.jpg') ? 'image/jpeg' : 'image/png';
}

export function toDataUrl(file: string): string {
  return `data:${imageMime(file)};base64,${fs.readFileSync(file).toString('base64')}`;
}

/**
 * data: URL for an extracted image. Files over COMPRESS_OVER_BYTES are fitted
 * inside 1024x1024 and re-encoded as JPEG; if that fails the original bytes
 * are used.
 */
export async function encodeImage(file: string): Promise<string> {
  const raw = fs.readFileSync(file);
  if (raw.length <= COMPRESS_OVER_BYTES) return `data:${imageMime(file)};base64,${raw.toString('base64')}`;

  try {
    const jpeg = await sharp(raw)
      .resize({ width: MAX_EDGE_PX, height: MAX_EDGE_PX, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
    getLogger().debug({ file, before: raw.length, after: jpeg.length }, 'Compressed image');
    return `data:image/jpeg;base64,${jpeg.toString('base64')}`;
  } catch (e) {
    getLogger().debug({ file, err: errorMessage(e) }, 'Image compression failed, sending the original');
    return `data:${imageMime(file)};base64,${raw.toString('base64')}`;
  }
}
