import * as path from 'path';
import { createHash } from 'crypto';

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
  '.heif': 'image/heif',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

/**
 * Mimetype from the file extension, null when unknown
 */
export function getMimetype(filePath: string): string | null {
  const ext = path.extname(filePath).toLowerCase();
  return MIME_TYPES[ext] ?? null;
}

/**
 * Stable identifier for a file, derived from its full path
 */
export function hashString(value: string): string {
  return createHash('md5').update(value, 'utf-8').digest('hex');
}
