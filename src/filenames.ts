import path from 'node:path';
import type { FilenameStrategy } from './types.js';
import { filenameFromUrl, hashUrl, sanitizeFilename } from './utils.js';

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/pjpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/svg+xml': '.svg',
  'image/avif': '.avif',
  'image/bmp': '.bmp',
  'image/x-icon': '.ico',
  'image/vnd.microsoft.icon': '.ico',
  'image/tiff': '.tiff'
};

export function extensionForContentType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return IMAGE_EXTENSIONS[mediaType];
}

/**
 * Local filename for a downloaded image. With the `content-type` strategy a
 * known image type replaces (or supplies) the extension of the URL basename.
 */
export function deriveFilename(
  url: string,
  contentType: string | undefined,
  strategy: FilenameStrategy = 'content-type'
): string {
  const base = sanitizeFilename(filenameFromUrl(url)) || hashUrl(url).slice(0, 16);
  if (strategy === 'url') return base;
  const ext = extensionForContentType(contentType);
  if (!ext) return base;
  const stem = path.posix.basename(base, path.posix.extname(base)) || base;
  return `${stem}${ext}`;
}

export function qualifyFilename(url: string, filename: string): string {
  return `${hashUrl(url).slice(0, 8)}-${filename}`;
}
