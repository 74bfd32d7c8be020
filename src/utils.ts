import { createHash } from 'node:crypto';

export function sanitizeFilename(input: string): string {
  return input
    .replace(/[\/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

export function resolveUrl(baseUrl: string, reference: string): string | null {
  try {
    return new URL(reference, baseUrl).toString();
  } catch {
    return null;
  }
}

// Last path segment without query or fragment; '' for the root path.
export function filenameFromUrl(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    return u.pathname.split('/').filter(Boolean).pop() ?? '';
  } catch {
    return '';
  }
}

export function isBase64DataUri(text: string): boolean {
  return text.startsWith('data:image') && text.includes(';base64');
}

export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}
