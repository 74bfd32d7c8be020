import type { MarkupDocument } from './markup.js';
import type { ImageDescriptor, LinkTarget } from './types.js';
import { resolveUrl } from './utils.js';

export const DEFAULT_IMAGE_CAP = 10;

/**
 * Images on a page in document order, cut to the first `cap` matches.
 * The cut is a plain prefix: repeated sources still count toward it.
 */
export function extractImages(
  doc: MarkupDocument | null,
  pageUrl: string,
  depth: number,
  cap = DEFAULT_IMAGE_CAP
): ImageDescriptor[] {
  if (!doc) return [];
  const images: ImageDescriptor[] = [];
  for (const img of doc.elements('img')) {
    const src = img.attributes.src;
    if (src === undefined) continue;
    const url = resolveUrl(pageUrl, src);
    if (!url) continue;
    images.push({ url, page: pageUrl, depth });
  }
  return images.slice(0, Math.max(0, cap));
}

export function extractLinks(doc: MarkupDocument | null): LinkTarget[] {
  if (!doc) return [];
  const links: LinkTarget[] = [];
  for (const a of doc.elements('a')) {
    const href = a.attributes.href;
    if (href !== undefined) links.push(href);
  }
  return links;
}
