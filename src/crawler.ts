import { DEFAULT_IMAGE_CAP, extractImages, extractLinks } from './extractor.js';
import type { PageFetcher } from './fetcher.js';
import type { Logger } from './logger.js';
import { parseMarkup } from './markup.js';
import type { CrawlConfig, CrawlResult, FrontierEntry, ImageDescriptor, Traversal } from './types.js';
import { resolveUrl } from './utils.js';

export type CrawlerDeps = {
  fetcher: PageFetcher;
  logger: Logger;
};

/**
 * Follows links from a seed URL up to `maxDepth` hops and collects the images
 * found on every page it visits. The seed is depth 0. Pages at `maxDepth`
 * still give up their images but none of their links.
 */
export class Crawler {
  private cfg: Required<CrawlConfig>;
  private fetcher: PageFetcher;
  private logger: Logger;

  constructor(cfg: CrawlConfig, deps: CrawlerDeps) {
    this.cfg = {
      imageCap: cfg.imageCap ?? DEFAULT_IMAGE_CAP,
      traversal: cfg.traversal ?? 'breadth-first'
    };
    this.fetcher = deps.fetcher;
    this.logger = deps.logger;
  }

  async crawl(seed: string, maxDepth: number): Promise<ImageDescriptor[]> {
    const res = await this.crawlDetailed(seed, maxDepth);
    return res.images;
  }

  async crawlDetailed(seed: string, maxDepth: number): Promise<CrawlResult> {
    // links come back normalized from resolveUrl, so the seed must match them
    const start = resolveUrl(seed, seed) ?? seed;
    const frontier = new Frontier(this.cfg.traversal);
    frontier.add([{ url: start, depth: 0 }]);
    const seen = new Set<string>();
    const images: ImageDescriptor[] = [];
    const visited: string[] = [];
    const failed: string[] = [];

    for (let entry = frontier.next(); entry; entry = frontier.next()) {
      const { url, depth } = entry;
      // checked at dequeue time; the same URL may sit in the frontier many times
      if (seen.has(url)) continue;
      seen.add(url);
      visited.push(url);

      this.logger.info(`Fetching images from ${url} at depth ${depth}`);
      const html = await this.fetcher.fetch(url);
      if (html === null) failed.push(url);
      const doc = html === null ? null : parseMarkup(html);

      for (const image of extractImages(doc, url, depth, this.cfg.imageCap)) images.push(image);

      if (depth >= maxDepth) continue;

      const children: FrontierEntry[] = [];
      for (const href of extractLinks(doc)) {
        const abs = resolveUrl(url, href);
        if (!abs) {
          this.logger.debug(`Skipping unresolvable link ${href} on ${url}`);
          continue;
        }
        children.push({ url: abs, depth: depth + 1 });
      }
      frontier.add(children);
    }

    return { images, visited, failed };
  }
}

/**
 * Pending (url, depth) pairs. Breadth-first reads from a moving head index;
 * depth-first pops from the tail.
 */
class Frontier {
  private entries: FrontierEntry[] = [];
  private head = 0;

  constructor(private traversal: Traversal) {}

  // Depth-first pushes in reverse so links still pop in document order.
  add(children: FrontierEntry[]): void {
    if (this.traversal === 'depth-first') {
      for (let i = children.length - 1; i >= 0; i--) this.entries.push(children[i]);
    } else {
      for (const child of children) this.entries.push(child);
    }
  }

  next(): FrontierEntry | undefined {
    if (this.traversal === 'depth-first') return this.entries.pop();
    if (this.head >= this.entries.length) return undefined;
    const entry = this.entries[this.head++];
    // drop the consumed prefix once it dominates the array
    if (this.head >= 1024 && this.head * 2 >= this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }
    return entry;
  }
}
