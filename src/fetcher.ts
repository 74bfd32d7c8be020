import type { Logger } from './logger.js';

export interface PageSource {
  html(url: string): Promise<string>;
}

/**
 * Wraps the HTTP transport for page retrieval. A failed request is logged
 * and reported as `null` so the crawl can move on to the next page.
 */
export class PageFetcher {
  constructor(
    private source: PageSource,
    private logger: Logger
  ) {}

  async fetch(url: string): Promise<string | null> {
    try {
      return await this.source.html(url);
    } catch (err) {
      this.logger.error(`Failed to fetch images from ${url}`, err);
      return null;
    }
  }
}
