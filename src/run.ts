import type { AppConfig } from './config.js';
import { Crawler } from './crawler.js';
import { PageFetcher, type PageSource } from './fetcher.js';
import { HttpClient } from './http.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { ImageMaterializer, type ImageSource } from './materializer.js';
import type { Invocation } from './invocation.js';
import type { CrawlResult, DownloadSummary } from './types.js';

export type RunDeps = {
  pages: PageSource;
  images: ImageSource;
  crawlLogger: Logger;
  downloadLogger: Logger;
};

export type RunReport = {
  crawl: CrawlResult;
  download: DownloadSummary;
};

export function defaultDeps(config: AppConfig): RunDeps {
  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    concurrency: config.concurrency
  });
  const root = new ConsoleLogger('crawl', config.logLevel);
  return { pages: http, images: http, crawlLogger: root, downloadLogger: root.child('download') };
}

export async function runCrawl(inv: Invocation, config: AppConfig, deps: RunDeps = defaultDeps(config)): Promise<RunReport> {
  const log = deps.crawlLogger;
  log.info(`seed: ${inv.seedUrl}, max depth: ${inv.maxDepth}, traversal: ${config.traversal}`);

  const crawler = new Crawler(
    { imageCap: config.imageCap, traversal: config.traversal },
    { fetcher: new PageFetcher(deps.pages, log), logger: log }
  );
  const crawl = await crawler.crawlDetailed(inv.seedUrl, inv.maxDepth);
  log.info(`visited: ${crawl.visited.length}, failed: ${crawl.failed.length}, images: ${crawl.images.length}`);

  const materializer = new ImageMaterializer(
    {
      outDir: config.outDir,
      concurrency: config.concurrency,
      filenames: config.filenames,
      writeEmptyMetadata: config.writeEmptyMetadata
    },
    { source: deps.images, logger: deps.downloadLogger }
  );
  materializer.persistMetadata(crawl.images);
  const download = await materializer.downloadImages(crawl.images);
  deps.downloadLogger.info(
    `completed: ${download.downloaded} downloaded, ${download.duplicates} duplicates, ${download.skipped} skipped, ${download.failed} failed`
  );

  return { crawl, download };
}
