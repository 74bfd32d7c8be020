import path from 'node:path';
import pLimit from 'p-limit';
import { deriveFilename, qualifyFilename } from './filenames.js';
import type { BinaryResponse } from './http.js';
import type { Logger } from './logger.js';
import { METADATA_FILE, metadataPath } from './paths.js';
import { resetDir, writeBytes, writeJson } from './storage.js';
import type { DownloadSummary, ImageDescriptor, ImageMetadata, MaterializeConfig } from './types.js';
import { isBase64DataUri } from './utils.js';

export interface ImageSource {
  binary(url: string): Promise<BinaryResponse>;
}

export type MaterializerDeps = {
  source: ImageSource;
  logger: Logger;
};

/**
 * Writes crawl output to disk: the metadata record and one file per
 * distinct image URL.
 */
export class ImageMaterializer {
  private cfg: Required<MaterializeConfig>;
  private source: ImageSource;
  private logger: Logger;

  constructor(cfg: MaterializeConfig, deps: MaterializerDeps) {
    this.cfg = {
      outDir: cfg.outDir,
      concurrency: cfg.concurrency ?? 4,
      filenames: cfg.filenames ?? 'content-type',
      writeEmptyMetadata: cfg.writeEmptyMetadata ?? false
    };
    this.source = deps.source;
    this.logger = deps.logger;
  }

  persistMetadata(images: ImageDescriptor[]): void {
    resetDir(this.cfg.outDir);
    if (images.length === 0) {
      this.logger.info('No images to save.');
      if (!this.cfg.writeEmptyMetadata) return;
    }
    const metadata: ImageMetadata = { images };
    const file = metadataPath(this.cfg.outDir);
    writeJson(file, metadata);
    this.logger.info(`Saved metadata for ${images.length} images to ${file}`);
  }

  async downloadImages(images: ImageDescriptor[]): Promise<DownloadSummary> {
    const summary: DownloadSummary = { downloaded: 0, duplicates: 0, skipped: 0, failed: 0, files: [] };
    const seen = new Set<string>();
    // filename -> source URL; the metadata record's name is reserved up front
    const owners = new Map<string, string>([[METADATA_FILE, metadataPath(this.cfg.outDir)]]);
    const limit = pLimit(Math.max(1, this.cfg.concurrency));
    const jobs: Promise<void>[] = [];

    for (const image of images) {
      // marked before any await so concurrent downloads never share a URL
      if (seen.has(image.url)) {
        summary.duplicates++;
        continue;
      }
      seen.add(image.url);

      if (isBase64DataUri(image.url)) {
        this.logger.error(`Found Base64-encoded data on ${image.page}, skipping`);
        summary.skipped++;
        continue;
      }

      jobs.push(limit(() => this.downloadOne(image.url, owners, summary)));
    }

    await Promise.all(jobs);
    return summary;
  }

  private async downloadOne(url: string, owners: Map<string, string>, summary: DownloadSummary): Promise<void> {
    try {
      const res = await this.source.binary(url);
      let name = deriveFilename(url, res.contentType, this.cfg.filenames);
      const owner = owners.get(name);
      if (owner !== undefined && owner !== url) {
        const qualified = qualifyFilename(url, name);
        this.logger.warn(`Filename ${name} already taken by ${owner}, saving ${url} as ${qualified}`);
        name = qualified;
      }
      owners.set(name, url);

      const outPath = path.join(this.cfg.outDir, name);
      await writeBytes(outPath, res.body);
      summary.downloaded++;
      summary.files.push(outPath);
      this.logger.info(`Downloaded image ${name}`);
    } catch (err) {
      summary.failed++;
      this.logger.error(`Failed to download image ${url}`, err);
    }
  }
}
