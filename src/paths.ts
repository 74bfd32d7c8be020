import path from 'node:path';

export const METADATA_FILE = 'images.json';

export function imagesRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.IMAGES_DIR || 'images');
}

export function metadataPath(outDir: string): string {
  return path.join(outDir, METADATA_FILE);
}
