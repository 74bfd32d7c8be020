import { UsageError } from './errors.js';

export type Invocation = {
  seedUrl: string;
  maxDepth: number;
};

export const USAGE = 'Usage: image-crawler <start_url> <depth>';

export function parseInvocation(args: string[]): Invocation {
  if (args.length !== 2) {
    throw new UsageError(`expected 2 arguments, got ${args.length}`);
  }
  const [seedUrl, depth] = args;
  if (!/^\d+$/.test(depth)) {
    throw new UsageError(`depth must be a non-negative integer, got "${depth}"`);
  }
  let seed: URL;
  try {
    seed = new URL(seedUrl);
  } catch {
    throw new UsageError(`not an absolute URL: "${seedUrl}"`);
  }
  return { seedUrl: seed.toString(), maxDepth: parseInt(depth, 10) };
}
