import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { imagesRoot } from './paths.js';
import type { FilenameStrategy, Traversal } from './types.js';

export type AppConfig = {
  outDir: string;
  imageCap: number;
  traversal: Traversal;
  timeoutMs: number;
  concurrency: number;
  userAgent?: string;
  filenames: FilenameStrategy;
  writeEmptyMetadata: boolean;
  logLevel: LogLevel;
};

const TRAVERSALS: readonly Traversal[] = ['breadth-first', 'depth-first'];
const FILENAME_STRATEGIES: readonly FilenameStrategy[] = ['content-type', 'url'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    outDir: imagesRoot(env),
    imageCap: intFromEnv(env, 'IMAGE_CAP', 10, 0),
    traversal: oneOf(env, 'TRAVERSAL', TRAVERSALS, 'breadth-first'),
    timeoutMs: intFromEnv(env, 'TIMEOUT_MS', 30000, 1),
    concurrency: intFromEnv(env, 'CONCURRENCY', 4, 1),
    userAgent: env.USER_AGENT || undefined,
    filenames: oneOf(env, 'FILENAMES', FILENAME_STRATEGIES, 'content-type'),
    writeEmptyMetadata: env.WRITE_EMPTY_METADATA === '1' || env.WRITE_EMPTY_METADATA === 'true',
    logLevel: oneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info')
  };
}

function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) throw new ConfigError(key, `expected an integer, got "${raw}"`);
  const value = parseInt(raw, 10);
  if (value < min) throw new ConfigError(key, `must be at least ${min}, got ${value}`);
  return value;
}

function oneOf<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const match = allowed.find((v) => v === raw.trim());
  if (match === undefined) throw new ConfigError(key, `expected one of ${allowed.join(', ')}, got "${raw}"`);
  return match;
}
