// In-memory stand-ins shared by the test files.
import type { PageSource } from './fetcher.js';
import type { BinaryResponse } from './http.js';
import { describeError, type Logger, type LogLevel } from './logger.js';
import type { ImageSource } from './materializer.js';

export type LogEntry = { level: LogLevel; message: string };

export class MemoryLogger implements Logger {
  entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string, err?: unknown): void {
    this.entries.push({ level: 'error', message: err === undefined ? message : `${message}: ${describeError(err)}` });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function html(images: string[], links: string[] = []): string {
  const imgs = images.map((src) => `<img src="${src}">`).join('\n');
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join('\n');
  return `<html><body>${imgs}${anchors}</body></html>`;
}

/** Serves pages from a map; unknown URLs fail like a refused connection. */
export class FakePages implements PageSource {
  requests: string[] = [];

  constructor(private pages: Record<string, string>) {}

  async html(url: string): Promise<string> {
    this.requests.push(url);
    const body = this.pages[url];
    if (body === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
    return body;
  }
}

export class FakeImages implements ImageSource {
  requests: string[] = [];

  constructor(private images: Record<string, BinaryResponse>) {}

  async binary(url: string): Promise<BinaryResponse> {
    this.requests.push(url);
    const res = this.images[url];
    if (res === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
    return res;
  }
}
