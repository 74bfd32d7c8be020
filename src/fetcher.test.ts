import { describe, it, expect } from 'vitest';
import { PageFetcher } from './fetcher.js';
import { FakePages, MemoryLogger } from './testing.js';

describe('PageFetcher', () => {
  it('returns the page body', async () => {
    const fetcher = new PageFetcher(new FakePages({ 'http://x.test/': '<p>hi</p>' }), new MemoryLogger());
    expect(await fetcher.fetch('http://x.test/')).toBe('<p>hi</p>');
  });

  it('returns null and logs the URL when the request fails', async () => {
    const logger = new MemoryLogger();
    const source = new FakePages({});
    const fetcher = new PageFetcher(source, logger);

    expect(await fetcher.fetch('http://gone.test/')).toBeNull();
    expect(source.requests).toEqual(['http://gone.test/']);
    expect(logger.entries).toEqual([
      { level: 'error', message: 'Failed to fetch images from http://gone.test/: connect ECONNREFUSED http://gone.test/' }
    ]);
  });
});
