import { describe, it, expect } from 'vitest';
import { filenameFromUrl, hashUrl, isBase64DataUri, resolveUrl, sanitizeFilename } from './utils.js';

describe('resolveUrl', () => {
  const base = 'http://x.test/a/b.html';

  it('resolves path-relative references', () => {
    expect(resolveUrl(base, 'c.png')).toBe('http://x.test/a/c.png');
    expect(resolveUrl(base, '../c.png')).toBe('http://x.test/c.png');
    expect(resolveUrl(base, '/root.png')).toBe('http://x.test/root.png');
  });

  it('resolves fragment-only and query-only references against the page', () => {
    expect(resolveUrl(base, '#top')).toBe('http://x.test/a/b.html#top');
    expect(resolveUrl(base, '?page=2')).toBe('http://x.test/a/b.html?page=2');
  });

  it('keeps absolute references, normalized', () => {
    expect(resolveUrl(base, 'https://other.test/p')).toBe('https://other.test/p');
    expect(resolveUrl(base, 'HTTPS://Other.TEST')).toBe('https://other.test/');
    expect(resolveUrl(base, '//cdn.test/i.png')).toBe('http://cdn.test/i.png');
  });

  it('returns null for unparsable references', () => {
    expect(resolveUrl(base, 'http://[')).toBeNull();
  });
});

describe('filenameFromUrl', () => {
  it('takes the last path segment without query or fragment', () => {
    expect(filenameFromUrl('http://x.test/a/b/photo.jpg?w=100#f')).toBe('photo.jpg');
  });

  it('returns an empty string for the root path', () => {
    expect(filenameFromUrl('http://x.test/')).toBe('');
    expect(filenameFromUrl('http://x.test/?q=1')).toBe('');
  });

  it('ignores a trailing slash', () => {
    expect(filenameFromUrl('http://x.test/gallery/')).toBe('gallery');
  });

  it('returns an empty string for invalid URLs', () => {
    expect(filenameFromUrl('not a url')).toBe('');
  });
});

describe('isBase64DataUri', () => {
  it('recognizes inline base64 images', () => {
    expect(isBase64DataUri('data:image/png;base64,iVBORw0KGgo=')).toBe(true);
  });

  it('rejects other URLs', () => {
    expect(isBase64DataUri('data:image/svg+xml,<svg/>')).toBe(false);
    expect(isBase64DataUri('http://x.test/data:image;base64')).toBe(false);
  });
});

describe('hashUrl', () => {
  it('returns the hex sha256 digest', () => {
    expect(hashUrl('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('sanitizeFilename', () => {
  it('replaces characters that are unsafe in filenames', () => {
    expect(sanitizeFilename('a:b*c?.png')).toBe('a-b-c-.png');
  });
});
