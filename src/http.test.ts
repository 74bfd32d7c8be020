import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'node:http';
import { HttpClient } from './http.js';

let server: http.Server;
let base: string;
const hits: Record<string, number> = {};

beforeAll(async () => {
  server = http.createServer((req, res) => {
    const url = req.url ?? '/';
    hits[url] = (hits[url] ?? 0) + 1;
    if (url === '/page') {
      res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
      res.end('<img src="/pic.png">');
    } else if (url === '/pic.png') {
      res.writeHead(200, { 'content-type': 'image/png' });
      res.end(Buffer.from([137, 80, 78, 71]));
    } else if (url === '/agent') {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end(req.headers['user-agent'] ?? '');
    } else {
      res.writeHead(503);
      res.end();
    }
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no port');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('HttpClient', () => {
  it('returns page markup', async () => {
    const client = new HttpClient();
    expect(await client.html(`${base}/page`)).toBe('<img src="/pic.png">');
  });

  it('returns image bytes with the declared content type', async () => {
    const client = new HttpClient();
    const res = await client.binary(`${base}/pic.png`);
    expect([...res.body]).toEqual([137, 80, 78, 71]);
    expect(res.contentType).toBe('image/png');
  });

  it('sends the configured user agent', async () => {
    const client = new HttpClient({ userAgent: 'test-agent' });
    expect(await client.html(`${base}/agent`)).toBe('test-agent');
  });

  it('fails once without retrying', async () => {
    const client = new HttpClient();
    await expect(client.html(`${base}/broken`)).rejects.toThrow();
    expect(hits['/broken']).toBe(1);
  });
});
