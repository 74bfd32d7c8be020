import got, { Got, Response } from 'got';
import pLimit from 'p-limit';

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  concurrency?: number;
};

export type BinaryResponse = {
  body: Buffer;
  contentType?: string;
};

export class HttpClient {
  // One attempt per URL: failures surface to the caller instead of being retried.
  private client: Got = got.extend({
    headers: {},
    followRedirect: true,
    retry: { limit: 0 },
    timeout: { request: 30000 }
  });

  private limit: ReturnType<typeof pLimit>;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, concurrency } = opts;
    this.client = this.client.extend({
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      timeout: timeoutMs ? { request: timeoutMs } : undefined
    });
    this.limit = pLimit(Math.max(1, concurrency ?? 4));
  }

  async html(url: string): Promise<string> {
    return this.limit(async () => {
      const res: Response<string> = await this.client.get(url, { responseType: 'text' });
      return res.body;
    });
  }

  async binary(url: string): Promise<BinaryResponse> {
    return this.limit(async () => {
      const res: Response<Buffer> = await this.client.get(url, { responseType: 'buffer' });
      return { body: res.body, contentType: res.headers['content-type'] };
    });
  }
}
