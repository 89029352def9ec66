import { request, type Dispatcher } from 'undici';
import { FetchError, errorMessage } from '../errors.js';
import type { FetchTarget } from '../types/adapter.js';
import type { PageFetcher } from '../types/fetcher.js';

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  maxRedirections?: number;
  /** Alternate undici dispatcher (proxy agent, MockAgent). */
  dispatcher?: Dispatcher;
}

const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

export class HttpFetcher implements PageFetcher {
  readonly method = 'http';

  constructor(private readonly options: HttpFetcherOptions) {}

  async fetch(target: FetchTarget): Promise<string> {
    let statusCode: number;
    let text: string;

    try {
      const res = await request(target.url, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: target.accept ?? DEFAULT_ACCEPT,
          'Accept-Language': 'en-US,en;q=0.5',
        },
        maxRedirections: this.options.maxRedirections ?? 3,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        // the two timeouts above only measure silence; this bounds the whole fetch
        signal: AbortSignal.timeout(this.options.timeoutMs),
        ...(this.options.dispatcher ? { dispatcher: this.options.dispatcher } : {}),
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (err) {
      throw new FetchError(`Request failed: ${errorMessage(err)}`, target.url, null, { cause: err });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new FetchError(`HTTP ${statusCode}`, target.url, statusCode);
    }

    return text;
  }
}
