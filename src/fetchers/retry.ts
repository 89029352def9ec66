import { FetchError } from '../errors.js';
import type { FetchTarget } from '../types/adapter.js';
import type { PageFetcher } from '../types/fetcher.js';
import { logger } from '../utils/logger.js';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retries FetchError up to maxAttempts with a fixed delay between attempts.
 * Any other error is rethrown immediately.
 */
export class RetryingFetcher implements PageFetcher {
  readonly method: PageFetcher['method'];

  constructor(
    private readonly inner: PageFetcher,
    private readonly options: RetryOptions,
  ) {
    this.method = inner.method;
  }

  async fetch(target: FetchTarget): Promise<string> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.inner.fetch(target);
      } catch (err) {
        if (!(err instanceof FetchError) || attempt >= maxAttempts) throw err;
        logger.warn(
          { url: target.url, attempt, maxAttempts, err: err.message },
          'Fetch attempt failed, retrying',
        );
        await sleep(this.options.delayMs);
      }
    }
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }
}
