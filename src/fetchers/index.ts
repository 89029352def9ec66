import type { Config } from '../config.js';
import type { FetcherSet } from '../types/fetcher.js';
import { BrowserFetcher } from './browser-pool.js';
import { HttpFetcher } from './http-client.js';
import { RetryingFetcher } from './retry.js';

type FetcherConfig = Pick<
  Config,
  'FETCH_TIMEOUT_MS' | 'FETCH_MAX_ATTEMPTS' | 'FETCH_RETRY_DELAY_MS' | 'USER_AGENT' | 'CHROMIUM_PATH'
>;

/** Both fetch variants, each wrapped in the configured retry policy. */
export function createFetchers(cfg: FetcherConfig): FetcherSet {
  const retry = { maxAttempts: cfg.FETCH_MAX_ATTEMPTS, delayMs: cfg.FETCH_RETRY_DELAY_MS };
  return {
    http: new RetryingFetcher(
      new HttpFetcher({ timeoutMs: cfg.FETCH_TIMEOUT_MS, userAgent: cfg.USER_AGENT }),
      retry,
    ),
    browser: new RetryingFetcher(
      new BrowserFetcher({
        timeoutMs: cfg.FETCH_TIMEOUT_MS,
        userAgent: cfg.USER_AGENT,
        ...(cfg.CHROMIUM_PATH ? { executablePath: cfg.CHROMIUM_PATH } : {}),
      }),
      retry,
    ),
  };
}

export async function closeFetchers(fetchers: FetcherSet): Promise<void> {
  await Promise.all(Object.values(fetchers).map((f) => f.close?.()));
}
