import { chromium, type Browser } from 'playwright-core';
import { FetchError, errorMessage } from '../errors.js';
import type { FetchTarget } from '../types/adapter.js';
import type { PageFetcher } from '../types/fetcher.js';
import { logger } from '../utils/logger.js';

export interface BrowserFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  /** Chromium binary; playwright-core ships none. */
  executablePath?: string;
}

/**
 * Renders script-driven pages in headless Chromium. One browser is launched
 * on first use and shared; each fetch gets its own context.
 */
export class BrowserFetcher implements PageFetcher {
  readonly method = 'browser';
  private browser: Browser | null = null;

  constructor(private readonly options: BrowserFetcherOptions) {}

  private async getBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.isConnected()) {
      this.browser = await chromium.launch({
        headless: true,
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
        ...(this.options.executablePath ? { executablePath: this.options.executablePath } : {}),
      });
      logger.info('Chromium launched');
    }
    return this.browser;
  }

  async fetch(target: FetchTarget): Promise<string> {
    try {
      const b = await this.getBrowser();
      const context = await b.newContext({
        userAgent: this.options.userAgent,
        viewport: { width: 1280, height: 800 },
      });

      try {
        const page = await context.newPage();
        await page.goto(target.url, { waitUntil: 'domcontentloaded', timeout: this.options.timeoutMs });
        if (target.waitForSelector) {
          await page.waitForSelector(target.waitForSelector, { timeout: this.options.timeoutMs });
        }
        return await page.content();
      } finally {
        await context.close();
      }
    } catch (err) {
      throw new FetchError(`Browser fetch failed: ${errorMessage(err)}`, target.url, null, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      logger.info('Chromium closed');
    }
  }
}
