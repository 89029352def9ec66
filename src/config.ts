import path from 'node:path';
import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATA_DIR: z.string().default('./output'),
  /** Overrides DATA_DIR/dividend_history.json */
  HISTORY_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  SCRAPE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  /** Chromium binary for the browser fetcher, e.g. /usr/bin/chromium */
  CHROMIUM_PATH: z.string().optional(),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;

export function historyFilePath(cfg: Pick<Config, 'DATA_DIR' | 'HISTORY_FILE'> = config): string {
  return path.resolve(cfg.HISTORY_FILE ?? path.join(cfg.DATA_DIR, 'dividend_history.json'));
}
