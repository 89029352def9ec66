import { getAdapter } from '../adapters/index.js';
import { AppError, errorMessage } from '../errors.js';
import type { HistoryStore } from '../store/history-store.js';
import type {
  BatchSummary,
  DistributionRecord,
  FetcherSet,
  FundCatalogEntry,
  FundFailure,
  FundOutcome,
  SourceAdapter,
  SourceFailure,
  SourceId,
} from '../types/index.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface ScrapeOptions {
  funds: readonly Readonly<FundCatalogEntry>[];
  fetchers: FetcherSet;
  store: HistoryStore;
  /** Pause between funds. */
  delayMs?: number;
  resolveAdapter?: (id: SourceId) => SourceAdapter;
  logger?: Logger;
  now?: () => Date;
}

interface SourceResult {
  source: SourceId;
  records: DistributionRecord[];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeFailure(source: SourceId, err: unknown): SourceFailure {
  return {
    source,
    code: err instanceof AppError ? err.code : 'unexpected_error',
    message: errorMessage(err),
  };
}

/**
 * Tries the fund's sources in order. The first one that yields records
 * wins; a clean but empty parse is kept as a fallback result.
 */
async function scrapeFund(
  fund: Readonly<FundCatalogEntry>,
  options: Required<Pick<ScrapeOptions, 'fetchers' | 'resolveAdapter'>>,
  log: Logger,
): Promise<{ result: SourceResult | null; errors: SourceFailure[] }> {
  const errors: SourceFailure[] = [];
  let emptyResult: SourceResult | null = null;

  for (const sourceId of fund.sources) {
    const adapter = options.resolveAdapter(sourceId);
    const target = adapter.target(fund.symbol);
    const fetcher = options.fetchers[adapter.config.fetchMethod];
    const sourceLog = log.child({ source: sourceId, url: target.url });

    try {
      const startMs = Date.now();
      const content = await fetcher.fetch(target);
      const records = adapter.parse(content, fund.symbol);
      sourceLog.info({ durationMs: Date.now() - startMs, count: records.length }, 'Parsed distributions');

      if (records.length > 0) {
        return { result: { source: sourceId, records }, errors };
      }
      emptyResult ??= { source: sourceId, records };
    } catch (err) {
      sourceLog.warn({ err: errorMessage(err) }, 'Source failed');
      errors.push(describeFailure(sourceId, err));
    }
  }

  return { result: emptyResult, errors };
}

/**
 * One full scrape cycle: every fund in turn, fetch → parse → upsert → flush.
 * Per-fund failures end up in the summary; a StoreError aborts the batch.
 */
export async function runScrape(options: ScrapeOptions): Promise<BatchSummary> {
  const log = options.logger ?? rootLogger;
  const now = options.now ?? (() => new Date());
  const resolveAdapter = options.resolveAdapter ?? getAdapter;
  const { store, fetchers } = options;

  const startedAt = now();
  const succeeded: FundOutcome[] = [];
  const failed: FundFailure[] = [];

  log.info({ funds: options.funds.length }, 'Scrape started');

  for (const [index, fund] of options.funds.entries()) {
    if (index > 0 && options.delayMs) await sleep(options.delayMs);

    const fundLog = log.child({ fund: fund.symbol });
    const { result, errors } = await scrapeFund(fund, { fetchers, resolveAdapter }, fundLog);

    if (!result) {
      fundLog.warn({ errors: errors.length }, 'All sources failed');
      failed.push({ symbol: fund.symbol, errors });
      continue;
    }

    const counts = store.upsertMany(result.records, { source: result.source, scrapedAt: now() });
    await store.flush(now());

    fundLog.info({ source: result.source, ...counts }, 'Distributions stored');
    succeeded.push({
      symbol: fund.symbol,
      source: result.source,
      found: result.records.length,
      ...counts,
    });
  }

  const summary: BatchSummary = {
    started_at: startedAt.toISOString(),
    finished_at: now().toISOString(),
    succeeded,
    failed,
  };

  store.recordLastRun(summary);
  await store.flush(now());

  log.info({ succeeded: succeeded.length, failed: failed.length }, 'Scrape finished');
  return summary;
}
