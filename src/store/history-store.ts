import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StoreError, errorMessage } from '../errors.js';
import { distributionKey, pickPreferred, sameDistribution } from '../pipeline/dedup.js';
import type {
  DistributionFilter,
  DistributionRecord,
  StoredDistribution,
  UpsertCounts,
  UpsertOutcome,
} from '../types/distribution.js';
import { SOURCE_IDS } from '../types/adapter.js';
import { FUND_SYMBOLS, type FundSymbol } from '../types/fund.js';
import type { BatchSummary } from '../types/summary.js';
import { logger } from '../utils/logger.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const storedSchema = z.object({
  fund_symbol: z.enum(FUND_SYMBOLS),
  ex_date: isoDate,
  pay_date: isoDate.nullable(),
  amount: z.number().nonnegative(),
  source: z.string(),
  scraped_at: z.string(),
});

const summarySchema = z.object({
  started_at: z.string(),
  finished_at: z.string(),
  succeeded: z.array(
    z.object({
      symbol: z.enum(FUND_SYMBOLS),
      source: z.enum(SOURCE_IDS),
      found: z.number(),
      inserted: z.number(),
      updated: z.number(),
      unchanged: z.number(),
    }),
  ),
  failed: z.array(
    z.object({
      symbol: z.enum(FUND_SYMBOLS),
      errors: z.array(
        z.object({
          source: z.enum(SOURCE_IDS),
          code: z.string(),
          message: z.string(),
        }),
      ),
    }),
  ),
});

const historyFileSchema = z.object({
  version: z.literal(1),
  last_updated: z.string().nullable(),
  last_run: summarySchema.nullable().default(null),
  funds: z.record(z.string(), z.array(storedSchema)),
});

type HistoryFile = z.infer<typeof historyFileSchema>;

export interface UpsertMeta {
  source: string;
  scrapedAt: Date;
}

function compareRecords(a: DistributionRecord, b: DistributionRecord): number {
  if (a.ex_date !== b.ex_date) return a.ex_date < b.ex_date ? -1 : 1;
  if (a.fund_symbol !== b.fund_symbol) return a.fund_symbol < b.fund_symbol ? -1 : 1;
  return 0;
}

function toPublic(r: StoredDistribution): DistributionRecord {
  return { fund_symbol: r.fund_symbol, ex_date: r.ex_date, pay_date: r.pay_date, amount: r.amount };
}

/**
 * Distribution history kept in one JSON file, keyed by (fund_symbol, ex_date).
 *
 * In-memory state is authoritative within the process; flush() writes it
 * out atomically. Only one writer process is expected.
 */
export class HistoryStore {
  private readonly records = new Map<string, StoredDistribution>();
  private lastUpdated: string | null;
  private lastRun: BatchSummary | null;
  private dirty = false;
  private closed = false;

  private constructor(
    readonly filePath: string,
    data: HistoryFile | null,
  ) {
    this.lastUpdated = data?.last_updated ?? null;
    this.lastRun = data?.last_run ?? null;
    for (const list of Object.values(data?.funds ?? {})) {
      for (const record of list) {
        this.records.set(distributionKey(record), record);
      }
    }
  }

  /** Loads the history file, or starts empty when it does not exist yet. */
  static async open(filePath: string): Promise<HistoryStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new HistoryStore(filePath, null);
      }
      throw new StoreError(`Could not read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`${filePath} is not valid JSON`, filePath, { cause: err });
    }

    const parsed = historyFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`${filePath} does not match the history format`, filePath, {
        cause: parsed.error,
      });
    }
    return new HistoryStore(filePath, parsed.data);
  }

  get updatedAt(): string | null {
    return this.lastUpdated;
  }

  get lastRunSummary(): BatchSummary | null {
    return this.lastRun;
  }

  get size(): number {
    return this.records.size;
  }

  upsert(record: DistributionRecord, meta: UpsertMeta): UpsertOutcome {
    this.assertOpen();
    const key = distributionKey(record);
    const existing = this.records.get(key);
    const incoming: StoredDistribution = {
      fund_symbol: record.fund_symbol,
      ex_date: record.ex_date,
      pay_date: record.pay_date,
      amount: record.amount,
      source: meta.source,
      scraped_at: meta.scrapedAt.toISOString(),
    };

    if (!existing) {
      this.records.set(key, incoming);
      this.dirty = true;
      return 'inserted';
    }

    const preferred = pickPreferred(existing, incoming);
    if (preferred === existing || sameDistribution(existing, incoming)) {
      return 'unchanged';
    }

    this.records.set(key, incoming);
    this.dirty = true;
    return 'updated';
  }

  upsertMany(records: DistributionRecord[], meta: UpsertMeta): UpsertCounts {
    const counts: UpsertCounts = { inserted: 0, updated: 0, unchanged: 0 };
    for (const record of records) {
      counts[this.upsert(record, meta)]++;
    }
    return counts;
  }

  /** Records matching the filter, ex_date ascending. */
  query(filter: DistributionFilter = {}): DistributionRecord[] {
    const { fundSymbol, from, to, limit } = filter;
    const matched = Array.from(this.records.values())
      .filter(
        (r) =>
          (fundSymbol === undefined || r.fund_symbol === fundSymbol) &&
          (from === undefined || r.ex_date >= from) &&
          (to === undefined || r.ex_date <= to),
      )
      .sort(compareRecords)
      .map(toPublic);

    return limit !== undefined && matched.length > limit ? matched.slice(matched.length - limit) : matched;
  }

  /** Symbols with at least one stored distribution. */
  funds(): FundSymbol[] {
    const symbols = new Set<FundSymbol>();
    for (const r of this.records.values()) symbols.add(r.fund_symbol);
    return FUND_SYMBOLS.filter((s) => symbols.has(s));
  }

  recordLastRun(summary: BatchSummary): void {
    this.assertOpen();
    this.lastRun = summary;
    this.dirty = true;
  }

  /** Writes pending changes via a temp file and rename. */
  async flush(now: Date = new Date()): Promise<void> {
    this.assertOpen();
    if (!this.dirty) return;

    this.lastUpdated = now.toISOString();
    const doc: HistoryFile = {
      version: 1,
      last_updated: this.lastUpdated,
      last_run: this.lastRun,
      funds: this.groupByFund(),
    };

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn({ tmpPath, err: errorMessage(rmErr) }, 'Could not remove temp file');
      });
      throw new StoreError(`Could not write ${this.filePath}: ${errorMessage(err)}`, this.filePath, {
        cause: err,
      });
    }
    this.dirty = false;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
  }

  private groupByFund(): Record<string, StoredDistribution[]> {
    const funds: Record<string, StoredDistribution[]> = {};
    const sorted = Array.from(this.records.values()).sort(compareRecords);
    for (const record of sorted) {
      (funds[record.fund_symbol] ??= []).push(record);
    }
    return funds;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('History store is closed', this.filePath);
    }
  }
}
