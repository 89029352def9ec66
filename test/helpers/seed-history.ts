import { HistoryStore } from '../../src/store/history-store.js';
import type { DistributionRecord, SourceId } from '../../src/types/index.js';

/** Writes the given records to a history file as one scrape would. */
export async function seedHistory(
  file: string,
  records: DistributionRecord[],
  source: SourceId = 'stockanalysis',
  scrapedAt = new Date('2024-01-20T12:00:00.000Z'),
): Promise<void> {
  const store = await HistoryStore.open(file);
  store.upsertMany(records, { source, scrapedAt });
  await store.flush(scrapedAt);
  await store.close();
}
