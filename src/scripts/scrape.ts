/**
 * Runs one scrape cycle over the fund catalog and exits.
 * Usage: npx tsx src/scripts/scrape.ts [--out path/to/history.json]
 */
import path from 'node:path';
import { getAllFunds } from '../catalog/funds.js';
import { config, historyFilePath } from '../config.js';
import { closeFetchers, createFetchers } from '../fetchers/index.js';
import { runScrape } from '../pipeline/scrape-runner.js';
import { HistoryStore } from '../store/history-store.js';
import type { BatchSummary } from '../types/index.js';
import { logger } from '../utils/logger.js';

function parseOutArg(argv: string[]): string | null {
  const idx = argv.findIndex((a) => a === '--out' || a.startsWith('--out='));
  if (idx === -1) return null;
  const arg = argv[idx] ?? '';
  const value = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : argv[idx + 1];
  if (!value) {
    throw new Error('--out requires a file path');
  }
  return path.resolve(value);
}

function printSummary(summary: BatchSummary): void {
  console.log('\n=== Scrape summary ===');
  for (const s of summary.succeeded) {
    console.log(
      `  ✓ ${s.symbol.padEnd(5)} ${s.source.padEnd(14)} found ${s.found}, new ${s.inserted}, updated ${s.updated}`,
    );
  }
  for (const f of summary.failed) {
    console.log(`  ✗ ${f.symbol.padEnd(5)} ${f.errors.map((e) => `${e.source}: ${e.message}`).join(' | ')}`);
  }
  console.log(`\n  ${summary.succeeded.length}/${summary.succeeded.length + summary.failed.length} funds succeeded`);
}

const historyFile = parseOutArg(process.argv.slice(2)) ?? historyFilePath();
const fetchers = createFetchers(config);

try {
  const store = await HistoryStore.open(historyFile);
  const summary = await runScrape({
    funds: getAllFunds(),
    fetchers,
    store,
    delayMs: config.SCRAPE_DELAY_MS,
  });
  await store.close();

  printSummary(summary);
  console.log(`\nHistory written to ${historyFile}`);
} catch (err) {
  logger.fatal({ err }, 'Scrape aborted');
  process.exitCode = 1;
} finally {
  await closeFetchers(fetchers);
}
