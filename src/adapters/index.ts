import type { SourceAdapter, SourceId } from '../types/adapter.js';
import { StockAnalysisAdapter } from './stockanalysis.js';
import { NasdaqAdapter } from './nasdaq.js';
import { NasdaqWebAdapter } from './nasdaq-web.js';

const adapters: Map<SourceId, SourceAdapter> = new Map();

function register(adapter: SourceAdapter): void {
  adapters.set(adapter.config.id, adapter);
}

register(new StockAnalysisAdapter());
register(new NasdaqAdapter());
register(new NasdaqWebAdapter());

export function getAdapter(id: SourceId): SourceAdapter {
  const adapter = adapters.get(id);
  if (!adapter) throw new Error(`Unknown adapter: ${id}`);
  return adapter;
}

export function getAllAdapters(): SourceAdapter[] {
  return Array.from(adapters.values());
}
