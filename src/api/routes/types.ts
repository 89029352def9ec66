import type { HistoryStore } from '../../store/history-store.js';

/** Passed to every route plugin. Each call re-reads the history file. */
export interface RouteDeps {
  loadHistory: () => Promise<HistoryStore>;
}
