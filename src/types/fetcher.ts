import type { FetchMethod, FetchTarget } from './adapter.js';

/** Retrieves page text for a source target. Fails with FetchError. */
export interface PageFetcher {
  readonly method: FetchMethod;
  fetch(target: FetchTarget): Promise<string>;
  close?(): Promise<void>;
}

export type FetcherSet = Record<FetchMethod, PageFetcher>;
