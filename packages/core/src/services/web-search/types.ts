import type { ExternalResult } from '@searchgate/shared/src/types/search.types.js';

/**
 * Client for an external web-search provider. Rejects with a
 * `WebSearchError` (or `ConfigurationError` when no credential is set);
 * an empty array means the provider found nothing.
 */
export interface WebSearchClient {
  readonly provider: string;
  search(query: string, limit: number): Promise<readonly ExternalResult[]>;
}
