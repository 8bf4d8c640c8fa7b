import { createChildLogger } from '@searchgate/shared/src/logger.js';
import type { ExternalResult } from '@searchgate/shared/src/types/search.types.js';
import type { WebSearchClient } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_RESULTS: readonly ExternalResult[] = [
  {
    title: 'Mock result one',
    url: 'https://example.com/one',
    description: 'A canned web result for local development.',
    age: '1 day ago',
  },
  {
    title: 'Mock result two',
    url: 'https://example.com/two',
    description: '',
    age: '',
  },
];

export function createMockWebSearchClient(
  responses?: Map<string, readonly ExternalResult[]>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    provider: 'mock',

    search(query: string, limit: number): Promise<readonly ExternalResult[]> {
      log.debug({ query }, 'Mock web search');

      const results = responses?.get(query) ?? DEFAULT_RESULTS;
      return Promise.resolve(results.slice(0, limit));
    },
  };
}
