import type { ExternalResult } from '@searchgate/shared/src/types/search.types.js';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import { SearchgateError, toError } from '@searchgate/shared/src/utils/errors.js';
import type { Authenticator, RequestCredentials } from '../auth/authenticator.js';
import type { QuotaGate } from '../quota/quota-gate.js';
import type { ContentIndexRepository } from '../repositories/content-index.repository.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { QUERY_TOO_LONG_MESSAGE, parseQuery } from '../search/query.js';
import type { LocalSearchOutcome, WebSearchOutcome } from './search-outcome.js';

const log = createChildLogger('orchestration:search');

export const LOCAL_RESULT_LIMIT = 10;
export const WEB_RESULT_LIMIT = 10;

export interface SearchOrchestratorDeps {
  readonly contentIndex: ContentIndexRepository;
  readonly authenticator: Authenticator;
  readonly quotaGate: QuotaGate;
  readonly webSearchClient: WebSearchClient;
}

export interface SearchOrchestrator {
  searchLocal(rawQuery: string | undefined): Promise<LocalSearchOutcome>;
  searchWeb(rawQuery: string | undefined, credentials: RequestCredentials): Promise<WebSearchOutcome>;
}

function errorCode(error: Error): string {
  return error instanceof SearchgateError ? error.code : 'UNKNOWN';
}

export function createSearchOrchestrator(deps: SearchOrchestratorDeps): SearchOrchestrator {
  const { contentIndex, authenticator, quotaGate, webSearchClient } = deps;

  return {
    async searchLocal(rawQuery: string | undefined): Promise<LocalSearchOutcome> {
      const parsed = parseQuery(rawQuery);
      if (parsed.kind === 'empty') {
        return { kind: 'empty' };
      }
      if (parsed.kind === 'too_long') {
        return { kind: 'bad_request', message: QUERY_TOO_LONG_MESSAGE };
      }

      const results = await contentIndex.search(parsed.query, LOCAL_RESULT_LIMIT);
      log.debug({ query: parsed.query, resultCount: results.length }, 'Local search completed');
      return { kind: 'local_results', query: parsed.query, results };
    },

    async searchWeb(rawQuery: string | undefined, credentials: RequestCredentials): Promise<WebSearchOutcome> {
      const parsed = parseQuery(rawQuery);
      if (parsed.kind === 'too_long') {
        return { kind: 'bad_request', message: QUERY_TOO_LONG_MESSAGE };
      }
      if (parsed.kind === 'empty') {
        return { kind: 'empty' };
      }
      const { query } = parsed;

      const session = await authenticator.authenticate(credentials);
      if (!session) {
        return { kind: 'unauthorized' };
      }
      const { accountId } = session;

      const decision = await quotaGate.check(accountId, 'web_search');
      if (!decision.allowed) {
        log.info({ accountId, cost: decision.cost, reason: decision.reason }, 'Web search blocked by quota');
        return {
          kind: 'quota_exceeded',
          query,
          cost: decision.cost,
          remaining: decision.remaining,
          reason: decision.reason,
        };
      }

      let results: readonly ExternalResult[];
      try {
        results = await webSearchClient.search(query, WEB_RESULT_LIMIT);
      } catch (error) {
        const err = toError(error);
        log.error(
          { accountId, provider: webSearchClient.provider, code: errorCode(err), err: err.message },
          'Web search failed',
        );
        return { kind: 'unavailable', query };
      }

      try {
        await quotaGate.consume(accountId, 'web_search');
      } catch (error) {
        const err = toError(error);
        log.warn({ accountId, code: errorCode(err), err: err.message }, 'Failed to charge for web search');
      }

      log.info({ accountId, resultCount: results.length }, 'Web search completed');
      return { kind: 'web_results', query, results };
    },
  };
}
