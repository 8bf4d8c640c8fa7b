import { z } from 'zod';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import type { ExternalResult } from '@searchgate/shared/src/types/search.types.js';
import {
  ConfigurationError,
  ProviderHttpError,
  ProviderResponseError,
  ProviderTransportError,
  toError,
} from '@searchgate/shared/src/utils/errors.js';
import { truncate } from '@searchgate/shared/src/utils/text.js';
import type { ApiCallRepository, RecordApiCallInput } from '../../repositories/api-call.repository.js';
import type { WebSearchClient } from './types.js';

const log = createChildLogger('web-search:brave');

export const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';
export const DEFAULT_TIMEOUT_MS = 10_000;
export const MAX_RESULT_COUNT = 20;
const MAX_RECORDED_BODY_LENGTH = 1024;
const PROVIDER = 'brave';

const BraveWebResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  description: z.string().nullish(),
  age: z.string().nullish(),
});

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(BraveWebResultSchema).nullish(),
    })
    .nullish(),
});

export interface BraveWebSearchClientConfig {
  /** Read on every call so the key can change without a restart. */
  readonly getApiKey: () => string | undefined;
  readonly apiCallRepository: ApiCallRepository;
  readonly fetch?: typeof fetch;
  readonly timeoutMs?: number;
  readonly baseUrl?: string;
}

export function clampResultCount(limit: number): number {
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_RESULT_COUNT);
}

export function buildSearchUrl(baseUrl: string, query: string, count: number): string {
  return `${baseUrl}?q=${encodeURIComponent(query)}&count=${String(count)}`;
}

function parseResults(body: string, status: number): ExternalResult[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ProviderResponseError(
      `Provider returned invalid JSON: ${toError(error).message}`,
      status,
      toError(error),
    );
  }

  const parsed = BraveResponseSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ProviderResponseError(`Provider returned an unexpected payload: ${details}`, status);
  }

  return (parsed.data.web?.results ?? []).map((r) => ({
    title: r.title ?? '',
    url: r.url ?? '',
    description: r.description ?? '',
    age: r.age ?? '',
  }));
}

export function createBraveWebSearchClient(config: BraveWebSearchClientConfig): WebSearchClient {
  const fetchFn = config.fetch ?? globalThis.fetch;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const baseUrl = config.baseUrl ?? BRAVE_SEARCH_URL;

  async function recordCall(input: Omit<RecordApiCallInput, 'provider' | 'method'>): Promise<void> {
    try {
      await config.apiCallRepository.record({ provider: PROVIDER, method: 'GET', ...input });
    } catch (error) {
      log.warn({ error: toError(error).message, url: input.url }, 'Failed to record API call');
    }
  }

  return {
    provider: PROVIDER,

    async search(query: string, limit: number): Promise<readonly ExternalResult[]> {
      const count = clampResultCount(limit);
      const url = buildSearchUrl(baseUrl, query, count);

      const apiKey = config.getApiKey();
      if (!apiKey) {
        const error = new ConfigurationError('BRAVE_API_KEY is not set');
        await recordCall({ url, status: 0, durationMs: 0, error: error.message });
        throw error;
      }

      log.debug({ count }, 'Executing web search');

      const start = Date.now();
      let response: Response;
      try {
        response = await fetchFn(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            'X-Subscription-Token': apiKey,
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        const cause = toError(error);
        const wrapped = new ProviderTransportError(`Web search request failed: ${cause.message}`, cause);
        await recordCall({ url, status: 0, durationMs: Date.now() - start, error: wrapped.message });
        throw wrapped;
      }

      const status = response.status;
      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        const cause = toError(error);
        const wrapped = new ProviderResponseError(
          `Failed to read provider response: ${cause.message}`,
          status,
          cause,
        );
        await recordCall({ url, status, durationMs: Date.now() - start, error: wrapped.message });
        throw wrapped;
      }
      const durationMs = Date.now() - start;
      const responseBody = truncate(body, MAX_RECORDED_BODY_LENGTH);

      if (status < 200 || status >= 300) {
        const error = new ProviderHttpError(status, responseBody);
        await recordCall({ url, status, durationMs, error: error.message, responseBody });
        throw error;
      }

      let results: ExternalResult[];
      try {
        results = parseResults(body, status);
      } catch (error) {
        await recordCall({ url, status, durationMs, error: toError(error).message, responseBody });
        throw error;
      }

      await recordCall({ url, status, durationMs, responseBody });
      log.debug({ resultCount: results.length, durationMs }, 'Web search completed');

      return results.slice(0, count);
    },
  };
}
