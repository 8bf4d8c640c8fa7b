import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import {
  ConfigurationError,
  ProviderHttpError,
  ProviderResponseError,
  ProviderTransportError,
} from '@searchgate/shared/src/utils/errors.js';
import { createInMemoryApiCallRepository } from '../../repositories/in-memory-api-call.repository.js';
import type { ApiCallRepository } from '../../repositories/api-call.repository.js';
import {
  buildSearchUrl,
  clampResultCount,
  createBraveWebSearchClient,
} from './brave-web-search-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const braveBody = {
  web: {
    results: [
      {
        title: 'Harbour news',
        url: 'https://news.example.com/harbour',
        description: 'The harbour reopened.',
        age: '2 days ago',
      },
      { title: 'Harbour map', url: 'https://maps.example.com/harbour' },
    ],
  },
};

describe('buildSearchUrl', () => {
  it('should percent-encode the query and append the count', () => {
    expect(buildSearchUrl('https://api.example.com/search', 'harbour & pier', 10)).toBe(
      'https://api.example.com/search?q=harbour%20%26%20pier&count=10',
    );
  });
});

describe('clampResultCount', () => {
  it('should keep counts within 1..20', () => {
    expect(clampResultCount(0)).toBe(1);
    expect(clampResultCount(10)).toBe(10);
    expect(clampResultCount(50)).toBe(20);
  });
});

describe('BraveWebSearchClient', () => {
  let apiCalls: ApiCallRepository;
  let fetchMock: Mock<typeof fetch>;
  let apiKey: string | undefined;

  function createClient(): ReturnType<typeof createBraveWebSearchClient> {
    return createBraveWebSearchClient({
      getApiKey: () => apiKey,
      apiCallRepository: apiCalls,
      fetch: fetchMock,
    });
  }

  beforeEach(() => {
    apiCalls = createInMemoryApiCallRepository();
    fetchMock = vi.fn<typeof fetch>();
    apiKey = 'test-key';
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should map provider results and fill missing fields with empty strings', async () => {
    fetchMock.mockResolvedValue(jsonResponse(braveBody));

    const results = await createClient().search('harbour', 10);

    expect(results).toEqual([
      {
        title: 'Harbour news',
        url: 'https://news.example.com/harbour',
        description: 'The harbour reopened.',
        age: '2 days ago',
      },
      { title: 'Harbour map', url: 'https://maps.example.com/harbour', description: '', age: '' },
    ]);
  });

  it('should map null provider fields to empty strings', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        web: {
          results: [{ title: 'Harbour tides', url: 'https://tides.example.com', description: null, age: null }],
        },
      }),
    );

    const results = await createClient().search('harbour', 10);

    expect(results).toEqual([
      { title: 'Harbour tides', url: 'https://tides.example.com', description: '', age: '' },
    ]);
  });

  it('should treat a null web section or result list as no results', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ web: null }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ web: { results: null } }));
    const client = createClient();

    expect(await client.search('nothing', 10)).toEqual([]);
    expect(await client.search('nothing', 10)).toEqual([]);
  });

  it('should send a single GET with the subscription token and a timeout signal', async () => {
    fetchMock.mockResolvedValue(jsonResponse(braveBody));

    await createClient().search('harbour', 5);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.search.brave.com/res/v1/web/search?q=harbour&count=5');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'X-Subscription-Token': 'test-key',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should read the API key on every call', async () => {
    fetchMock.mockResolvedValue(jsonResponse(braveBody));
    const client = createClient();

    apiKey = undefined;
    await expect(client.search('harbour', 10)).rejects.toThrow(ConfigurationError);

    apiKey = 'test-key';
    fetchMock.mockResolvedValue(jsonResponse(braveBody));
    await expect(client.search('harbour', 10)).resolves.toHaveLength(2);
  });

  it('should truncate results to the requested count', async () => {
    fetchMock.mockResolvedValue(jsonResponse(braveBody));

    const results = await createClient().search('harbour', 1);

    expect(results).toHaveLength(1);
    expect(results[0].title).toBe('Harbour news');
  });

  it('should treat an empty result list as success', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ web: { results: [] } }));

    expect(await createClient().search('nothing', 10)).toEqual([]);
  });

  it('should treat a payload without a web section as no results', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ query: { original: 'nothing' } }));

    expect(await createClient().search('nothing', 10)).toEqual([]);
  });

  it('should record a successful call with status and duration', async () => {
    vi.spyOn(Date, 'now').mockReturnValueOnce(1_000).mockReturnValueOnce(1_250);
    fetchMock.mockResolvedValue(jsonResponse(braveBody));

    await createClient().search('harbour', 10);

    const records = await apiCalls.list();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      provider: 'brave',
      method: 'GET',
      url: 'https://api.search.brave.com/res/v1/web/search?q=harbour&count=10',
      status: 200,
      durationMs: 250,
    });
    expect(records[0].error).toBeUndefined();
    expect(records[0].responseBody).toBe(JSON.stringify(braveBody));
  });

  describe('failures', () => {
    it('should fail with ConfigurationError and record status 0 when no key is set', async () => {
      apiKey = undefined;

      await expect(createClient().search('harbour', 10)).rejects.toThrow(ConfigurationError);

      expect(fetchMock).not.toHaveBeenCalled();
      const records = await apiCalls.list();
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ status: 0, durationMs: 0, error: 'BRAVE_API_KEY is not set' });
    });

    it('should wrap transport errors once without retrying', async () => {
      fetchMock.mockRejectedValue(new Error('The operation was aborted due to timeout'));

      const promise = createClient().search('harbour', 10);

      await expect(promise).rejects.toThrow(ProviderTransportError);
      await expect(promise).rejects.toThrow(
        'Web search request failed: The operation was aborted due to timeout',
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const records = await apiCalls.list();
      expect(records).toHaveLength(1);
      expect(records[0].status).toBe(0);
      expect(records[0].error).toBe(
        'Web search request failed: The operation was aborted due to timeout',
      );
    });

    it('should report an unreadable body as a response error with the HTTP status', async () => {
      const response = new Response('{}', { status: 200 });
      vi.spyOn(response, 'text').mockRejectedValue(new Error('socket hang up'));
      fetchMock.mockResolvedValue(response);

      const error = await createClient()
        .search('harbour', 10)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderResponseError);
      expect((error as ProviderResponseError).message).toBe(
        'Failed to read provider response: socket hang up',
      );
      const [record] = await apiCalls.list();
      expect(record.status).toBe(200);
      expect(record.error).toBe('Failed to read provider response: socket hang up');
    });

    it('should surface non-2xx status and body', async () => {
      fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));

      const error = await createClient()
        .search('harbour', 10)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderHttpError);
      const httpError = error as ProviderHttpError;
      expect(httpError.status).toBe(429);
      expect(httpError.body).toBe('rate limited');
      expect(httpError.message).toBe('Provider responded with HTTP 429: rate limited');

      const records = await apiCalls.list();
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ status: 429, responseBody: 'rate limited' });
    });

    it('should truncate long error bodies in the record', async () => {
      fetchMock.mockResolvedValue(new Response('x'.repeat(2000), { status: 500 }));

      await expect(createClient().search('harbour', 10)).rejects.toThrow(ProviderHttpError);

      const [record] = await apiCalls.list();
      expect(record.responseBody).toBe('x'.repeat(1024) + '…');
    });

    it('should report malformed JSON after recording the HTTP status', async () => {
      fetchMock.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

      const error = await createClient()
        .search('harbour', 10)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderResponseError);
      expect((error as ProviderResponseError).status).toBe(200);
      const [record] = await apiCalls.list();
      expect(record.status).toBe(200);
      expect(record.error).toMatch(/^Provider returned invalid JSON: /);
    });

    it('should reject structurally invalid payloads', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ web: { results: 'not-a-list' } }));

      await expect(createClient().search('harbour', 10)).rejects.toThrow(ProviderResponseError);
      const [record] = await apiCalls.list();
      expect(record.error).toMatch(/^Provider returned an unexpected payload: web\.results: /);
    });

    it('should still return results when recording fails', async () => {
      fetchMock.mockResolvedValue(jsonResponse(braveBody));
      const failing: ApiCallRepository = {
        record: vi.fn().mockRejectedValue(new Error('log store down')),
        list: vi.fn().mockResolvedValue([]),
      };

      const client = createBraveWebSearchClient({
        getApiKey: () => 'test-key',
        apiCallRepository: failing,
        fetch: fetchMock,
      });

      await expect(client.search('harbour', 10)).resolves.toHaveLength(2);
      expect(failing.record).toHaveBeenCalledTimes(1);
    });
  });
});
