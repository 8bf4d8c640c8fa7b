import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { createTestApp } from '../test-helpers.js';
import type { AppEnv } from '../types.js';

describe('Local search route', () => {
  let app: Hono<AppEnv>;

  beforeEach(() => {
    ({ app } = createTestApp({
      entries: [
        {
          id: 'p1',
          type: 'blog',
          title: 'Harbour walk',
          content: 'Along the <b>harbour</b> wall',
          metadata: {},
        },
        { id: 'v1', type: 'video', title: 'Tides', metadata: { url: 'https://video.example/tides' } },
        { id: 'v2', type: 'video', title: 'Sneaky clip', metadata: { url: 'javascript:alert(1)' } },
      ],
    }));
  });

  describe('GET /search', () => {
    it('should render the empty state without a query', async () => {
      const res = await app.request('/search');

      expect(res.status).toBe(200);
      const body = await res.text();
      expect(body).toContain('<title>Search</title>');
      expect(body).toContain('<p class="empty">Enter a query above to search.</p>');
    });

    it('should render a card per local result', async () => {
      const res = await app.request('/search?q=harbour');

      expect(res.status).toBe(200);
      const body = await res.text();
      expect(body).toContain('<title>Search: harbour</title>');
      expect(body).toContain(
        '<a href="/post?id=p1" class="card-title">Harbour walk</a> <span class="category">blog</span>',
      );
      expect(body).toContain('<p class="card-desc">Along the &lt;b&gt;harbour&lt;/b&gt; wall</p>');
    });

    it('should link videos to their source url', async () => {
      const body = await (await app.request('/search?q=tides')).text();
      expect(body).toContain('<a href="https://video.example/tides" class="card-title">Tides</a>');
    });

    it('should not link to non-http source urls', async () => {
      const body = await (await app.request('/search?q=sneaky')).text();
      expect(body).toContain('<a href="#" class="card-title">Sneaky clip</a>');
      expect(body).not.toContain('javascript:');
    });

    it('should render no results', async () => {
      const body = await (await app.request('/search?q=lighthouse')).text();
      expect(body).toContain('<p class="empty">No local results found.</p>');
    });

    it('should escape the query wherever it is echoed', async () => {
      const q = encodeURIComponent('<script>alert(1)</script>');
      const body = await (await app.request(`/search?q=${q}`)).text();

      expect(body).toContain('value="&lt;script&gt;alert(1)&lt;/script&gt;"');
      expect(body).toContain('<title>Search: &lt;script&gt;alert(1)&lt;/script&gt;</title>');
      expect(body).not.toContain('<script>alert(1)</script>');
    });

    it('should reject an over-long query as JSON', async () => {
      const res = await app.request(`/search?q=${'a'.repeat(257)}`, {
        headers: { Accept: 'application/json', 'X-Request-Id': 'req-1' },
      });

      expect(res.status).toBe(400);
      expect(res.headers.get('X-Request-Id')).toBe('req-1');
      expect(await res.json()).toEqual({
        error: 'Search query must not exceed 256 characters',
        code: 'BAD_REQUEST',
        requestId: 'req-1',
      });
    });

    it('should reject an over-long query as an HTML page', async () => {
      const res = await app.request(`/search?q=${'a'.repeat(257)}`);

      expect(res.status).toBe(400);
      expect(res.headers.get('Content-Type')).toContain('text/html');
      expect(await res.text()).toContain('<p class="error">Search query must not exceed 256 characters</p>');
    });
  });
});
