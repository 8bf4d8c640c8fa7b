import { html } from 'hono/html';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { SearchOrchestrator } from '@searchgate/core/src/orchestration/search-orchestrator.js';
import { toLocalResultCard } from '@searchgate/core/src/search/local-result-card.js';
import { createRouter, type AppEnv } from '../types.js';
import { readCredentials, respondError } from '../middleware/negotiation.js';
import { renderEmptyNotice } from '../views/layout.js';
import {
  renderLocalResults,
  renderQuotaExceeded,
  renderSearchPage,
  renderWebResults,
} from '../views/search-results.js';

export interface SearchRouteDeps {
  readonly searchOrchestrator: SearchOrchestrator;
}

const UNAUTHORIZED_MESSAGE = 'Authentication required';

export function createSearchRoutes(deps: SearchRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.get('/', async (c) => {
    const page = { action: '/search', placeholder: 'Search the site...' };
    const outcome = await deps.searchOrchestrator.searchLocal(c.req.query('q'));

    switch (outcome.kind) {
      case 'bad_request':
        return respondError(c, 400, 'BAD_REQUEST', outcome.message);
      case 'empty':
        return c.html(
          renderSearchPage({ ...page, query: '', body: renderEmptyNotice('Enter a query above to search.') }),
        );
      case 'local_results': {
        const now = new Date();
        const cards = outcome.results.map((result) => toLocalResultCard(result, now));
        return c.html(
          renderSearchPage({
            ...page,
            query: outcome.query,
            body: html`<h3>Local Results</h3>${renderLocalResults(cards)}`,
          }),
        );
      }
    }
  });

  return routes;
}

export function createWebSearchRoutes(deps: SearchRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.get('/', async (c) => {
    const page = { action: '/web', placeholder: 'Search the web...' };
    const outcome = await deps.searchOrchestrator.searchWeb(c.req.query('q'), readCredentials(c));

    switch (outcome.kind) {
      case 'bad_request':
        return respondError(c, 400, 'BAD_REQUEST', outcome.message);
      case 'unauthorized':
        return respondError(c, 401, 'UNAUTHORIZED', UNAUTHORIZED_MESSAGE);
      case 'empty':
        return c.html(
          renderSearchPage({ ...page, query: '', body: renderEmptyNotice('Enter a query above to search the web.') }),
        );
      case 'quota_exceeded':
        return c.html(renderSearchPage({ ...page, query: outcome.query, body: renderQuotaExceeded(outcome.cost) }));
      case 'unavailable':
        return c.html(
          renderSearchPage({
            ...page,
            query: outcome.query,
            body: html`<h3>On the Web</h3>${renderEmptyNotice('Web search unavailable.')}`,
          }),
        );
      case 'web_results':
        return c.html(
          renderSearchPage({
            ...page,
            query: outcome.query,
            body: html`<h3>On the Web</h3>${renderWebResults(outcome.results)}`,
          }),
        );
    }
  });

  return routes;
}
