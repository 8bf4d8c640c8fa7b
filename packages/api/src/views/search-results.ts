import { html } from 'hono/html';
import type { ExternalResult } from '@searchgate/shared/src/types/search.types.js';
import type { LocalResultCard } from '@searchgate/core/src/search/local-result-card.js';
import { renderEmptyNotice, renderPage, renderSearchBar, safeHref, type Html } from './layout.js';

export function renderLocalResults(cards: readonly LocalResultCard[]): Html {
  if (cards.length === 0) {
    return renderEmptyNotice('No local results found.');
  }
  return html`${cards.map(
    (card) => html`<div class="card">
<div><a href="${safeHref(card.link)}" class="card-title">${card.title}</a> <span class="category">${card.type}</span>${card.age ? html` <span class="age">${card.age}</span>` : ''}</div>
${card.snippet ? html`<p class="card-desc">${card.snippet}</p>` : ''}
</div>`,
  )}`;
}

export function renderWebResults(results: readonly ExternalResult[]): Html {
  if (results.length === 0) {
    return renderEmptyNotice('No web results found.');
  }
  return html`${results.map(
    (result) => html`<div class="card">
<div><a href="${safeHref(result.url)}" class="card-title" target="_blank" rel="noopener noreferrer">${result.title}</a></div>
${result.description ? html`<p class="card-desc">${result.description}</p>` : ''}
<div class="card-meta">${result.url}${result.age ? html` · ${result.age}` : ''}</div>
</div>`,
  )}`;
}

function pluralize(n: number): string {
  return n === 1 ? '' : 's';
}

export function renderQuotaExceeded(cost: number): Html {
  return html`<div class="card center-card-md">
<h2>Daily Limit Reached</h2>
<p>You've used your free queries for today.</p>
<h3>Options</h3>
<ul class="options-list">
<li>Wait until midnight UTC for more free queries</li>
<li><a href="/wallet">Use credits</a> (${cost} credit${pluralize(cost)} for this)</li>
<li><a href="/wallet/topup">Add credits</a></li>
</ul>
</div>`;
}

export interface SearchPageOptions {
  readonly action: string;
  readonly placeholder: string;
  /** Empty for the landing page. */
  readonly query: string;
  readonly body: Html;
}

export function renderSearchPage(options: SearchPageOptions): Html {
  const { action, placeholder, query, body } = options;
  return renderPage({
    title: query ? `Search: ${query}` : 'Search',
    description: query ? `Search results for ${query}` : undefined,
    content: html`${renderSearchBar(action, placeholder, query)}
${body}`,
  });
}
