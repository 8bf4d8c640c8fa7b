import { html } from 'hono/html';
import type { HtmlEscapedString } from 'hono/utils/html';

export type Html = HtmlEscapedString | Promise<HtmlEscapedString>;

export interface PageOptions {
  readonly title: string;
  readonly description?: string;
  readonly content: Html;
}

export function renderPage(page: PageOptions): Html {
  return html`<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${page.title}</title>
  ${page.description ? html`<meta name="description" content="${page.description}" />` : ''}
</head>
<body>
  <nav><a href="/search">Search</a> <a href="/web">Web</a> <a href="/tools">Tools</a></nav>
  <main>
    <h1>${page.title}</h1>
    ${page.content}
  </main>
</body>
</html>`;
}

/** The shared query form; `query` is echoed back escaped. */
const LINKABLE_PROTOCOLS = new Set(['http:', 'https:']);

/** Site-relative paths and http(s) URLs pass through; anything else becomes `#`. */
export function safeHref(url: string): string {
  if (url.startsWith('/') && !url.startsWith('//')) {
    return url;
  }
  try {
    return LINKABLE_PROTOCOLS.has(new URL(url).protocol) ? url : '#';
  } catch {
    return '#';
  }
}

export function renderSearchBar(action: string, placeholder: string, query: string): Html {
  return html`<form class="search-bar" action="${action}" method="GET"><input type="text" name="q" placeholder="${placeholder}" value="${query}" autofocus><button type="submit">Search</button></form>`;
}

export function renderEmptyNotice(message: string): Html {
  return html`<p class="empty">${message}</p>`;
}
