import { html } from 'hono/html';
import { renderPage, type Html } from './layout.js';

const TITLES: Readonly<Record<number, string>> = {
  400: 'Bad request',
  401: 'Authentication required',
  403: 'Forbidden',
  404: 'Not found',
  500: 'Internal server error',
};

export function renderErrorPage(status: number, message: string): Html {
  return renderPage({
    title: TITLES[status] ?? 'Error',
    content: html`<p class="error">${message}</p>`,
  });
}
