import { html } from 'hono/html';
import type { ApiCallRecord } from '@searchgate/shared/src/types/api-call.types.js';
import { timeAgo } from '@searchgate/shared/src/utils/time.js';
import { renderEmptyNotice, renderPage, type Html } from './layout.js';

function renderRow(record: ApiCallRecord, now: Date): Html {
  const status = record.status === 0 ? 'n/a' : String(record.status);
  return html`<tr><td>${timeAgo(record.recordedAt, now)}</td><td>${record.provider}</td><td>${record.method}</td><td><code>${record.url}</code></td><td>${status}</td><td>${record.durationMs} ms</td><td>${record.error ?? ''}</td></tr>`;
}

export function renderApiLog(records: readonly ApiCallRecord[], now: Date = new Date()): Html {
  const content =
    records.length === 0
      ? renderEmptyNotice('No API calls recorded yet.')
      : html`<table class="data-table"><thead><tr><th>When</th><th>Provider</th><th>Method</th><th>URL</th><th>Status</th><th>Duration</th><th>Error</th></tr></thead><tbody>${records.map((record) => renderRow(record, now))}</tbody></table>`;

  return renderPage({
    title: 'API Log',
    description: 'Outbound API calls, newest first',
    content: html`<p class="text-muted">${records.length} calls</p>
${content}`,
  });
}
