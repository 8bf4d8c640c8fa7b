import { html } from 'hono/html';
import type { ToolDefinition } from '@searchgate/core/src/tools/types.js';
import { toolParameters, type ToolCategoryView } from '@searchgate/core/src/tools/tool-view.js';
import { renderPage, type Html } from './layout.js';

function renderParamSummary(tool: ToolDefinition): Html | string {
  const params = toolParameters(tool);
  if (params.length === 0) {
    return '';
  }
  return html`<ul class="params">${params.map(
    (param) => html`<li><code>${param.name}${param.required ? '*' : ''}</code> <span class="type">${param.type}</span> ${param.description}</li>`,
  )}</ul>`;
}

export function renderToolList(
  categories: readonly ToolCategoryView[],
  toolCount: number,
  categoryCount: number,
): Html {
  return renderPage({
    title: 'Tools',
    description: 'Tool registry',
    content: html`<p class="text-muted">Tools available to the site and its agents.</p>
${categories.map(
  (category) => html`<h3>${category.name}</h3>
<div class="card-list">${category.tools.map(
    (tool) => html`<div class="card"><div class="card-title"><a href="/tools/${encodeURIComponent(tool.name)}">${tool.name}</a></div><div class="card-desc">${tool.description}</div>${renderParamSummary(tool)}</div>`,
  )}</div>`,
)}
<p class="text-muted">${toolCount} tools across ${categoryCount} categories</p>`,
  });
}

export function renderToolDetail(tool: ToolDefinition): Html {
  const params = toolParameters(tool);
  const table =
    params.length === 0
      ? html`<p class="text-muted">No parameters</p>`
      : html`<h3>Parameters</h3>
<table class="data-table"><thead><tr><th>Name</th><th>Type</th><th>Required</th><th>Description</th></tr></thead><tbody>${params.map(
          (param) => html`<tr><td><code>${param.name}</code></td><td>${param.type}</td><td>${param.required ? 'yes' : 'no'}</td><td>${param.description}</td></tr>`,
        )}</tbody></table>`;

  return renderPage({
    title: tool.name,
    description: tool.description,
    content: html`<p class="text-muted">Category: ${tool.category}</p>
<p>${tool.description}</p>
${table}
<p><a href="/tools">← Back to tools</a></p>`,
  });
}
