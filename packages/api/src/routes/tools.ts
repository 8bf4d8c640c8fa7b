import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Context } from 'hono';
import { ToolError, toError } from '@searchgate/shared/src/utils/errors.js';
import type { ToolRegistry } from '@searchgate/core/src/tools/types.js';
import { buildToolsView, type ToolsView } from '@searchgate/core/src/tools/tool-view.js';
import { createRouter, type AppEnv } from '../types.js';
import { respondError, wantsJson } from '../middleware/negotiation.js';
import { renderErrorPage } from '../views/error-page.js';
import { renderToolDetail, renderToolList } from '../views/tools.js';
import { ToolCallRequestSchema, ToolNameParamsSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ToolCallResponseSchema,
  ToolListResponseSchema,
  ToolResponseSchema,
} from '../schemas/responses.js';

export const TOOL_NOT_FOUND_MESSAGE = 'tool not found';

const listToolsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Tools'],
  summary: 'List registered tools',
  description: 'Send `Accept: application/json` for JSON; anything else gets the HTML listing.',
  security: [],
  responses: {
    200: {
      description: 'All tools, sorted by name',
      content: { 'application/json': { schema: ToolListResponseSchema } },
    },
  },
});

const getToolRoute = createRoute({
  method: 'get',
  path: '/{name}',
  tags: ['Tools'],
  summary: 'Get a tool by name',
  security: [],
  request: { params: ToolNameParamsSchema },
  responses: {
    200: {
      description: 'Tool definition',
      content: { 'application/json': { schema: ToolResponseSchema } },
    },
    404: {
      description: 'Tool not found',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

const callToolRoute = createRoute({
  method: 'post',
  path: '/{name}',
  tags: ['Tools'],
  summary: 'Call a tool',
  security: [],
  request: {
    params: ToolNameParamsSchema,
    body: { content: { 'application/json': { schema: ToolCallRequestSchema } } },
  },
  responses: {
    200: {
      description: 'Tool result',
      content: { 'application/json': { schema: ToolCallResponseSchema } },
    },
    400: {
      description: 'Missing or invalid parameters',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
    404: {
      description: 'Tool not found',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

export interface ToolRouteDeps {
  readonly toolRegistry: ToolRegistry;
}

function respondJson(c: Context<AppEnv>, view: ToolsView): Response | Promise<Response> {
  switch (view.kind) {
    case 'list':
      return c.json({ tools: view.tools, count: view.tools.length });
    case 'detail':
      return c.json(view.tool);
    case 'not_found':
      return respondError(c, 404, 'TOOL_NOT_FOUND', TOOL_NOT_FOUND_MESSAGE);
  }
}

function respondHtml(c: Context<AppEnv>, view: ToolsView): Response | Promise<Response> {
  switch (view.kind) {
    case 'list':
      return c.html(renderToolList(view.categories, view.tools.length, view.categoryCount));
    case 'detail':
      return c.html(renderToolDetail(view.tool));
    case 'not_found':
      return c.html(renderErrorPage(404, 'Tool not found'), 404);
  }
}

async function readJsonBody(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ToolError('Request body must be valid JSON', toError(error));
  }
}

/**
 * Listing and detail are content negotiated, so they are plain routes with
 * their JSON shape registered for the OpenAPI document.
 */
export function createToolRoutes(deps: ToolRouteDeps): OpenAPIHono<AppEnv> {
  const { toolRegistry } = deps;
  const routes = createRouter();

  routes.openAPIRegistry.registerPath(listToolsRoute);
  routes.openAPIRegistry.registerPath(getToolRoute);
  routes.openAPIRegistry.registerPath(callToolRoute);

  const respond = (c: Context<AppEnv>, view: ToolsView): Response | Promise<Response> =>
    wantsJson(c) ? respondJson(c, view) : respondHtml(c, view);

  routes.get('/', (c) => respond(c, buildToolsView(toolRegistry)));

  routes.get('/:name', (c) => respond(c, buildToolsView(toolRegistry, c.req.param('name'))));

  routes.post('/:name', async (c) => {
    const name = c.req.param('name');
    if (!toolRegistry.get(name)) {
      return respondError(c, 404, 'TOOL_NOT_FOUND', TOOL_NOT_FOUND_MESSAGE);
    }

    const params = ToolCallRequestSchema.parse(await readJsonBody(c));
    const result = await toolRegistry.call(name, params);
    return c.json({ tool: name, result });
  });

  return routes;
}
