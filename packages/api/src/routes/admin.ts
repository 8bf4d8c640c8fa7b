import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ApiCallRecord } from '@searchgate/shared/src/types/api-call.types.js';
import type { ApiCallRepository } from '@searchgate/core/src/repositories/api-call.repository.js';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { createAdminMiddleware, type AdminMiddlewareDeps } from '../middleware/admin.js';
import { wantsJson } from '../middleware/negotiation.js';
import { renderApiLog } from '../views/api-log.js';
import { ApiLogQuerySchema } from '../schemas/requests.js';
import { ApiLogResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';

const log = createChildLogger('api:admin');

const apiLogRoute = createRoute({
  method: 'get',
  path: '/api-log',
  tags: ['Admin'],
  summary: 'Recent outbound API calls, newest first',
  request: { query: ApiLogQuerySchema },
  responses: {
    200: {
      description: 'Recorded calls',
      content: { 'application/json': { schema: ApiLogResponseSchema } },
    },
    401: {
      description: 'No valid session',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
    403: {
      description: 'Session is not an admin',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

export interface AdminRouteDeps extends AdminMiddlewareDeps {
  readonly apiCallRepository: ApiCallRepository;
}

function toResponse(record: ApiCallRecord): Omit<ApiCallRecord, 'recordedAt'> & { recordedAt: string } {
  return { ...record, recordedAt: record.recordedAt.toISOString() };
}

export function createAdminRoutes(deps: AdminRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openAPIRegistry.registerPath(apiLogRoute);
  routes.use('*', createAdminMiddleware(deps));

  routes.get('/api-log', async (c) => {
    const { limit } = ApiLogQuerySchema.parse({ limit: c.req.query('limit') });
    const records = await deps.apiCallRepository.list(limit);
    log.debug({ accountId: c.get('account').accountId, count: records.length }, 'Served API log');

    if (wantsJson(c)) {
      return c.json({ calls: records.map(toResponse), count: records.length });
    }
    return c.html(renderApiLog(records));
  });

  return routes;
}
