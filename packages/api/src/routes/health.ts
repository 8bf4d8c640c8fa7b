import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const API_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  security: [],
  responses: {
    200: {
      description: 'Service is healthy',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

const health = createRouter();

health.openapi(healthRoute, (c) => {
  return c.json({ status: 'ok', version: API_VERSION }, 200);
});

export { health };
