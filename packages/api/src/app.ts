import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Authenticator } from '@searchgate/core/src/auth/authenticator.js';
import type { SearchOrchestrator } from '@searchgate/core/src/orchestration/search-orchestrator.js';
import type { ApiCallRepository } from '@searchgate/core/src/repositories/api-call.repository.js';
import type { WalletRepository } from '@searchgate/core/src/repositories/wallet.repository.js';
import type { ToolRegistry } from '@searchgate/core/src/tools/types.js';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { respondError } from './middleware/negotiation.js';
import { API_VERSION, health } from './routes/health.js';
import { createSearchRoutes, createWebSearchRoutes } from './routes/search.js';
import { createToolRoutes } from './routes/tools.js';
import { createAdminRoutes } from './routes/admin.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly searchOrchestrator: SearchOrchestrator;
  readonly toolRegistry: ToolRegistry;
  readonly authenticator: Authenticator;
  readonly walletRepository: WalletRepository;
  readonly apiCallRepository: ApiCallRepository;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);
  app.notFound((c) => respondError(c, 404, 'NOT_FOUND', 'Not found'));

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Searchgate API',
        version: API_VERSION,
        description: 'Local and metered web search with a content-negotiated tool registry',
      },
      security: [{ Bearer: [] }],
    });
    spec.components = {
      ...spec.components,
      securitySchemes: {
        Bearer: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
    };
    return c.json(spec);
  });

  app.route('/search', createSearchRoutes(config));
  app.route('/web', createWebSearchRoutes(config));
  app.route('/tools', createToolRoutes(config));
  app.route('/admin', createAdminRoutes(config));

  return app;
}
