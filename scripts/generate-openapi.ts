import { createApp } from '../packages/api/src/app.js';
import { createJwtAuthenticator } from '../packages/core/src/auth/jwt-authenticator.js';
import { createInMemoryApiCallRepository } from '../packages/core/src/repositories/in-memory-api-call.repository.js';
import { createInMemoryContentIndexRepository } from '../packages/core/src/repositories/in-memory-content-index.repository.js';
import { createInMemoryWalletRepository } from '../packages/core/src/repositories/in-memory-wallet.repository.js';
import { createQuotaGate } from '../packages/core/src/quota/quota-gate.js';
import { createMockWebSearchClient } from '../packages/core/src/services/web-search/mock-web-search-client.js';
import { createSearchOrchestrator } from '../packages/core/src/orchestration/search-orchestrator.js';
import { createToolRegistry } from '../packages/core/src/tools/tool-registry.js';
import { registerBuiltinTools } from '../packages/core/src/tools/builtin-tools.js';
import { API_VERSION } from '../packages/api/src/routes/health.js';

// The document only depends on the routes, so in-memory collaborators will do.
const walletRepository = createInMemoryWalletRepository();
const authenticator = createJwtAuthenticator({ secret: 'openapi-only' });
const searchOrchestrator = createSearchOrchestrator({
  contentIndex: createInMemoryContentIndexRepository(),
  authenticator,
  quotaGate: createQuotaGate({ walletRepository }),
  webSearchClient: createMockWebSearchClient(),
});
const toolRegistry = createToolRegistry();
registerBuiltinTools(toolRegistry, { searchOrchestrator });

const app = createApp({
  searchOrchestrator,
  toolRegistry,
  authenticator,
  walletRepository,
  apiCallRepository: createInMemoryApiCallRepository(),
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Searchgate API',
    version: API_VERSION,
    description: 'Local and metered web search with a content-negotiated tool registry',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
  security: [{ Bearer: [] }],
});

doc.components = {
  ...doc.components,
  securitySchemes: {
    Bearer: {
      type: 'http',
      scheme: 'bearer',
      bearerFormat: 'JWT',
    },
  },
};

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
