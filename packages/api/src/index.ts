import { serve } from '@hono/node-server';
import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import { loadIndexSeed, loadRuntimeConfig, type RuntimeConfig } from '@searchgate/schemas/src/config-loader.js';
import { createJwtAuthenticator } from '@searchgate/core/src/auth/jwt-authenticator.js';
import { createFirestoreClient } from '@searchgate/core/src/infrastructure/firestore-client.js';
import { createFirestoreApiCallRepository } from '@searchgate/core/src/infrastructure/firestore-api-call.repository.js';
import { createFirestoreContentIndexRepository } from '@searchgate/core/src/infrastructure/firestore-content-index.repository.js';
import { createFirestoreWalletRepository } from '@searchgate/core/src/infrastructure/firestore-wallet.repository.js';
import { createInMemoryApiCallRepository } from '@searchgate/core/src/repositories/in-memory-api-call.repository.js';
import { createInMemoryContentIndexRepository } from '@searchgate/core/src/repositories/in-memory-content-index.repository.js';
import { createInMemoryWalletRepository } from '@searchgate/core/src/repositories/in-memory-wallet.repository.js';
import type { ApiCallRepository } from '@searchgate/core/src/repositories/api-call.repository.js';
import type { ContentIndexRepository } from '@searchgate/core/src/repositories/content-index.repository.js';
import type { WalletRepository } from '@searchgate/core/src/repositories/wallet.repository.js';
import { createQuotaGate } from '@searchgate/core/src/quota/quota-gate.js';
import { createBraveWebSearchClient } from '@searchgate/core/src/services/web-search/brave-web-search-client.js';
import { createMockWebSearchClient } from '@searchgate/core/src/services/web-search/mock-web-search-client.js';
import { createSearchOrchestrator } from '@searchgate/core/src/orchestration/search-orchestrator.js';
import { createToolRegistry } from '@searchgate/core/src/tools/tool-registry.js';
import { registerBuiltinTools } from '@searchgate/core/src/tools/builtin-tools.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

interface Repositories {
  readonly contentIndex: ContentIndexRepository;
  readonly walletRepository: WalletRepository;
  readonly apiCallRepository: ApiCallRepository;
}

async function createRepositories(config: RuntimeConfig): Promise<Repositories> {
  if (config.projectId) {
    const db = createFirestoreClient(config.projectId);
    log.info({ projectId: config.projectId }, 'Using Firestore repositories');
    return {
      contentIndex: createFirestoreContentIndexRepository(db),
      walletRepository: createFirestoreWalletRepository(db),
      apiCallRepository: createFirestoreApiCallRepository(db),
    };
  }

  const entries: readonly LocalResult[] = config.indexFile ? await loadIndexSeed(config.indexFile) : [];
  log.info({ indexedEntries: entries.length }, 'Using in-memory repositories');
  return {
    contentIndex: createInMemoryContentIndexRepository(entries),
    walletRepository: createInMemoryWalletRepository(),
    apiCallRepository: createInMemoryApiCallRepository(),
  };
}

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const { contentIndex, walletRepository, apiCallRepository } = await createRepositories(config);

  const webSearchClient = config.mockSearch
    ? createMockWebSearchClient()
    : createBraveWebSearchClient({
        getApiKey: () => process.env['BRAVE_API_KEY'],
        apiCallRepository,
      });

  const authenticator = createJwtAuthenticator({ secret: config.sessionSecret });
  const quotaGate = createQuotaGate(
    { walletRepository },
    { costs: config.creditCosts, freeDailySearches: config.freeDailySearches },
  );

  const searchOrchestrator = createSearchOrchestrator({
    contentIndex,
    authenticator,
    quotaGate,
    webSearchClient,
  });

  const toolRegistry = createToolRegistry();
  registerBuiltinTools(toolRegistry, { searchOrchestrator });

  const app = createApp({
    searchOrchestrator,
    toolRegistry,
    authenticator,
    walletRepository,
    apiCallRepository,
  });

  log.info({ port: config.port }, 'Starting Searchgate server');

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'Searchgate server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start server',
  );
  process.exit(1);
});
