import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Account } from '@searchgate/shared/src/types/wallet.types.js';
import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';
import { createJwtAuthenticator, signSessionToken } from '@searchgate/core/src/auth/jwt-authenticator.js';
import { createInMemoryApiCallRepository } from '@searchgate/core/src/repositories/in-memory-api-call.repository.js';
import { createInMemoryContentIndexRepository } from '@searchgate/core/src/repositories/in-memory-content-index.repository.js';
import { createInMemoryWalletRepository } from '@searchgate/core/src/repositories/in-memory-wallet.repository.js';
import type { ApiCallRepository } from '@searchgate/core/src/repositories/api-call.repository.js';
import type { WalletRepository } from '@searchgate/core/src/repositories/wallet.repository.js';
import { createQuotaGate } from '@searchgate/core/src/quota/quota-gate.js';
import type { WebSearchClient } from '@searchgate/core/src/services/web-search/types.js';
import { createMockWebSearchClient } from '@searchgate/core/src/services/web-search/mock-web-search-client.js';
import { createSearchOrchestrator } from '@searchgate/core/src/orchestration/search-orchestrator.js';
import { createToolRegistry } from '@searchgate/core/src/tools/tool-registry.js';
import { registerBuiltinTools } from '@searchgate/core/src/tools/builtin-tools.js';
import type { ToolRegistry } from '@searchgate/core/src/tools/types.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_SESSION_SECRET = 'test-secret';

export interface TestAppOptions {
  readonly entries?: readonly LocalResult[];
  readonly accounts?: readonly Account[];
  readonly webSearchClient?: WebSearchClient;
  readonly freeDailySearches?: number;
}

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly walletRepository: WalletRepository;
  readonly apiCallRepository: ApiCallRepository;
  readonly toolRegistry: ToolRegistry;
  sessionToken(accountId: string): Promise<string>;
}

/**
 * Wires the real app against in-memory collaborators and the mock web
 * search client. For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const walletRepository = createInMemoryWalletRepository(options.accounts);
  const apiCallRepository = createInMemoryApiCallRepository();
  const authenticator = createJwtAuthenticator({ secret: TEST_SESSION_SECRET });

  const searchOrchestrator = createSearchOrchestrator({
    contentIndex: createInMemoryContentIndexRepository(options.entries),
    authenticator,
    quotaGate: createQuotaGate(
      { walletRepository },
      { costs: { web_search: 5 }, freeDailySearches: options.freeDailySearches ?? 0 },
    ),
    webSearchClient: options.webSearchClient ?? createMockWebSearchClient(),
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

  return {
    app,
    walletRepository,
    apiCallRepository,
    toolRegistry,
    sessionToken: (accountId) => signSessionToken(TEST_SESSION_SECRET, accountId),
  };
}
