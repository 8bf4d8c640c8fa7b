import { ToolError } from '@searchgate/shared/src/utils/errors.js';
import type { SearchOrchestrator } from '../orchestration/search-orchestrator.js';
import { localResultLink } from '../search/local-result-card.js';
import type { ToolRegistry } from './types.js';

export interface BuiltinToolDeps {
  readonly searchOrchestrator: SearchOrchestrator;
}

export function registerBuiltinTools(registry: ToolRegistry, deps: BuiltinToolDeps): void {
  registry.register({
    name: 'search.local',
    description: 'Search the local content index',
    category: 'search',
    input: {
      query: { type: 'string', description: 'Search terms', required: true },
    },
    output: {
      results: { type: 'array', description: 'Matching entries with their links', required: true },
    },
    path: '/search',
    method: 'GET',
    handler: async (params) => {
      const query = typeof params['query'] === 'string' ? params['query'] : '';
      const outcome = await deps.searchOrchestrator.searchLocal(query);
      switch (outcome.kind) {
        case 'empty':
          return { results: [] };
        case 'bad_request':
          throw new ToolError(outcome.message);
        case 'local_results':
          return {
            results: outcome.results.map((result) => ({
              id: result.id,
              type: result.type,
              title: result.title,
              link: localResultLink(result),
            })),
          };
      }
    },
  });
}
