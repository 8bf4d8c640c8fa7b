import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';
import type { ContentIndexRepository } from './content-index.repository.js';

const TITLE_WEIGHT = 3;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function countOccurrences(haystack: readonly string[], needle: string): number {
  return haystack.filter((token) => token === needle).length;
}

function score(entry: LocalResult, terms: readonly string[]): number {
  const titleTokens = tokenize(entry.title);
  const contentTokens = tokenize(entry.content ?? '');
  let total = 0;
  for (const term of terms) {
    total +=
      TITLE_WEIGHT * countOccurrences(titleTokens, term) + countOccurrences(contentTokens, term);
  }
  return total;
}

export function createInMemoryContentIndexRepository(
  initialEntries: readonly LocalResult[] = [],
): ContentIndexRepository {
  const entries = new Map<string, LocalResult>();
  for (const entry of initialEntries) {
    entries.set(entry.id, entry);
  }

  return {
    search(query: string, limit: number): Promise<readonly LocalResult[]> {
      const terms = [...new Set(tokenize(query))];
      if (terms.length === 0) {
        return Promise.resolve([]);
      }

      const ranked = [...entries.values()]
        .map((entry) => ({ entry, score: score(entry, terms) }))
        .filter((hit) => hit.score > 0)
        .sort((a, b) => {
          if (b.score !== a.score) {
            return b.score - a.score;
          }
          return (b.entry.indexedAt?.getTime() ?? 0) - (a.entry.indexedAt?.getTime() ?? 0);
        });

      return Promise.resolve(ranked.slice(0, limit).map((hit) => hit.entry));
    },

    upsert(entry: LocalResult): Promise<void> {
      entries.set(entry.id, entry);
      return Promise.resolve();
    },
  };
}
