import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';

export interface ContentIndexRepository {
  /**
   * Returns up to `limit` entries matching `query`, most relevant first.
   * Ranking is up to the implementation.
   */
  search(query: string, limit: number): Promise<readonly LocalResult[]>;
  upsert(entry: LocalResult): Promise<void>;
}
