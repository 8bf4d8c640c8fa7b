import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';
import { timeAgo } from '@searchgate/shared/src/utils/time.js';
import { truncate } from '@searchgate/shared/src/utils/text.js';

export const SNIPPET_LENGTH = 160;

export interface LocalResultCard {
  readonly title: string;
  readonly type: string;
  readonly link: string;
  readonly age?: string;
  readonly snippet?: string;
}

/**
 * Destination for a local result. Each content type has its own page;
 * videos link straight to their source when the index knows it.
 */
export function localResultLink(result: LocalResult): string {
  switch (result.type) {
    case 'news':
      return `/news?id=${encodeURIComponent(result.id)}`;
    case 'video': {
      const url = result.metadata['url'];
      return typeof url === 'string' && url !== '' ? url : '/video';
    }
    case 'blog':
      return `/post?id=${encodeURIComponent(result.id)}`;
    default:
      return `/${result.type}`;
  }
}

export function toLocalResultCard(result: LocalResult, now: Date = new Date()): LocalResultCard {
  return {
    title: result.title,
    type: result.type,
    link: localResultLink(result),
    age: result.indexedAt ? timeAgo(result.indexedAt, now) : undefined,
    snippet: result.content ? truncate(result.content, SNIPPET_LENGTH) : undefined,
  };
}
