import type { ExternalResult, LocalResult } from '@searchgate/shared/src/types/search.types.js';

export type LocalSearchOutcome =
  | { readonly kind: 'empty' }
  | { readonly kind: 'bad_request'; readonly message: string }
  | { readonly kind: 'local_results'; readonly query: string; readonly results: readonly LocalResult[] };

export type WebSearchOutcome =
  | { readonly kind: 'empty' }
  | { readonly kind: 'bad_request'; readonly message: string }
  | { readonly kind: 'unauthorized' }
  | {
      readonly kind: 'quota_exceeded';
      readonly query: string;
      readonly cost: number;
      readonly remaining: number;
      readonly reason?: string;
    }
  | { readonly kind: 'unavailable'; readonly query: string }
  | { readonly kind: 'web_results'; readonly query: string; readonly results: readonly ExternalResult[] };
