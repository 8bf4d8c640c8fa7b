import { codePointLength } from '@searchgate/shared/src/utils/text.js';

export const MAX_QUERY_LENGTH = 256;
export const QUERY_TOO_LONG_MESSAGE = `Search query must not exceed ${String(MAX_QUERY_LENGTH)} characters`;

export type ParsedQuery =
  | { readonly kind: 'empty' }
  | { readonly kind: 'too_long'; readonly length: number }
  | { readonly kind: 'valid'; readonly query: string };

export function parseQuery(raw: string | undefined): ParsedQuery {
  const query = (raw ?? '').trim();
  if (query === '') {
    return { kind: 'empty' };
  }
  const length = codePointLength(query);
  if (length > MAX_QUERY_LENGTH) {
    return { kind: 'too_long', length };
  }
  return { kind: 'valid', query };
}
