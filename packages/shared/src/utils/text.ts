export const ELLIPSIS = '…';

export function codePointLength(value: string): number {
  let count = 0;
  for (const _ of value) {
    count++;
  }
  return count;
}

/**
 * Shortens `value` to at most `max` code points, appending an ellipsis when
 * anything was cut. Surrogate pairs are never split.
 */
export function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  if (chars.length <= max) {
    return value;
  }
  return chars.slice(0, max).join('') + ELLIPSIS;
}
