import { describe, it, expect } from 'vitest';
import { safeHref } from './layout.js';

describe('safeHref', () => {
  it('should keep http, https and site-relative links', () => {
    expect(safeHref('https://example.com/a')).toBe('https://example.com/a');
    expect(safeHref('http://example.com')).toBe('http://example.com');
    expect(safeHref('/post?id=p1')).toBe('/post?id=p1');
  });

  it('should replace other schemes and unparseable values with #', () => {
    expect(safeHref('javascript:alert(1)')).toBe('#');
    expect(safeHref('JavaScript:alert(1)')).toBe('#');
    expect(safeHref('data:text/html,hi')).toBe('#');
    expect(safeHref('//evil.example/x')).toBe('#');
    expect(safeHref('not a url')).toBe('#');
    expect(safeHref('')).toBe('#');
  });
});
