import { describe, it, expect } from 'vitest';
import { canonicalizeUrl } from './canonicalize.js';

describe('canonicalizeUrl', () => {
  it('should lowercase the host and drop www', () => {
    expect(canonicalizeUrl('https://WWW.Books.Example.com/catalogue/a')).toBe('https://books.example.com/catalogue/a');
  });

  it('should strip a trailing slash but keep the root', () => {
    expect(canonicalizeUrl('https://books.example.com/catalogue/a/')).toBe('https://books.example.com/catalogue/a');
    expect(canonicalizeUrl('https://books.example.com/')).toBe('https://books.example.com/');
  });

  it('should drop tracking parameters and the fragment, and sort the rest', () => {
    expect(canonicalizeUrl('https://books.example.com/a?z=1&utm_source=news&a=2#reviews')).toBe(
      'https://books.example.com/a?a=2&z=1'
    );
  });

  it('should keep a non-default port', () => {
    expect(canonicalizeUrl('http://localhost:8080/a')).toBe('http://localhost:8080/a');
  });

  it('should return unparseable input trimmed', () => {
    expect(canonicalizeUrl('  not a url ')).toBe('not a url');
  });
});
