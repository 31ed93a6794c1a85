import { describe, it, expect } from 'vitest';
import { canonicalizeUrl, extractDomain, isDomainMatch } from './canonicalize.js';

describe('canonicalizeUrl', () => {
  it('drops www, the fragment and a trailing slash', () => {
    expect(canonicalizeUrl('https://WWW.Shop.Example.test/parts/#reviews')).toBe('https://shop.example.test/parts');
  });

  it('keeps the root path slash', () => {
    expect(canonicalizeUrl('https://shop.example.test')).toBe('https://shop.example.test/');
  });

  it('removes tracking parameters and sorts the rest', () => {
    expect(canonicalizeUrl('https://shop.example.test/p?utm_source=x&b=2&a=1&gclid=abc')).toBe(
      'https://shop.example.test/p?a=1&b=2'
    );
  });

  it('keeps a non-default port', () => {
    expect(canonicalizeUrl('http://localhost:8080/a/')).toBe('http://localhost:8080/a');
  });

  it('returns null for relative or invalid URLs', () => {
    expect(canonicalizeUrl('/relative/path')).toBeNull();
    expect(canonicalizeUrl('not a url')).toBeNull();
  });
});

describe('domain helpers', () => {
  it('extracts the host without www', () => {
    expect(extractDomain('https://www.shop.example.test/x')).toBe('shop.example.test');
    expect(extractDomain('nope')).toBe('');
  });

  it('treats www and bare hosts as the same domain', () => {
    expect(isDomainMatch('https://www.shop.example.test/a', 'shop.example.test')).toBe(true);
    expect(isDomainMatch('https://shop.example.test/a', 'www.shop.example.test')).toBe(true);
    expect(isDomainMatch('https://cdn.example.test/a', 'shop.example.test')).toBe(false);
  });
});
