/**
 * URL Normalizer Tests
 */

import { isSameDomain, normalizeLink } from '../url-normalizer';

describe('url-normalizer', () => {
  const base = new URL('https://docs.example.test/guides/start?tab=1');

  describe('normalizeLink', () => {
    it('should resolve relative references against the base', () => {
      expect(normalizeLink(base, 'install')?.href).toBe('https://docs.example.test/guides/install');
      expect(normalizeLink(base, '../about')?.href).toBe('https://docs.example.test/about');
      expect(normalizeLink(base, '/pricing')?.href).toBe('https://docs.example.test/pricing');
    });

    it('should strip the fragment', () => {
      expect(normalizeLink(base, '/faq#accounts')?.href).toBe('https://docs.example.test/faq');
    });

    it('should return identical results for URLs differing only in fragment', () => {
      const variants = ['/faq', '/faq#top', '/faq#section-2', 'https://docs.example.test/faq#x'];
      const results = variants.map((href) => normalizeLink(base, href)?.href);

      expect(new Set(results)).toEqual(new Set(['https://docs.example.test/faq']));
    });

    it('should be idempotent on its own output', () => {
      const candidates = ['install', '/a/b/../c?x=1#frag', 'https://docs.example.test/', '  /spaced  ', '?page=2'];

      for (const candidate of candidates) {
        const first = normalizeLink(base, candidate);
        expect(first).not.toBeNull();
        expect(normalizeLink(base, first?.href)?.href).toBe(first?.href);
      }
    });

    it('should reject non-navigational schemes and pure fragments', () => {
      expect(normalizeLink(base, 'mailto:help@example.test')).toBeNull();
      expect(normalizeLink(base, 'tel:+2340000000')).toBeNull();
      expect(normalizeLink(base, 'javascript:void(0)')).toBeNull();
      expect(normalizeLink(base, 'JavaScript:void(0)')).toBeNull();
      expect(normalizeLink(base, '#main')).toBeNull();
    });

    it('should reject non-http(s) results', () => {
      expect(normalizeLink(base, 'ftp://files.example.test/a.txt')).toBeNull();
      expect(normalizeLink(base, 'data:text/html,hello')).toBeNull();
    });

    it('should reject empty and non-string input', () => {
      expect(normalizeLink(base, '')).toBeNull();
      expect(normalizeLink(base, '   ')).toBeNull();
      expect(normalizeLink(base, null)).toBeNull();
      expect(normalizeLink(base, undefined)).toBeNull();
      expect(normalizeLink(base, 42)).toBeNull();
    });

    it('should return null instead of throwing on unresolvable input', () => {
      expect(() => normalizeLink(base, 'http://[broken')).not.toThrow();
      expect(normalizeLink(base, 'http://[broken')).toBeNull();
    });

    it('should keep the query string', () => {
      expect(normalizeLink(base, '/search?q=loans&page=2')?.href).toBe(
        'https://docs.example.test/search?q=loans&page=2'
      );
    });
  });

  describe('isSameDomain', () => {
    it('should match the exact host', () => {
      expect(isSameDomain(new URL('https://docs.example.test/a'), 'docs.example.test')).toBe(true);
    });

    it('should not fold subdomains', () => {
      expect(isSameDomain(new URL('https://www.docs.example.test/a'), 'docs.example.test')).toBe(false);
      expect(isSameDomain(new URL('https://example.test/a'), 'docs.example.test')).toBe(false);
    });

    it('should treat a different port as a different host', () => {
      expect(isSameDomain(new URL('https://docs.example.test:8443/a'), 'docs.example.test')).toBe(false);
    });

    it('should ignore the scheme', () => {
      expect(isSameDomain(new URL('http://docs.example.test/a'), 'docs.example.test')).toBe(true);
    });
  });
});
