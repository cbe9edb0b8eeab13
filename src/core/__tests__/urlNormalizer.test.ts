import { describe, expect, it } from 'vitest';
import {
  applyDefaultScheme,
  getPageKey,
  isHttpUrl,
  isSameHost,
  normalizePath,
  normalizeUrl,
  parseUrl,
  resolveUrl,
} from '../urlNormalizer';

describe('urlNormalizer', () => {
  describe('applyDefaultScheme', () => {
    it('adds http:// to a bare host', () => {
      expect(applyDefaultScheme('example.com')).toBe('http://example.com');
    });

    it('uses the given scheme', () => {
      expect(applyDefaultScheme('example.com/a', 'https')).toBe('https://example.com/a');
    });

    it('leaves absolute URLs alone', () => {
      expect(applyDefaultScheme('  https://example.com/a ')).toBe('https://example.com/a');
    });

    it('completes protocol-relative URLs', () => {
      expect(applyDefaultScheme('//cdn.example.com/x')).toBe('http://cdn.example.com/x');
    });
  });

  describe('normalizeUrl', () => {
    it('lowercases the host, drops the fragment and the trailing slash', () => {
      expect(normalizeUrl('HTTP://Example.COM/About/#team')?.href).toBe('http://example.com/About');
    });

    it('keeps the root slash', () => {
      expect(normalizeUrl('http://example.com')?.href).toBe('http://example.com/');
    });

    it('returns null for malformed input', () => {
      expect(normalizeUrl('not a url')).toBeNull();
    });
  });

  describe('normalizePath', () => {
    it.each([
      ['', '/'],
      ['/', '/'],
      ['//', '/'],
      ['/a/b/', '/a/b'],
      ['a', '/a'],
    ])('normalizes "%s" to "%s"', (input, expected) => {
      expect(normalizePath(input)).toBe(expected);
    });
  });

  describe('resolveUrl', () => {
    it('resolves relative paths against the base', () => {
      expect(resolveUrl('../c', 'http://h.test/a/b/')?.href).toBe('http://h.test/a/c');
    });

    it('returns null when the link is malformed', () => {
      expect(resolveUrl('http://[bad', 'http://h.test/')).toBeNull();
    });
  });

  describe('parseUrl', () => {
    it('keeps the trailing slash', () => {
      expect(parseUrl('/root/', 'http://h.test/x')?.href).toBe('http://h.test/root/');
    });
  });

  describe('host checks', () => {
    it('treats a different port as a different host', () => {
      expect(isSameHost(new URL('http://h.test:8080/'), new URL('http://h.test/'))).toBe(false);
    });

    it('ignores the scheme when comparing hosts', () => {
      expect(isSameHost(new URL('https://h.test/a'), new URL('http://h.test/'))).toBe(true);
    });

    it('accepts only http(s)', () => {
      expect(isHttpUrl(new URL('https://h.test/'))).toBe(true);
      expect(isHttpUrl(new URL('mailto:someone@h.test'))).toBe(false);
    });
  });

  describe('getPageKey', () => {
    it('uses the normalized path without query or fragment', () => {
      expect(getPageKey('http://h.test/a/?q=1#x')).toBe('/a');
    });

    it('returns null for malformed URLs', () => {
      expect(getPageKey('::')).toBeNull();
    });
  });
});
