import { beforeEach, describe, expect, it } from 'vitest';
import { Sitemap } from '../sitemap';

const page = (path: string, links: string[] = []) => ({
  url: `http://site.test${path}`,
  links,
  assets: [],
});

describe('Sitemap', () => {
  let sitemap: Sitemap;

  beforeEach(() => {
    sitemap = new Sitemap(new URL('http://site.test/'));
  });

  describe('claim', () => {
    it('claims an unknown path once', () => {
      expect(sitemap.claim('/a')).toBe(true);
      expect(sitemap.claim('/a')).toBe(false);
      expect(sitemap.size).toBe(1);
    });

    it('treats trailing-slash variants as the same path', () => {
      expect(sitemap.claim('/a')).toBe(true);
      expect(sitemap.claim('/a/')).toBe(false);
    });

    it('refuses paths that were already stored', () => {
      sitemap.store('/b', page('/b'));
      expect(sitemap.claim('/b')).toBe(false);
    });
  });

  describe('store', () => {
    it('replaces the placeholder', () => {
      sitemap.claim('/a');
      sitemap.store('/a', page('/a', ['http://site.test/']));

      const site = sitemap.snapshot();
      expect(site.pages.get('/a')).toEqual({
        url: 'http://site.test/a',
        links: ['http://site.test/'],
        assets: [],
      });
    });

    it('copies the page so later changes to the input do not leak in', () => {
      const links = ['http://site.test/x'];
      sitemap.store('/a', page('/a', links));
      links.push('http://site.test/y');

      expect(sitemap.snapshot().pages.get('/a')?.links).toEqual(['http://site.test/x']);
    });
  });

  describe('snapshot', () => {
    it('leaves out placeholders that were never filled', () => {
      sitemap.claim('/');
      sitemap.claim('/missing');
      sitemap.store('/', page('/'));

      expect([...sitemap.snapshot().pages.keys()]).toEqual(['/']);
    });

    it('returns frozen records', () => {
      sitemap.store('/', page('/'));
      const site = sitemap.snapshot();

      expect(Object.isFrozen(site)).toBe(true);
      expect(Object.isFrozen(site.pages.get('/'))).toBe(true);
      expect(site.domain.href).toBe('http://site.test/');
    });

    it('seals the sitemap', () => {
      sitemap.snapshot();
      expect(() => sitemap.claim('/late')).toThrow('Sitemap is sealed: the crawl has finished');
      expect(() => sitemap.store('/late', page('/late'))).toThrow('Sitemap is sealed');
    });
  });
});
