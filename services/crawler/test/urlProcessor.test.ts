import { describe, it, expect } from 'vitest';
import { UrlProcessor } from '../domain/UrlProcessor.js';

const BASE = 'https://docs.example.com/docs/';

describe('UrlProcessor', () => {
  describe('urlToPath', () => {
    const urls = new UrlProcessor({ baseUrl: BASE });

    it('strips the base URL, query and fragment', () => {
      expect(urls.urlToPath(`${BASE}parser/?tab=1#options`)).toBe('parser/');
      expect(urls.urlToPath(`${BASE}guides/intro`)).toBe('guides/intro');
    });

    it('names the base itself index', () => {
      expect(urls.urlToPath(BASE)).toBe('index');
      expect(urls.rootPagePath()).toBe('index');
    });

    it('falls back to the pathname outside the base URLs', () => {
      expect(urls.urlToPath('https://other.example.com/a/b')).toBe('a/b');
    });
  });

  describe('processUrl', () => {
    it('rejects URLs outside every base URL', () => {
      const urls = new UrlProcessor({ baseUrl: BASE });
      expect(urls.processUrl('https://other.example.com/docs/')).toEqual({
        url: 'https://other.example.com/docs/',
        accepted: false,
        rejectionReason: 'Outside base URLs'
      });
    });

    it('accepts URLs on a mirror', () => {
      const urls = new UrlProcessor({ baseUrl: BASE, mirrorUrls: ['https://mirror.example.com/docs/'] });
      expect(urls.shouldProcessUrl('https://mirror.example.com/docs/cli')).toBe(true);
    });

    it('runs the skip predicate before the path checks', () => {
      const urls = new UrlProcessor({
        baseUrl: BASE,
        skipLink: url => url.includes('/legacy/'),
        skipPaths: ['legacy']
      });
      expect(urls.processUrl(`${BASE}legacy/page`).rejectionReason).toBe('Rejected by skip predicate');
    });

    it('skips listed paths and everything below them', () => {
      const urls = new UrlProcessor({ baseUrl: BASE, skipPaths: ['/guides/'] });
      expect(urls.processUrl(`${BASE}guides`).rejectionReason).toBe('Matches skip paths');
      expect(urls.processUrl(`${BASE}guides/intro`).rejectionReason).toBe('Matches skip paths');
      expect(urls.processUrl(`${BASE}guidesx`).accepted).toBe(true);
    });

    it('matches skip patterns against the canonical path', () => {
      const urls = new UrlProcessor({ baseUrl: BASE, trailingSlash: true, skipPatterns: ['usage/.*'] });
      expect(urls.processUrl(`${BASE}usage/`).rejectionReason).toBe('Matches skip patterns');
      expect(urls.processUrl(`${BASE}usage/options/`).rejectionReason).toBe('Matches skip patterns');
      expect(urls.processUrl(`${BASE}babel-parser/`).accepted).toBe(true);
    });

    it('drops invalid patterns and keeps the valid ones', () => {
      const urls = new UrlProcessor({ baseUrl: BASE, skipPatterns: ['(', '^old'] });
      expect(urls.processUrl(`${BASE}old-api`).rejectionReason).toBe('Matches skip patterns');
      expect(urls.processUrl(`${BASE}api`).accepted).toBe(true);
    });

    it('keeps only allowed paths and patterns', () => {
      const byPath = new UrlProcessor({ baseUrl: BASE, onlyPaths: ['api'] });
      expect(byPath.processUrl(`${BASE}api/array`).accepted).toBe(true);
      expect(byPath.processUrl(`${BASE}guide`).rejectionReason).toBe('Not in allowed paths');

      const byPattern = new UrlProcessor({ baseUrl: BASE, onlyPatterns: ['^api/'] });
      expect(byPattern.processUrl(`${BASE}api/array`).accepted).toBe(true);
      expect(byPattern.processUrl(`${BASE}guide`).rejectionReason).toBe('Does not match allowed patterns');
    });
  });

  describe('normalizeUrl', () => {
    const urls = new UrlProcessor({ baseUrl: BASE, trailingSlash: true });

    it('resolves relative links and drops the fragment', () => {
      expect(urls.normalizeUrl('../parser#api', `${BASE}usage/`)).toBe(`${BASE}parser/`);
    });

    it('leaves file-like paths without a trailing slash', () => {
      expect(urls.normalizeUrl('/docs/bundle.js#top', `${BASE}usage/`)).toBe(`${BASE}bundle.js`);
    });

    it('ignores links that are not http(s)', () => {
      expect(urls.normalizeUrl('mailto:team@example.com', BASE)).toBeNull();
      expect(urls.normalizeUrl('javascript:void(0)', BASE)).toBeNull();
    });

    it('rewrites replaced paths', () => {
      const replacing = new UrlProcessor({
        baseUrl: 'https://docs.example.com/ref/',
        replacePaths: { old_name: 'New_name' }
      });
      expect(replacing.normalizeUrl('old_name', 'https://docs.example.com/ref/')).toBe('https://docs.example.com/ref/New_name');
    });
  });

  it('seeds every initial path on every base URL', () => {
    const urls = new UrlProcessor({
      baseUrl: 'https://a.example.com/docs/',
      mirrorUrls: ['https://b.example.com/docs/'],
      initialPaths: ['', 'api']
    });
    expect(urls.seedUrls()).toEqual([
      'https://a.example.com/docs/',
      'https://a.example.com/docs/api',
      'https://b.example.com/docs/',
      'https://b.example.com/docs/api'
    ]);
    expect(urls.toPrimaryUrl('https://b.example.com/docs/api')).toBe('https://a.example.com/docs/api');
  });

  it('extracts each link target once', () => {
    const urls = new UrlProcessor({ baseUrl: BASE, trailingSlash: true });
    const html = '<p><a href="guide">Guide</a> <a href="guide#setup">Setup</a> <a href="mailto:team@example.com">Mail</a> <a>None</a></p>';
    expect(urls.extractLinks(html, BASE)).toEqual([`${BASE}guide/`]);
  });
});
