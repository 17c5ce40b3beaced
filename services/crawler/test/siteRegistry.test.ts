import { describe, it, expect } from 'vitest';
import { SiteRegistry, bundledSitesDir, toCrawlPolicy } from '../sites/SiteRegistry.js';
import { FilterRegistry } from '../domain/filters/FilterRegistry.js';
import { UrlProcessor } from '../domain/UrlProcessor.js';
import { ConfigurationError, SiteNotFoundError } from '../../../shared/domain/errors.js';

const minimalSite = {
  name: 'Example',
  slug: 'example',
  type: 'example',
  rootTitle: 'Example',
  policy: { baseUrl: 'https://docs.example.com/' },
  filters: [{ name: 'clean-html' }]
};

describe('SiteRegistry', () => {
  it('loads the bundled site definitions', async () => {
    const registry = new SiteRegistry();

    expect(await registry.load(bundledSitesDir())).toBe(5);
    expect(registry.list().map(site => site.slug)).toEqual(['babel', 'css', 'html', 'javascript', 'typescript']);
  });

  it('builds a crawl job for every bundled site', async () => {
    const registry = new SiteRegistry();
    await registry.load(bundledSitesDir());
    const filters = FilterRegistry.withDefaults();

    for (const site of registry.list()) {
      const job = registry.toCrawlJob(site.slug, filters);
      expect(job.pipeline.size).toBe(site.filters.length);
      expect(new UrlProcessor(job.policy).seedUrls().length).toBeGreaterThan(0);
    }
  });

  it('turns the babel definition into its crawl policy', async () => {
    const registry = new SiteRegistry();
    await registry.load(bundledSitesDir());

    const job = registry.toCrawlJob('babel', FilterRegistry.withDefaults());
    const urls = new UrlProcessor(job.policy);

    expect(job.slug).toBe('babel~7');
    expect(job.pipeline.names()).toEqual(['clean-html', 'normalize-urls', 'images', 'title', 'entries', 'attribution']);
    expect(urls.shouldProcessUrl('https://babeljs.io/docs/babel-parser/')).toBe(true);
    expect(urls.shouldProcessUrl('https://babeljs.io/docs/usage/')).toBe(false);
    expect(urls.shouldProcessUrl('https://babeljs.io/docs/en/babel-parser/')).toBe(false);
    expect(registry.toDescriptor('babel')).toEqual({
      name: 'Babel',
      slug: 'babel',
      type: 'babel',
      version: '7',
      release: '7.21.4',
      links: { home: 'https://babeljs.io/', code: 'https://github.com/babel/babel' }
    });
  });

  it('refuses invalid definitions', () => {
    const registry = new SiteRegistry();

    expect(() => registry.register({ ...minimalSite, slug: 'Not A Slug' })).toThrow(ConfigurationError);
    expect(() => registry.register({ ...minimalSite, filters: [] })).toThrow(ConfigurationError);
    expect(() => registry.register({ ...minimalSite, policy: { baseUrl: 'https://docs.example.com/', skipPatterns: ['('] } }))
      .toThrow(ConfigurationError);
    expect(() => registry.register({ ...minimalSite, policy: { baseUrl: 'https://docs.example.com/', follow: true } }))
      .toThrow(ConfigurationError);
  });

  it('reports unknown slugs', () => {
    const registry = new SiteRegistry();
    registry.register(minimalSite);

    expect(registry.has('example')).toBe(true);
    expect(() => registry.get('missing')).toThrow(SiteNotFoundError);
  });

  it('reads a directory that does not exist as a configuration error', async () => {
    await expect(new SiteRegistry().load('/nonexistent/dochive-sites')).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('toCrawlPolicy', () => {
  it('turns skipLinkContains into a predicate', () => {
    const policy = toCrawlPolicy({ baseUrl: 'https://docs.example.com/', skipLinkContains: ['/legacy/'] });

    expect(policy.skipLink?.('https://docs.example.com/legacy/a')).toBe(true);
    expect(policy.skipLink?.('https://docs.example.com/current/a')).toBe(false);
  });

  it('leaves out the predicate when nothing is skipped', () => {
    expect(toCrawlPolicy({ baseUrl: 'https://docs.example.com/' }).skipLink).toBeUndefined();
  });
});
