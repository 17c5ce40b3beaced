/**
 * UrlProcessor applies a site's CrawlPolicy to URLs
 *
 * Handles normalization of discovered links, canonical path derivation
 * and the ordered admission checks.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { CrawlPolicy } from '../../../shared/domain/models/CrawlPolicy.js';

const logger = getLogger();

/**
 * URL processing result
 */
export interface ProcessedUrl {
  /** Normalized URL */
  url: string;

  /** Whether the URL was accepted */
  accepted: boolean;

  /** Reason for rejection if not accepted */
  rejectionReason?: string;
}

/**
 * Compile patterns, dropping the ones that are not valid regular expressions
 */
export function compilePatterns(patterns: string[], kind: string): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch {
      logger.warn(`Ignoring invalid ${kind} pattern: ${pattern}`, 'UrlProcessor');
    }
  }
  return compiled;
}

function matchesPathPrefix(path: string, prefixes: string[]): boolean {
  return prefixes.some(p => {
    const prefix = p.replace(/^\/+/, '').replace(/\/+$/, '');
    return path === prefix || path.startsWith(`${prefix}/`);
  });
}

/**
 * Processor for URLs
 */
export class UrlProcessor {
  private readonly bases: string[];
  private readonly skipRegexes: RegExp[];
  private readonly onlyRegexes: RegExp[] | null;

  constructor(private readonly policy: CrawlPolicy) {
    this.bases = [policy.baseUrl, ...(policy.mirrorUrls ?? [])];
    this.skipRegexes = compilePatterns(policy.skipPatterns ?? [], 'skip');
    this.onlyRegexes = policy.onlyPatterns ? compilePatterns(policy.onlyPatterns, 'only') : null;
  }

  /**
   * Primary base URL followed by the mirrors
   */
  get baseUrls(): string[] {
    return [...this.bases];
  }

  /**
   * Every initial path resolved against every base URL, without duplicates
   */
  seedUrls(): string[] {
    const paths = this.policy.initialPaths && this.policy.initialPaths.length > 0
      ? this.policy.initialPaths
      : [this.policy.rootPath ?? ''];

    const seeds: string[] = [];
    for (const base of this.bases) {
      for (const path of paths) {
        const url = this.applyTrailingSlash(this.joinBase(base, path));
        if (!seeds.includes(url)) {
          seeds.push(url);
        }
      }
    }
    return seeds;
  }

  /**
   * Resolve a link found on a page into a crawlable URL.
   * Returns null for links that do not point at an http(s) document.
   */
  normalizeUrl(href: string, pageUrl: string): string | null {
    let resolved: URL;
    try {
      resolved = new URL(href.trim(), pageUrl);
    } catch {
      return null;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }

    resolved.hash = '';
    return this.applyTrailingSlash(this.replacePath(resolved.toString()));
  }

  /**
   * Rewrite a URL whose canonical path is listed in replacePaths
   */
  replacePath(url: string): string {
    const replacements = this.policy.replacePaths;
    if (!replacements) {
      return url;
    }

    const base = this.matchingBase(url);
    if (!base) {
      return url;
    }

    const replacement = replacements[this.urlToPath(url)];
    return replacement === undefined ? url : this.joinBase(base, replacement);
  }

  /**
   * Append a slash to directory-like URLs when the policy asks for it
   */
  applyTrailingSlash(url: string): string {
    if (!this.policy.trailingSlash) {
      return url;
    }

    try {
      const parsed = new URL(url);
      const lastSegment = parsed.pathname.split('/').pop() ?? '';
      if (!parsed.pathname.endsWith('/') && !lastSegment.includes('.')) {
        parsed.pathname = `${parsed.pathname}/`;
      }
      return parsed.toString();
    } catch {
      return url;
    }
  }

  /**
   * Canonical path of a URL: the part after the matching base URL without
   * leading slashes, query or fragment; "index" for the base itself
   */
  urlToPath(url: string): string {
    const base = this.matchingBase(url);
    let rest: string;

    if (base) {
      rest = url.slice(base.length);
    } else {
      try {
        rest = new URL(url).pathname;
      } catch {
        return 'unknown';
      }
    }

    rest = rest.split('#')[0].split('?')[0].replace(/^\/+/, '');
    return rest === '' ? 'index' : rest;
  }

  /**
   * URL of the documentation root page
   */
  rootUrl(): string {
    return this.applyTrailingSlash(this.joinBase(this.policy.baseUrl, this.policy.rootPath ?? ''));
  }

  /**
   * Canonical path of the documentation root page
   */
  rootPagePath(): string {
    return this.urlToPath(this.rootUrl());
  }

  /**
   * Normalized targets of every a[href] in the HTML, in document order, without duplicates
   */
  extractLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html, null, false);
    const links: string[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href');
      const url = href === undefined ? null : this.normalizeUrl(href, pageUrl);
      if (url !== null && !links.includes(url)) {
        links.push(url);
      }
    });

    return links;
  }

  /**
   * Map a URL on a mirror onto the primary base URL
   */
  toPrimaryUrl(url: string): string {
    const base = this.matchingBase(url);
    if (!base || base === this.policy.baseUrl) {
      return url;
    }
    return this.policy.baseUrl + url.slice(base.length);
  }

  /**
   * Run the admission checks in order: base URL membership, skip predicate,
   * skip paths, skip patterns, allow paths, allow patterns
   */
  processUrl(url: string): ProcessedUrl {
    if (!this.matchingBase(url)) {
      return { url, accepted: false, rejectionReason: 'Outside base URLs' };
    }

    if (this.policy.skipLink) {
      try {
        if (this.policy.skipLink(url)) {
          return { url, accepted: false, rejectionReason: 'Rejected by skip predicate' };
        }
      } catch (error) {
        logger.warn(`Skip predicate failed for ${url}`, 'UrlProcessor', error);
      }
    }

    const path = this.urlToPath(url);

    if (this.policy.skipPaths && matchesPathPrefix(path, this.policy.skipPaths)) {
      return { url, accepted: false, rejectionReason: 'Matches skip paths' };
    }

    if (this.skipRegexes.some(regex => regex.test(path))) {
      return { url, accepted: false, rejectionReason: 'Matches skip patterns' };
    }

    if (this.policy.onlyPaths && !matchesPathPrefix(path, this.policy.onlyPaths)) {
      return { url, accepted: false, rejectionReason: 'Not in allowed paths' };
    }

    if (this.onlyRegexes && !this.onlyRegexes.some(regex => regex.test(path))) {
      return { url, accepted: false, rejectionReason: 'Does not match allowed patterns' };
    }

    return { url, accepted: true };
  }

  shouldProcessUrl(url: string): boolean {
    const result = this.processUrl(url);
    if (!result.accepted) {
      logger.debug(`Rejected ${url}: ${result.rejectionReason}`, 'UrlProcessor');
    }
    return result.accepted;
  }

  private matchingBase(url: string): string | undefined {
    return this.bases.find(base => url.startsWith(base));
  }

  private joinBase(base: string, path: string): string {
    if (/^https?:\/\//.test(path)) {
      return path;
    }
    const prefix = base.endsWith('/') ? base : `${base}/`;
    return prefix + path.replace(/^\/+/, '');
  }
}
