/**
 * Filter contract and shared helpers for page transformation
 *
 * A filter rewrites the HTML of one page and may contribute index entries.
 * Filters are applied in pipeline order and share one FilterContext per page.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { IndexEntry } from '../../../../shared/domain/models/Document.js';
import type { UrlProcessor } from '../UrlProcessor.js';
import { getLogger } from '../../../../shared/infrastructure/logging.js';

const logger = getLogger();

/**
 * Per-page state threaded through the pipeline
 */
export interface FilterContext {
  /** URL the page was requested from */
  url: string;

  /** Canonical path of the requested URL */
  path: string;

  /** Primary base URL of the site */
  baseUrl: string;

  /** URL of the documentation root page */
  rootUrl: string;

  /** Canonical path of the documentation root page */
  rootPath: string;

  /** Canonical paths of the crawl seeds */
  initialPaths: string[];

  slug: string;
  version?: string;
  release?: string;

  /** HTML appended by the attribution filter */
  attribution?: string;

  /** Title used for the root page */
  rootTitle: string;

  /** Page HTML as fetched */
  originalHtml: string;

  /** HTML as transformed so far */
  html: string;

  title: string;

  /** Content to store; left empty, the pipeline falls back to the final HTML */
  content: string;

  /** Entries found besides the page's primary entry, filled in by filters */
  additionalEntries: IndexEntry[];

  /** Set by the images filter when images are to be stored as data: URLs */
  inlineImages?: { maxSize?: number };

  /** Policy of the site being crawled */
  urls: UrlProcessor;

  /** Free-form values filters hand to later filters */
  options: Record<string, unknown>;
}

/**
 * A pipeline stage
 */
export interface Filter {
  /** Name the filter is registered under */
  readonly name: string;

  /** Set by filters that produce the page's primary entry */
  readonly emitsEntries?: boolean;

  /**
   * Transform the page HTML
   */
  apply(html: string, context: FilterContext): string;

  /**
   * Entries derived from the transformed HTML
   */
  getEntries(html: string, context: FilterContext): IndexEntry[];
}

/**
 * Base class for filters with selection helpers that treat malformed
 * selectors as matching nothing
 */
export abstract class BaseFilter implements Filter {
  abstract readonly name: string;

  abstract apply(html: string, context: FilterContext): string;

  getEntries(_html: string, _context: FilterContext): IndexEntry[] {
    return [];
  }

  /**
   * Parse HTML; fragments keep their top-level nodes, documents get html/head/body
   */
  protected parse(html: string, asDocument = false): CheerioAPI {
    return cheerio.load(html, null, asDocument);
  }

  protected css($: CheerioAPI, selector: string): Cheerio<AnyNode> {
    try {
      return $(selector);
    } catch (error) {
      logger.warn(`Invalid selector '${selector}' in ${this.name}`, 'Filter', error);
      const none: AnyNode[] = [];
      return $(none);
    }
  }

  protected atCss($: CheerioAPI, selector: string): Cheerio<AnyNode> {
    return this.css($, selector).first();
  }

  /**
   * Descendants of `scope` matching `selector`
   */
  protected within(scope: Cheerio<AnyNode>, selector: string): Cheerio<AnyNode> {
    try {
      return scope.find(selector);
    } catch (error) {
      logger.warn(`Invalid selector '${selector}' in ${this.name}`, 'Filter', error);
      return scope.slice(0, 0);
    }
  }

  protected isRootPage(context: FilterContext): boolean {
    return context.path === context.rootPath;
  }

  /**
   * Path of the page below the base URL, with a leading slash
   */
  protected subpath(context: FilterContext): string {
    return context.url.startsWith(context.baseUrl)
      ? `/${context.url.slice(context.baseUrl.length).replace(/^\/+/, '')}`
      : new URL(context.url).pathname;
  }
}

export function isFragmentUrl(url: string): boolean {
  return url.startsWith('#');
}

export function isDataUrl(url: string): boolean {
  return url.startsWith('data:');
}
