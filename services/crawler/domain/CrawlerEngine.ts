/**
 * CrawlerEngine for handling the core crawling logic
 *
 * A single coordinating loop owns the frontier, the visited set, the page
 * database and the entry list. Fetch tasks only fetch and filter one page
 * and hand their outcome back to the loop, which applies it.
 */

import EventEmitter from 'events';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { IHttpClient, HttpResponse } from '../../../shared/infrastructure/HttpClient.js';
import type { CrawlPolicy } from '../../../shared/domain/models/CrawlPolicy.js';
import type { IndexEntry, PageDb } from '../../../shared/domain/models/Document.js';
import { ContentTypeError, CrawlError, CrawlHttpError, toError } from '../../../shared/domain/errors.js';
import { QueueManager, type QueueItem } from './QueueManager.js';
import { UrlProcessor } from './UrlProcessor.js';
import { RedirectResolver } from './RedirectResolver.js';
import { EntryIndex } from './EntryIndex.js';
import type { RateLimiter } from './RateLimiter.js';
import type { ImageInliner } from './ImageInliner.js';
import type { FilterPipeline } from './filters/FilterPipeline.js';
import type { FilterContext } from './filters/Filter.js';
import { DEFAULT_ENTRY_TYPE } from './filters/EntriesFilter.js';

const logger = getLogger();

/**
 * Crawler configuration
 */
export interface CrawlerEngineConfig {
  /** Maximum fetches in flight */
  maxConcurrency: number;

  /** Stop starting fetches after this many */
  maxPages?: number;

  /** Stops new fetches; in-flight ones complete and the result is still built */
  signal?: AbortSignal;
}

/**
 * What to crawl and how to transform it
 */
export interface CrawlJob {
  policy: CrawlPolicy;
  pipeline: FilterPipeline;
  slug: string;
  rootTitle: string;
  version?: string;
  release?: string;
  attribution?: string;
}

export interface CrawlStats {
  pagesFetched: number;
  pagesStored: number;
  pagesSkipped: number;
  pagesFailed: number;
  redirects: number;
  maxDepthReached: number;
  runtime: number;
}

export interface CrawlResult {
  /** Canonical path to content, redirects applied */
  pages: PageDb;

  /** Unique, naturally sorted entries */
  index: EntryIndex;

  /** Every entry in discovery order, duplicates included */
  entries: IndexEntry[];

  stats: CrawlStats;
}

export type CrawlerEngineEventType =
  | 'page-fetched'
  | 'page-stored'
  | 'page-skipped'
  | 'page-failed'
  | 'crawl-completed';

/**
 * Event interface for crawler engine events
 */
export interface CrawlerEngineEvent {
  type: CrawlerEngineEventType;
  timestamp: Date;
  data: Record<string, unknown>;
}

type FetchOutcome =
  | { kind: 'page'; item: QueueItem; response: HttpResponse; context: FilterContext; entries: IndexEntry[]; links: string[] }
  | { kind: 'rejected'; item: QueueItem; response: HttpResponse; reason: CrawlError }
  | { kind: 'failed'; item: QueueItem; error: Error };

/**
 * State of one crawl, owned by the coordinating loop
 */
interface CrawlRun {
  job: CrawlJob;
  urls: UrlProcessor;
  queue: QueueManager;
  redirects: RedirectResolver;
  pages: PageDb;
  entries: IndexEntry[];
  initialPaths: string[];
  stats: CrawlStats;
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function isHtml(headers: Record<string, string>): boolean {
  const contentType = headers['content-type'];
  return contentType === undefined || contentType.includes('text/html');
}

/**
 * Core engine for crawling process
 */
export class CrawlerEngine {
  /** Event emitter for engine events */
  private eventEmitter = new EventEmitter();

  constructor(
    private readonly httpClient: IHttpClient,
    private readonly rateLimiter: RateLimiter,
    private readonly imageInliner?: ImageInliner
  ) {}

  /**
   * Crawl a site breadth-first and collect its pages and entries
   */
  async crawl(job: CrawlJob, config: CrawlerEngineConfig): Promise<CrawlResult> {
    const startTime = Date.now();
    const urls = new UrlProcessor(job.policy);
    const seeds = urls.seedUrls();
    const run: CrawlRun = {
      job,
      urls,
      queue: new QueueManager(),
      redirects: new RedirectResolver(),
      pages: {},
      entries: [],
      initialPaths: seeds.map(seed => urls.urlToPath(seed)),
      stats: { pagesFetched: 0, pagesStored: 0, pagesSkipped: 0, pagesFailed: 0, redirects: 0, maxDepthReached: 0, runtime: 0 }
    };

    logger.info(`Starting crawl for ${job.slug} (${job.policy.baseUrl})`, 'CrawlerEngine', { seeds, maxConcurrency: config.maxConcurrency });

    for (const seed of seeds) {
      if (urls.shouldProcessUrl(seed)) {
        run.queue.addUrl(seed, 0, '');
      }
    }

    const maxConcurrency = Math.max(1, config.maxConcurrency);
    const maxPages = config.maxPages ?? Number.POSITIVE_INFINITY;
    const inFlight = new Map<number, Promise<{ id: number; outcome: FetchOutcome }>>();
    let nextId = 0;
    let started = 0;

    for (;;) {
      while (inFlight.size < maxConcurrency && started < maxPages && !config.signal?.aborted) {
        const item = run.queue.next();
        if (!item) {
          break;
        }
        if (!run.queue.claim(item.url, item.depth)) {
          continue;
        }

        started++;
        const id = nextId++;
        inFlight.set(id, this.fetchPage(item, run).then(outcome => ({ id, outcome })));
      }

      if (inFlight.size === 0) {
        break;
      }

      const { id, outcome } = await Promise.race(inFlight.values());
      inFlight.delete(id);
      this.handleOutcome(outcome, run);
    }

    if (config.signal?.aborted) {
      logger.info(`Crawl for ${job.slug} was cancelled`, 'CrawlerEngine');
    }

    const pathOf = (url: string) => urls.urlToPath(url);
    const pages = run.redirects.apply(run.pages, pathOf);
    const entries = run.redirects.applyToEntries(run.entries, pathOf);
    const index = new EntryIndex();
    index.addAll(entries);

    run.stats.redirects = run.redirects.size;
    run.stats.maxDepthReached = run.queue.getStats().maxDepthReached;
    run.stats.runtime = Date.now() - startTime;

    logger.info(
      `Crawl completed: ${run.stats.pagesStored} pages stored, ${run.stats.pagesFetched} fetched, ${run.stats.pagesFailed} failed, runtime: ${run.stats.runtime}ms`,
      'CrawlerEngine'
    );
    this.emitEvent('crawl-completed', { slug: job.slug, ...run.stats });

    return { pages, index, entries, stats: { ...run.stats } };
  }

  /**
   * Get the event emitter for engine events
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  /**
   * Fetch and transform one page. Never rejects.
   */
  private async fetchPage(item: QueueItem, run: CrawlRun): Promise<FetchOutcome> {
    try {
      await this.rateLimiter.wait();
      const response = await this.httpClient.get(item.url);

      if (!isSuccess(response.statusCode)) {
        return { kind: 'rejected', item, response, reason: new CrawlHttpError(item.url, response.statusCode) };
      }
      if (!isHtml(response.headers)) {
        return { kind: 'rejected', item, response, reason: new ContentTypeError(item.url, response.headers['content-type'] ?? '') };
      }
      if (!run.urls.baseUrls.some(base => response.effectiveUrl.startsWith(base))) {
        return {
          kind: 'rejected',
          item,
          response,
          reason: new CrawlError(`${item.url} redirected outside the base URLs to ${response.effectiveUrl}`, 'CRAWL_OFFSITE_REDIRECT')
        };
      }

      const context = this.createContext(item, response.body, run);
      const html = run.job.pipeline.run(response.body, context);
      const entries = run.job.pipeline.getEntries(html, context);
      const links = run.urls.extractLinks(html, response.effectiveUrl);

      if (context.inlineImages) {
        if (this.imageInliner) {
          context.content = await this.imageInliner.inline(context.content, context.inlineImages.maxSize);
        } else {
          logger.debug(`No image inliner, keeping image URLs of ${item.url}`, 'CrawlerEngine');
        }
      }

      return { kind: 'page', item, response, context, entries, links };
    } catch (error) {
      return { kind: 'failed', item, error: toError(error) };
    }
  }

  private createContext(item: QueueItem, body: string, run: CrawlRun): FilterContext {
    const { job, urls } = run;
    return {
      url: item.url,
      path: urls.urlToPath(item.url),
      baseUrl: job.policy.baseUrl,
      rootUrl: urls.rootUrl(),
      rootPath: urls.rootPagePath(),
      initialPaths: run.initialPaths,
      slug: job.slug,
      version: job.version,
      release: job.release,
      attribution: job.attribution,
      rootTitle: job.rootTitle,
      originalHtml: body,
      html: body,
      title: '',
      content: '',
      additionalEntries: [],
      urls,
      options: {}
    };
  }

  /**
   * Apply a finished fetch to the crawl state
   */
  private handleOutcome(outcome: FetchOutcome, run: CrawlRun): void {
    const { item } = outcome;

    if (outcome.kind === 'failed') {
      run.stats.pagesFailed++;
      logger.warn(`Error fetching ${item.url}: ${outcome.error.message}`, 'CrawlerEngine');
      this.emitEvent('page-failed', { url: item.url, error: outcome.error.message });
      return;
    }

    run.stats.pagesFetched++;
    const { response } = outcome;
    if (response.effectiveUrl !== item.url) {
      run.redirects.record(item.url, response.effectiveUrl);
      run.queue.markVisited(response.effectiveUrl);
    }

    if (outcome.kind === 'rejected') {
      run.stats.pagesSkipped++;
      logger.debug(`Skipping ${item.url}: ${outcome.reason.message}`, 'CrawlerEngine');
      this.emitEvent('page-skipped', { url: item.url, reason: outcome.reason.errorCode });
      return;
    }

    this.emitEvent('page-fetched', { url: item.url, statusCode: response.statusCode, timeTaken: response.timeTaken });

    let added = 0;
    for (const link of outcome.links) {
      if (run.urls.shouldProcessUrl(link) && run.queue.addUrl(link, item.depth + 1, item.url)) {
        added++;
      }
    }
    if (added > 0) {
      logger.debug(`Added ${added} new links from ${item.url}`, 'CrawlerEngine');
    }

    const { context } = outcome;
    if (!context.content) {
      logger.debug(`Not storing ${item.url}: no content after filtering`, 'CrawlerEngine');
      return;
    }

    run.pages[context.path] = context.content;
    run.stats.pagesStored++;

    const primary = run.job.pipeline.emitsEntries
      ? outcome.entries
      : [{ name: context.title || context.path, path: context.path, type: DEFAULT_ENTRY_TYPE }, ...outcome.entries];
    run.entries.push(...primary, ...context.additionalEntries);

    this.emitEvent('page-stored', { url: item.url, path: context.path, entries: primary.length + context.additionalEntries.length });
  }

  private emitEvent(type: CrawlerEngineEventType, data: Record<string, unknown>): void {
    const event: CrawlerEngineEvent = {
      type,
      timestamp: new Date(),
      data
    };

    this.eventEmitter.emit(type, event);
    this.eventEmitter.emit('event', event);
  }
}
