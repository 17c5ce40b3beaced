/**
 * ScraperService runs one site's crawl and persists the result
 *
 * It ties the site registry, the filter registry, the crawler engine and the
 * doc store together. Each scrape gets its own engine; engines share the
 * HTTP client and rate limiter. Crawl events are re-emitted with the slug.
 */

import EventEmitter from 'events';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { DocMeta } from '../../../shared/domain/models/Document.js';
import { CrawlError } from '../../../shared/domain/errors.js';
import type { SiteDefinition, SiteRegistry } from '../sites/SiteRegistry.js';
import type { CrawlerEngine, CrawlerEngineEvent, CrawlStats } from './CrawlerEngine.js';
import type { FilterRegistry } from './filters/FilterRegistry.js';
import type { StorageManager } from './StorageManager.js';

const logger = getLogger();

/**
 * Settings of one scrape
 */
export interface ScrapeSettings {
  /** Slug of the site to scrape */
  slug: string;

  /** Stop starting fetches after this many */
  maxPages?: number;

  /** Overrides the configured concurrency */
  maxConcurrency?: number;

  /** Cancels the crawl; pages fetched so far are still stored */
  signal?: AbortSignal;
}

export interface ScrapeResult {
  meta: DocMeta;
  stats: CrawlStats;
}

export interface SiteSummary {
  name: string;
  slug: string;
  type: string;
  version?: string;
  baseUrl: string;
}

export interface ScraperServiceOptions {
  maxConcurrency: number;
}

/**
 * Payload of re-emitted crawl events
 */
export interface ScrapeEventPayload {
  slug: string;
  event: CrawlerEngineEvent;
}

export function summarizeSite(site: SiteDefinition): SiteSummary {
  return {
    name: site.name,
    slug: site.slug,
    type: site.type,
    version: site.version,
    baseUrl: site.policy.baseUrl
  };
}

export class ScraperService {
  private eventEmitter = new EventEmitter();
  private readonly running = new Set<string>();

  constructor(
    private readonly sites: SiteRegistry,
    private readonly filters: FilterRegistry,
    private readonly createEngine: () => CrawlerEngine,
    private readonly storage: StorageManager,
    private readonly options: ScraperServiceOptions
  ) {}

  listSites(): SiteSummary[] {
    return this.sites.list().map(summarizeSite);
  }

  /**
   * Crawl a site and write its documentation set
   * @throws SiteNotFoundError for an unknown slug
   * @throws CrawlError when the site is already being scraped
   */
  async scrape(settings: ScrapeSettings): Promise<ScrapeResult> {
    const { slug } = settings;
    const job = this.sites.toCrawlJob(slug, this.filters);
    const descriptor = this.sites.toDescriptor(slug);

    if (this.running.has(slug)) {
      throw new CrawlError(`A scrape of ${slug} is already running`, 'CRAWL_IN_PROGRESS', { slug });
    }
    this.running.add(slug);

    const forward = (event: CrawlerEngineEvent) => {
      const payload: ScrapeEventPayload = { slug, event };
      this.eventEmitter.emit(event.type, payload);
    };
    const engine = this.createEngine();
    engine.getEventEmitter().on('event', forward);

    try {
      logger.info(`Scraping ${slug}`, 'ScraperService', { maxPages: settings.maxPages });
      const result = await engine.crawl(job, {
        maxConcurrency: settings.maxConcurrency ?? this.options.maxConcurrency,
        maxPages: settings.maxPages,
        signal: settings.signal
      });

      if (result.stats.pagesStored === 0) {
        logger.warn(`No pages were stored for ${slug}; writing an empty set`, 'ScraperService', result.stats);
      }

      const meta = await this.storage.storeDocSet(descriptor, result);
      return { meta, stats: result.stats };
    } finally {
      engine.getEventEmitter().off('event', forward);
      this.running.delete(slug);
    }
  }

  isRunning(slug: string): boolean {
    return this.running.has(slug);
  }

  /**
   * Get the event emitter for scrape events
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }
}
