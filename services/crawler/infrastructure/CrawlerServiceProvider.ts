/**
 * Builds the scraper service with all its dependencies
 * This connects the domain classes to concrete implementations
 */

import { ScraperService } from '../domain/ScraperService.js';
import { CrawlerEngine } from '../domain/CrawlerEngine.js';
import { RateLimiter } from '../domain/RateLimiter.js';
import { ImageInliner } from '../domain/ImageInliner.js';
import { StorageManager } from '../domain/StorageManager.js';
import { FilterRegistry } from '../domain/filters/FilterRegistry.js';
import { SiteRegistry, bundledSitesDir } from '../sites/SiteRegistry.js';
import { HttpClient, type IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { FileStore } from '../../../shared/infrastructure/repositories/FileStore.js';
import { config, ensureDirectories, type DochiveConfig } from '../../../shared/infrastructure/config.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';

/**
 * Replaceable parts, used by tests
 */
export interface CrawlerServiceOverrides {
  config?: DochiveConfig;
  httpClient?: IHttpClient;
  rateLimiter?: RateLimiter;
  sites?: SiteRegistry;
  filters?: FilterRegistry;
}

export interface CrawlerServices {
  scraper: ScraperService;
  storage: StorageManager;
  sites: SiteRegistry;
  filters: FilterRegistry;
}

/**
 * Factory class for the scraper service and the stores it writes
 */
export class CrawlerServiceProvider {
  private static instance: Promise<CrawlerServices> | null = null;
  private static logger = getLogger();

  /**
   * Get the shared services, created from the global configuration on first call
   */
  static getInstance(): Promise<CrawlerServices> {
    if (!this.instance) {
      ensureDirectories();
      this.instance = this.create().catch((error: unknown) => {
        this.instance = null;
        throw error;
      });
    }
    return this.instance;
  }

  /**
   * Create a fresh set of services
   */
  static async create(overrides: CrawlerServiceOverrides = {}): Promise<CrawlerServices> {
    const settings = overrides.config ?? config;

    const sites = overrides.sites ?? new SiteRegistry();
    if (!overrides.sites) {
      await sites.load(settings.sitesDir ?? bundledSitesDir());
    }

    const filters = overrides.filters ?? FilterRegistry.withDefaults();

    const httpClient = overrides.httpClient ?? new HttpClient({
      userAgent: settings.crawler.userAgent,
      timeout: settings.crawler.timeout,
      retries: settings.crawler.retries,
      retryDelay: settings.crawler.retryDelay,
      maxRedirects: settings.crawler.maxRedirects
    });

    const rateLimiter = overrides.rateLimiter ?? new RateLimiter({
      limit: settings.crawler.rateLimit,
      minInterval: settings.crawler.minRequestInterval
    });

    const storage = new StorageManager(new FileStore(settings.outputDir));
    const scraper = new ScraperService(
      sites,
      filters,
      () => new CrawlerEngine(httpClient, rateLimiter, new ImageInliner(httpClient, rateLimiter, { maxSize: settings.crawler.maxImageSize })),
      storage,
      { maxConcurrency: settings.crawler.maxConcurrency }
    );

    this.logger.debug(`Crawler services ready, output in ${settings.outputDir}`, 'CrawlerServiceProvider');
    return { scraper, storage, sites, filters };
  }

  /**
   * Forget the shared instance
   */
  static reset(): void {
    this.instance = null;
  }
}
