/**
 * Handler for the dochive-scrape tool
 *
 * Crawls one site and stores its documentation set.
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import { scrapeToolArgsSchema, type McpToolResponse } from '../tool-types.js';
import type { ScraperService } from '../../../services/crawler/domain/ScraperService.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { McpHandlerError, toError } from '../../../shared/domain/errors.js';

/**
 * Handler for the dochive-scrape tool
 */
export class ScrapeToolHandler extends BaseToolHandler {
  private logger: Logger;

  constructor(
    private readonly scraper: ScraperService,
    loggerInstance?: Logger
  ) {
    super();
    this.logger = loggerInstance || getLogger();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'dochive-scrape',
        description: 'Crawl a documentation site, clean its pages, build its entry index and store the result. ' +
          'Returns the stored metadata and crawl statistics. Large sites take several minutes; use maxPages to sample one.',
        inputSchema: {
          type: 'object',
          properties: {
            slug: {
              type: 'string',
              description: 'Slug of the site, as listed by dochive-sites'
            },
            maxPages: {
              type: 'integer',
              description: 'Stop after fetching this many pages'
            },
            maxConcurrency: {
              type: 'integer',
              description: 'Number of concurrent requests'
            }
          },
          required: ['slug']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== 'dochive-scrape') {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    try {
      const { slug, maxPages, maxConcurrency } = this.parseArgs(scrapeToolArgsSchema, args);
      this.logger.info(`Handling dochive-scrape for ${slug}`, 'ScrapeToolHandler.handleToolCall', { maxPages, maxConcurrency });

      const { meta, stats } = await this.scraper.scrape({ slug, maxPages, maxConcurrency });

      const lines = [
        `# Scraped ${meta.name}`,
        '',
        `- Slug: ${meta.slug}`,
        `- Pages stored: ${stats.pagesStored}`,
        `- Pages fetched: ${stats.pagesFetched}`,
        `- Pages skipped: ${stats.pagesSkipped}`,
        `- Pages failed: ${stats.pagesFailed}`,
        `- Redirects: ${stats.redirects}`,
        `- Database size: ${meta.db_size} bytes`,
        `- Runtime: ${(stats.runtime / 1000).toFixed(1)}s`
      ];
      return this.createSuccessResponse(lines.join('\n'));
    } catch (error: unknown) {
      this.logger.logError(toError(error), 'ScrapeToolHandler.handleToolCall', 'dochive-scrape failed');
      return this.createStructuredErrorResponse(error);
    }
  }
}
