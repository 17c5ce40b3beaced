/**
 * Handler for the dochive-sites tool
 *
 * Lists the documentation sites that can be scraped.
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import { sitesToolArgsSchema, type McpToolResponse } from '../tool-types.js';
import type { ScraperService, SiteSummary } from '../../../services/crawler/domain/ScraperService.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';

function formatSite(site: SiteSummary): string {
  const version = site.version ? ` (version ${site.version})` : '';
  return `- **${site.name}**${version}: slug \`${site.slug}\`, type ${site.type}, ${site.baseUrl}`;
}

/**
 * Handler for the dochive-sites tool
 */
export class SitesToolHandler extends BaseToolHandler {
  constructor(private readonly scraper: ScraperService) {
    super();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'dochive-sites',
        description: 'List the documentation sites dochive knows how to scrape, with the slug to pass to dochive-scrape.',
        inputSchema: {
          type: 'object',
          properties: {
            type: {
              type: 'string',
              description: 'Only list sites of this type, e.g. "mdn"'
            }
          }
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== 'dochive-sites') {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    try {
      const { type } = this.parseArgs(sitesToolArgsSchema, args);
      const sites = this.scraper.listSites().filter(site => type === undefined || site.type === type);
      if (sites.length === 0) {
        return this.createSuccessResponse(type ? `No sites of type ${type}.` : 'No sites are defined.');
      }
      return this.createSuccessResponse(`# Sites (${sites.length})\n\n${sites.map(formatSite).join('\n')}`);
    } catch (error: unknown) {
      return this.createStructuredErrorResponse(error);
    }
  }
}
