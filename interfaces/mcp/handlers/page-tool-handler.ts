/**
 * Handler for the dochive-page tool
 *
 * Returns the cleaned HTML of one stored page.
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import { pageToolArgsSchema, type McpToolResponse } from '../tool-types.js';
import type { StorageManager } from '../../../services/crawler/domain/StorageManager.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';

/**
 * Handler for the dochive-page tool
 */
export class PageToolHandler extends BaseToolHandler {
  private logger: Logger;

  constructor(
    private readonly storage: StorageManager,
    loggerInstance?: Logger
  ) {
    super();
    this.logger = loggerInstance || getLogger();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'dochive-page',
        description: 'Read the cleaned HTML of one stored page, addressed by set slug and entry path as listed by dochive-docs.',
        inputSchema: {
          type: 'object',
          properties: {
            slug: {
              type: 'string',
              description: 'Stored set, e.g. "babel~7"'
            },
            path: {
              type: 'string',
              description: 'Page path, e.g. "babel-parser/"; a #fragment is ignored'
            },
            maxLength: {
              type: 'integer',
              description: 'Truncate the page to this many characters'
            }
          },
          required: ['slug', 'path']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== 'dochive-page') {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    try {
      const { slug, path, maxLength } = this.parseArgs(pageToolArgsSchema, args);
      const pagePath = path.split('#')[0];
      this.logger.debug(`Reading ${slug}/${pagePath}`, 'PageToolHandler.handleToolCall');

      const content = await this.storage.readPage(slug, pagePath);
      if (maxLength !== undefined && content.length > maxLength) {
        return this.createSuccessResponse(`${content.slice(0, maxLength)}\n\n[truncated, ${content.length} characters in total]`);
      }
      return this.createSuccessResponse(content);
    } catch (error: unknown) {
      return this.createStructuredErrorResponse(error);
    }
  }
}
