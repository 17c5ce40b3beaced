/**
 * MCP server exposing the scraper as tools
 *
 * Tool calls are routed to the handler that declares the tool. Handlers turn
 * their own failures into error responses; anything escaping them is reported
 * the same way.
 *
 * @see https://modelcontextprotocol.io/introduction
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import type { BaseToolHandler } from './handlers/base-tool-handler.js';
import { SitesToolHandler } from './handlers/sites-tool-handler.js';
import { ScrapeToolHandler } from './handlers/scrape-tool-handler.js';
import { DocsToolHandler } from './handlers/docs-tool-handler.js';
import { PageToolHandler } from './handlers/page-tool-handler.js';
import type { McpToolResponse } from './tool-types.js';
import type { CrawlerServices } from '../../services/crawler/infrastructure/CrawlerServiceProvider.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { toError } from '../../shared/domain/errors.js';

const logger = getLogger();

export interface ServerInfo {
  name: string;
  version: string;
}

/**
 * Handlers for every tool, wired to the given services
 */
export function createToolHandlers(services: CrawlerServices): BaseToolHandler[] {
  return [
    new SitesToolHandler(services.scraper),
    new ScrapeToolHandler(services.scraper),
    new DocsToolHandler(services.storage),
    new PageToolHandler(services.storage)
  ];
}

/**
 * dochive MCP server
 */
export class DochiveMcpServer {
  private readonly server: Server;

  constructor(
    info: ServerInfo,
    private readonly handlers: BaseToolHandler[]
  ) {
    this.server = new Server(info, {
      capabilities: {
        tools: {},
      },
    });

    this.server.onerror = (error) => {
      logger.logError(error, 'DochiveMcpServer', '[MCP Error]');
    };

    this.setupToolHandlers();
  }

  /**
   * Every tool of every handler
   */
  listTools() {
    return this.handlers.flatMap(handler => handler.getToolDefinitions());
  }

  /**
   * Run a tool call through its handler
   * @throws McpError when no handler declares the tool
   */
  async callTool(name: string, args: unknown): Promise<McpToolResponse> {
    const handler = this.handlers.find(candidate => candidate.handles(name));
    if (!handler) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
    return handler.handleToolCall(name, args);
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools()
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const response = await this.callTool(name, args);
        return {
          content: response.content,
          isError: response.isError ?? false
        };
      } catch (error: unknown) {
        if (error instanceof McpError) {
          throw error;
        }
        const message = toError(error).message;
        logger.error(`Error executing tool ${name}: ${message}`, 'DochiveMcpServer');
        return {
          content: [{ type: 'text', text: `Error executing tool ${name}: ${message}` }],
          isError: true
        };
      }
    });
  }
}
