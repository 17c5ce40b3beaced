/**
 * Handler for the dochive-docs tool
 *
 * Lists stored documentation sets, or the entry index of one set.
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import { docsToolArgsSchema, type DocsToolArgs, type McpToolResponse } from '../tool-types.js';
import type { StorageManager } from '../../../services/crawler/domain/StorageManager.js';
import type { DocMeta } from '../../../shared/domain/models/Document.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';

function formatDoc(meta: DocMeta): string {
  const release = meta.release ? ` ${meta.release}` : '';
  const updated = new Date(meta.mtime * 1000).toISOString();
  return `- **${meta.name}**${release}: \`${meta.slug}\`, ${meta.db_size} bytes, updated ${updated}`;
}

/**
 * Handler for the dochive-docs tool
 */
export class DocsToolHandler extends BaseToolHandler {
  constructor(private readonly storage: StorageManager) {
    super();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'dochive-docs',
        description: 'List the documentation sets that have been scraped. With a slug, list that set\'s entry types ' +
          'and entries; each entry path can be passed to dochive-page.',
        inputSchema: {
          type: 'object',
          properties: {
            slug: {
              type: 'string',
              description: 'Stored set to describe, e.g. "babel~7"'
            },
            type: {
              type: 'string',
              description: 'Only list entries of this type (name or slug)'
            },
            limit: {
              type: 'integer',
              description: 'Maximum number of entries to list',
              default: 50
            }
          }
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== 'dochive-docs') {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    try {
      const parsed = this.parseArgs(docsToolArgsSchema, args);
      return parsed.slug === undefined ? await this.listDocs() : await this.describeDoc(parsed.slug, parsed);
    } catch (error: unknown) {
      return this.createStructuredErrorResponse(error);
    }
  }

  private async listDocs(): Promise<McpToolResponse> {
    const groups = await this.storage.docsByType();
    const types = Object.keys(groups).sort();
    if (types.length === 0) {
      return this.createSuccessResponse('No documentation has been scraped yet.');
    }

    const sections = types.map(type => `## ${type}\n\n${groups[type].map(formatDoc).join('\n')}`);
    return this.createSuccessResponse(`# Documentation\n\n${sections.join('\n\n')}`);
  }

  private async describeDoc(slug: string, { type, limit }: DocsToolArgs): Promise<McpToolResponse> {
    const meta = await this.storage.readMeta(slug);
    const index = await this.storage.readIndex(slug);

    const wanted = type?.toLowerCase();
    const entries = wanted === undefined
      ? index.entries
      : index.entries.filter(entry => entry.type.toLowerCase() === wanted || entry.type.toLowerCase().replace(/\s+/g, '-') === wanted);
    const shown = entries.slice(0, limit);

    const lines = [
      `# ${meta.name}${meta.release ? ` ${meta.release}` : ''}`,
      '',
      `Types: ${index.types.map(t => `${t.name} (${t.count})`).join(', ')}`,
      '',
      `## Entries (${shown.length} of ${entries.length})`,
      '',
      ...shown.map(entry => `- ${entry.name} [${entry.type}]: ${entry.path}`)
    ];
    return this.createSuccessResponse(lines.join('\n'));
  }
}
