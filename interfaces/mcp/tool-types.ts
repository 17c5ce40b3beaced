/**
 * Type definitions for MCP tool arguments and responses
 */

import { z } from 'zod';

/**
 * Arguments for the dochive-sites tool
 */
export const sitesToolArgsSchema = z.object({
  /** Only sites of this type */
  type: z.string().optional()
});

export type SitesToolArgs = z.infer<typeof sitesToolArgsSchema>;

/**
 * Arguments for the dochive-scrape tool
 */
export const scrapeToolArgsSchema = z.object({
  /** Slug of the site to scrape */
  slug: z.string().min(1),

  /** Stop after this many fetched pages */
  maxPages: z.number().int().positive().optional(),

  /** Concurrent requests */
  maxConcurrency: z.number().int().positive().max(50).optional()
});

export type ScrapeToolArgs = z.infer<typeof scrapeToolArgsSchema>;

/**
 * Arguments for the dochive-docs tool
 */
export const docsToolArgsSchema = z.object({
  /** Stored set to describe; every set is listed when absent */
  slug: z.string().min(1).optional(),

  /** Only entries of this type */
  type: z.string().optional(),

  /** Maximum entries listed */
  limit: z.number().int().positive().default(50)
});

export type DocsToolArgs = z.infer<typeof docsToolArgsSchema>;

/**
 * Arguments for the dochive-page tool
 */
export const pageToolArgsSchema = z.object({
  /** Stored set, e.g. "babel~7" */
  slug: z.string().min(1),

  /** Canonical page path, e.g. "babel-parser/"; a #fragment is ignored */
  path: z.string().min(1),

  /** Truncate the content to this many characters */
  maxLength: z.number().int().positive().optional()
});

export type PageToolArgs = z.infer<typeof pageToolArgsSchema>;

/**
 * Content item for MCP tool responses
 */
export interface McpContentItem {
  /** Content type */
  type: 'text';

  /** Content text */
  text: string;
}

/**
 * Response for MCP tools
 */
export interface McpToolResponse {
  /** Content items */
  content: McpContentItem[];

  /** Whether the response is an error */
  isError?: boolean;

  /** Error classification for error responses */
  errorDetails?: {
    type: string;
    code: string;
    details?: Record<string, unknown>;
  };
}
