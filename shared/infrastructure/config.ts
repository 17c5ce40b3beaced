/**
 * Configuration module for dochive
 *
 * Loads configuration from environment variables, config files, and defaults
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file if present
dotenv.config();

export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error';

// Define configuration schema
export interface DochiveConfig {
  /** Base directory for data storage (logs, caches) */
  dataDir: string;

  /** Directory that receives one folder per scraped documentation set */
  outputDir: string;

  /** Directory holding site definition files; the bundled sites/ when unset */
  sitesDir?: string;

  /** Log level */
  logLevel: ConfigLogLevel;

  /** Mirror log lines to stderr */
  logToConsole: boolean;

  /** Default crawler settings */
  crawler: {
    /** User agent sent with every request */
    userAgent: string;

    /** Maximum number of fetches in flight */
    maxConcurrency: number;

    /** Requests allowed per wall-clock minute */
    rateLimit: number;

    /** Minimum spacing between two requests in milliseconds */
    minRequestInterval: number;

    /** Request timeout in milliseconds */
    timeout: number;

    /** Retry attempts for network errors and 5xx responses */
    retries: number;

    /** Base retry delay in milliseconds */
    retryDelay: number;

    /** Maximum redirects followed per request */
    maxRedirects: number;

    /** Largest image in bytes inlined into a stored page */
    maxImageSize: number;
  };

  /** MCP server settings */
  mcp: {
    /** Server name */
    name: string;

    /** Server version */
    version: string;
  };
}

const configFileSchema = z.object({
  dataDir: z.string().optional(),
  outputDir: z.string().optional(),
  sitesDir: z.string().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  logToConsole: z.boolean().optional(),
  crawler: z.object({
    userAgent: z.string(),
    maxConcurrency: z.number().int().positive(),
    rateLimit: z.number().int().positive(),
    minRequestInterval: z.number().int().nonnegative(),
    timeout: z.number().int().positive(),
    retries: z.number().int().nonnegative(),
    retryDelay: z.number().int().nonnegative(),
    maxRedirects: z.number().int().nonnegative(),
    maxImageSize: z.number().int().positive()
  }).partial().optional(),
  mcp: z.object({
    name: z.string(),
    version: z.string()
  }).partial().optional()
});

type ConfigFile = z.infer<typeof configFileSchema>;

// Get home directory
const HOME_DIR = os.homedir();

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envLogLevel(fallback: ConfigLogLevel): ConfigLogLevel {
  const raw = process.env.DOCHIVE_LOG_LEVEL;
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : fallback;
}

function buildDefaults(): DochiveConfig {
  const dataDir = process.env.DOCHIVE_DATA_DIR || path.join(HOME_DIR, '.dochive');
  return {
    dataDir,
    outputDir: process.env.DOCHIVE_OUTPUT_DIR || path.join(dataDir, 'docs'),
    sitesDir: process.env.DOCHIVE_SITES_DIR || undefined,
    logLevel: envLogLevel('info'),
    logToConsole: process.env.DOCHIVE_LOG_TO_CONSOLE === 'true',

    crawler: {
      userAgent: process.env.DOCHIVE_CRAWLER_USER_AGENT || 'dochive-bot/1.0',
      maxConcurrency: envInt('DOCHIVE_CRAWLER_MAX_CONCURRENCY', 10),
      rateLimit: envInt('DOCHIVE_CRAWLER_RATE_LIMIT', 500),
      minRequestInterval: envInt('DOCHIVE_CRAWLER_MIN_INTERVAL', 100),
      timeout: envInt('DOCHIVE_CRAWLER_TIMEOUT', 30000),
      retries: envInt('DOCHIVE_CRAWLER_RETRIES', 2),
      retryDelay: envInt('DOCHIVE_CRAWLER_RETRY_DELAY', 1000),
      maxRedirects: envInt('DOCHIVE_CRAWLER_MAX_REDIRECTS', 10),
      maxImageSize: envInt('DOCHIVE_CRAWLER_MAX_IMAGE_SIZE', 300 * 1024)
    },

    mcp: {
      name: process.env.DOCHIVE_MCP_NAME || 'dochive',
      version: process.env.DOCHIVE_MCP_VERSION || '1.0.0'
    }
  };
}

// Function to load configuration from a file
function loadConfigFromFile(filePath: string): ConfigFile {
  try {
    if (fs.existsSync(filePath)) {
      const configData = fs.readFileSync(filePath, 'utf8');
      const parsed = configFileSchema.safeParse(JSON.parse(configData));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`Ignoring invalid configuration in ${filePath}: ${parsed.error.message}`);
    }
  } catch (error) {
    console.warn(`Failed to load configuration from ${filePath}:`, error);
  }
  return {};
}

function merge(base: DochiveConfig, override: ConfigFile): DochiveConfig {
  return {
    ...base,
    ...override,
    crawler: { ...base.crawler, ...override.crawler },
    mcp: { ...base.mcp, ...override.mcp }
  };
}

// Precedence: default < global config file < local config file
const globalConfigPath = path.join(HOME_DIR, '.dochive', 'config.json');
const localConfigPath = path.join(process.cwd(), 'dochive.config.json');

function loadConfig(): DochiveConfig {
  return merge(merge(buildDefaults(), loadConfigFromFile(globalConfigPath)), loadConfigFromFile(localConfigPath));
}

let config = loadConfig();

// Export the final configuration
export { config };

// Also export a function to reload configuration
export function reloadConfig(): DochiveConfig {
  config = loadConfig();
  return config;
}

// Create necessary directories
export function ensureDirectories(): void {
  try {
    for (const dir of [config.dataDir, config.outputDir, path.join(config.dataDir, 'logs')]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
  } catch (error) {
    console.error('Failed to create necessary directories:', error);
    throw error;
  }
}
