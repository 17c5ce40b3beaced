/**
 * Defines custom error types for the dochive application.
 */

/**
 * Base class for all dochive specific errors.
 * Allows adding custom properties like errorCode and details.
 */
export class DochiveError extends Error {
  public errorCode: string; // Mutable so subclasses can override
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Site Related Errors ---

export class SiteNotFoundError extends DochiveError {
  constructor(slug: string, details?: Record<string, unknown>) {
    super(`Site definition '${slug}' not found.`, 'SITE_NOT_FOUND', details);
  }
}

// --- Document Related Errors ---

export class DocumentNotFoundError extends DochiveError {
  constructor(documentIdentifier: string, details?: Record<string, unknown>) {
    super(`Document '${documentIdentifier}' not found.`, 'DOCUMENT_NOT_FOUND', details);
  }
}

// --- Validation Errors ---

export class ValidationError extends DochiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, 'VALIDATION_ERROR', details);
  }
}

// --- Crawling Errors ---

export class CrawlError extends DochiveError {
  constructor(message: string, errorCode: string = 'CRAWL_ERROR', details?: Record<string, unknown>) {
    super(`Crawling failed: ${message}`, errorCode, details);
  }
}

export class CrawlTimeoutError extends CrawlError {
  constructor(url: string, timeoutMs: number, details?: Record<string, unknown>) {
    super(`Timeout (${timeoutMs}ms) occurred while crawling URL: ${url}`, 'CRAWL_TIMEOUT', { url, timeoutMs, ...details });
  }
}

export class CrawlNetworkError extends CrawlError {
  constructor(url: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Network error occurred while crawling URL: ${url}. ${originalError?.message || ''}`, 'CRAWL_NETWORK_ERROR', { url, originalError, ...details });
  }
}

export class CrawlHttpError extends CrawlError {
  constructor(url: string, statusCode: number, statusText?: string, details?: Record<string, unknown>) {
    super(`HTTP error ${statusCode} (${statusText || 'Unknown Status'}) occurred while crawling URL: ${url}`, 'CRAWL_HTTP_ERROR', { url, statusCode, statusText, ...details });
  }
}

export class ContentTypeError extends CrawlError {
  constructor(url: string, contentType: string, details?: Record<string, unknown>) {
    super(`Unsupported content type '${contentType || 'none'}' at URL: ${url}`, 'CONTENT_TYPE_ERROR', { url, contentType, ...details });
  }
}

// --- Filter Errors ---

export class FilterNotFoundError extends DochiveError {
  constructor(name: string, details?: Record<string, unknown>) {
    super(`Filter '${name}' is not registered.`, 'FILTER_NOT_FOUND', { name, ...details });
  }
}

// --- Filesystem Errors ---

export class FileSystemError extends DochiveError {
  constructor(message: string, path?: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Filesystem error: ${message}${path ? ` (Path: ${path})` : ''}. ${originalError?.message || ''}`, 'FILESYSTEM_ERROR', { path, originalError, ...details });
  }
}

// --- Configuration Errors ---
export class ConfigurationError extends DochiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- MCP Handler Errors ---
export class McpHandlerError extends DochiveError {
  constructor(message: string, toolName?: string, details?: Record<string, unknown>) {
    super(`MCP Handler error${toolName ? ` in tool ${toolName}` : ''}: ${message}`, 'MCP_HANDLER_ERROR', { toolName, ...details });
  }
}

// --- Serialization Errors ---

export class SerializationError extends DochiveError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Serialization error: ${message}. ${originalError?.message || ''}`, 'SERIALIZATION_ERROR', { originalError, ...details });
  }
}

/**
 * Wrap an unknown thrown value as an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// --- Utility function to check if an error is a DochiveError ---
export function isDochiveError(error: unknown): error is DochiveError {
  return error instanceof DochiveError;
}
