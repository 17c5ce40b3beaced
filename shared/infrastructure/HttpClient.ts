import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { CrawlNetworkError, CrawlTimeoutError, CrawlError, toError } from '../domain/errors.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Default timeout in milliseconds */
  timeout?: number;

  /** Default retry count */
  retries?: number;

  /** Default delay between retries in milliseconds */
  retryDelay?: number;

  /** Default user agent */
  userAgent?: string;

  /** Maximum redirects followed for one request */
  maxRedirects?: number;
}

/**
 * Interface for the HTTP client
 */
export interface IHttpClient {
  /**
   * Fetch a URL with GET method, following redirects
   */
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;

  /**
   * Fetch a URL with GET method and keep the body as bytes
   */
  getBinary(url: string, options?: RequestOptions): Promise<BinaryResponse>;
}

/**
 * Response from the HTTP client
 */
export interface HttpResponse {
  /** Response status code */
  statusCode: number;

  /** Response headers, names lowercased */
  headers: Record<string, string>;

  /** Response body as string */
  body: string;

  /** URL of the final response after redirects */
  effectiveUrl: string;

  /** Time taken to fetch in milliseconds */
  timeTaken: number;

  /** Redirects that were followed */
  redirects: string[];
}

/**
 * Response whose body was kept as bytes
 */
export interface BinaryResponse extends Omit<HttpResponse, 'body'> {
  data: Buffer;
}

/**
 * Options for a request
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeout?: number;

  /** Number of retries on failure */
  retries?: number;

  /** Delay between retries in milliseconds */
  retryDelay?: number;

  /** Custom headers */
  headers?: Record<string, string>;

  /** Custom user agent for this request */
  userAgent?: string;

  /** Aborts the request */
  signal?: AbortSignal;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      flat[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      flat[name.toLowerCase()] = String(value);
    }
  }
  return flat;
}

type RawResponse = Omit<HttpResponse, 'body'> & { data: unknown };

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return Buffer.from(typeof data === 'string' ? data : '');
}

/**
 * Absolute target of a redirect
 * @throws CrawlError when the Location header is not a URL
 */
function resolveLocation(location: string, currentUrl: string, requestedUrl: string): string {
  try {
    return new URL(location, currentUrl).toString();
  } catch {
    throw new CrawlError(`Malformed redirect location '${location}' from ${currentUrl}`, 'CRAWL_BAD_REDIRECT', { url: requestedUrl, location });
  }
}

/**
 * Implementation of the HTTP client
 *
 * Redirects are followed here rather than by the transport so the final URL
 * and the hop list are known.
 */
export class HttpClient implements IHttpClient {
  private axiosInstance: AxiosInstance;
  private defaultOptions: Required<HttpClientOptions>;

  constructor(options: HttpClientOptions = {}) {
    this.defaultOptions = {
      timeout: 30000,
      retries: 2,
      retryDelay: 1000,
      userAgent: 'dochive-bot/1.0',
      maxRedirects: 10,
      ...options
    };

    this.axiosInstance = axios.create({
      timeout: this.defaultOptions.timeout,
      headers: {
        'User-Agent': this.defaultOptions.userAgent
      }
    });
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { data, ...response } = await this.withRetries(url, options, () => this.fetchFollowingRedirects(url, options, 'text'));
    return { ...response, body: typeof data === 'string' ? data : String(data ?? '') };
  }

  async getBinary(url: string, options: RequestOptions = {}): Promise<BinaryResponse> {
    const { data, ...response } = await this.withRetries(url, options, () => this.fetchFollowingRedirects(url, options, 'arraybuffer'));
    return { ...response, data: toBuffer(data) };
  }

  private async withRetries(url: string, options: RequestOptions, fetch: () => Promise<RawResponse>): Promise<RawResponse> {
    const retries = options.retries ?? this.defaultOptions.retries;
    const retryDelay = options.retryDelay ?? this.defaultOptions.retryDelay;

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const response = await fetch();

        // Only retry on network errors or 5xx status codes
        if (response.statusCode >= 500 && attempt < retries) {
          lastError = new CrawlError(`Server responded ${response.statusCode} for ${url}`, 'CRAWL_HTTP_ERROR', { url, statusCode: response.statusCode });
        } else {
          return response;
        }
      } catch (error: unknown) {
        lastError = this.toCrawlError(url, error, options.timeout ?? this.defaultOptions.timeout);
        const transient = lastError instanceof CrawlNetworkError || lastError instanceof CrawlTimeoutError;
        if (!transient || options.signal?.aborted) {
          break;
        }
      }

      if (attempt < retries && retryDelay > 0) {
        await new Promise(resolve => setTimeout(resolve, retryDelay * (attempt + 1)));
      }
    }

    throw lastError || new CrawlNetworkError(url);
  }

  private async fetchFollowingRedirects(url: string, options: RequestOptions, responseType: 'text' | 'arraybuffer'): Promise<RawResponse> {
    const startTime = Date.now();
    const redirects: string[] = [];
    let currentUrl = url;

    for (;;) {
      const response = await this.axiosInstance.get<unknown>(currentUrl, {
        timeout: options.timeout ?? this.defaultOptions.timeout,
        headers: {
          'User-Agent': options.userAgent || this.defaultOptions.userAgent,
          ...options.headers
        },
        responseType,
        transformResponse: (data: unknown) => data,
        validateStatus: () => true, // Don't throw on any status code
        maxRedirects: 0,
        signal: options.signal
      });

      const headers = flattenHeaders(response.headers);
      const location = headers['location'];

      if (REDIRECT_STATUSES.has(response.status) && location) {
        if (redirects.length >= this.defaultOptions.maxRedirects) {
          throw new CrawlError(`Too many redirects starting at ${url}`, 'CRAWL_REDIRECT_LIMIT', { url, redirects });
        }
        currentUrl = resolveLocation(location, currentUrl, url);
        redirects.push(currentUrl);
        continue;
      }

      return {
        statusCode: response.status,
        headers,
        data: response.data,
        effectiveUrl: currentUrl,
        timeTaken: Date.now() - startTime,
        redirects
      };
    }
  }

  private toCrawlError(url: string, error: unknown, timeout: number): Error {
    if (error instanceof CrawlError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new CrawlTimeoutError(url, timeout);
      }
      return new CrawlNetworkError(url, error);
    }
    return new CrawlNetworkError(url, toError(error));
  }
}
