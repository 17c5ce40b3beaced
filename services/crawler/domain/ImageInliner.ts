/**
 * ImageInliner replaces remote image sources by data: URLs
 *
 * Images are downloaded once per inliner; a failed or oversized download
 * leaves the absolute URL in place.
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { toError } from '../../../shared/domain/errors.js';
import type { RateLimiter } from './RateLimiter.js';

const logger = getLogger();

export interface ImageInlinerOptions {
  /** Largest image in bytes that is inlined */
  maxSize: number;
}

export class ImageInliner {
  private readonly downloads = new Map<string, Promise<string | null>>();

  constructor(
    private readonly httpClient: IHttpClient,
    private readonly rateLimiter: RateLimiter,
    private readonly options: ImageInlinerOptions
  ) {}

  /**
   * Inline every http(s) image of an HTML fragment that downloads as an image
   * of at most `maxSize` bytes
   */
  async inline(html: string, maxSize = this.options.maxSize): Promise<string> {
    const $ = cheerio.load(html, null, false);
    let changed = false;

    for (const element of $('img[src]').toArray()) {
      const image = $(element);
      const src = image.attr('src');
      if (!src || !/^https?:\/\//i.test(src)) {
        continue;
      }

      const dataUrl = await this.download(src, maxSize);
      if (dataUrl) {
        image.attr('src', dataUrl);
        changed = true;
      }
    }

    return changed ? $.html() : html;
  }

  private download(url: string, maxSize: number): Promise<string | null> {
    const key = `${maxSize} ${url}`;
    let pending = this.downloads.get(key);
    if (!pending) {
      pending = this.fetchDataUrl(url, maxSize);
      this.downloads.set(key, pending);
    }
    return pending;
  }

  private async fetchDataUrl(url: string, maxSize: number): Promise<string | null> {
    try {
      await this.rateLimiter.wait();
      const response = await this.httpClient.getBinary(url);

      if (response.statusCode < 200 || response.statusCode >= 300) {
        logger.warn(`Not inlining ${url}: status ${response.statusCode}`, 'ImageInliner');
        return null;
      }

      const contentType = (response.headers['content-type'] ?? 'image/jpeg').split(';')[0].trim();
      if (!contentType.startsWith('image/')) {
        logger.warn(`Not inlining ${url}: content type ${contentType}`, 'ImageInliner');
        return null;
      }
      if (response.data.length > maxSize) {
        logger.debug(`Not inlining ${url}: ${response.data.length} bytes (max: ${maxSize})`, 'ImageInliner');
        return null;
      }

      return `data:${contentType};base64,${response.data.toString('base64')}`;
    } catch (error) {
      logger.warn(`Not inlining ${url}: ${toError(error).message}`, 'ImageInliner');
      return null;
    }
  }
}
