import { BaseFilter, isDataUrl, isFragmentUrl, type FilterContext } from './Filter.js';

/**
 * Rewrites link targets to absolute URLs on the primary base URL
 */
export class NormalizeUrlsFilter extends BaseFilter {
  readonly name = 'normalize-urls';

  apply(html: string, context: FilterContext): string {
    const $ = this.parse(html);

    this.css($, 'a[href]').each((_, element) => {
      const link = $(element);
      const href = link.attr('href');
      if (href === undefined) {
        return;
      }

      const normalized = this.normalize(href, context);
      if (normalized !== null && normalized !== href) {
        link.attr('href', normalized);
      }
    });

    return $.html();
  }

  /**
   * Canonical form of a link target, or null when it is left alone
   */
  normalize(href: string, context: FilterContext): string | null {
    const trimmed = href.trim();
    if (trimmed === '' || isFragmentUrl(trimmed) || isDataUrl(trimmed)) {
      return null;
    }

    let resolved: URL;
    try {
      resolved = new URL(trimmed, context.url);
    } catch {
      return null;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }

    const hash = resolved.hash;
    resolved.hash = '';

    const urls = context.urls;
    const canonical = urls.applyTrailingSlash(urls.replacePath(urls.toPrimaryUrl(resolved.toString())));
    return canonical + hash;
  }
}
