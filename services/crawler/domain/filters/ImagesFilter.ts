import { BaseFilter, isDataUrl, type FilterContext } from './Filter.js';

export interface ImagesOptions {
  /** Download images into data: URLs before the page is stored */
  inline?: boolean;

  /** Largest image in bytes that is inlined; larger ones keep their URL */
  maxSize?: number;
}

/**
 * Makes image sources absolute so stored pages render outside the site.
 * With `inline`, the crawler then replaces them by the image data.
 */
export class ImagesFilter extends BaseFilter {
  readonly name = 'images';

  constructor(private readonly options: ImagesOptions = {}) {
    super();
  }

  apply(html: string, context: FilterContext): string {
    const $ = this.parse(html);

    this.css($, 'img[src]').each((_, element) => {
      const image = $(element);
      const src = image.attr('src')?.trim();
      if (!src || isDataUrl(src)) {
        return;
      }
      try {
        image.attr('src', new URL(src, context.url).toString());
      } catch {
        image.removeAttr('src');
      }
      image.removeAttr('srcset');
    });

    if (this.options.inline) {
      context.inlineImages = { maxSize: this.options.maxSize };
    }

    return $.html();
  }
}
