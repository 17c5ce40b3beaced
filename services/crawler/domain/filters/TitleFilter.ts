import { BaseFilter, type FilterContext } from './Filter.js';

/**
 * Sets the page title from the first heading; the root page takes the
 * site's root title and gains a heading when it has none
 */
export class TitleFilter extends BaseFilter {
  readonly name = 'title';

  apply(html: string, context: FilterContext): string {
    const $ = this.parse(html);
    const heading = this.atCss($, 'h1');
    const headingText = heading.text().trim();

    if (!this.isRootPage(context)) {
      if (headingText) {
        context.title = headingText;
      }
      return html;
    }

    context.title = context.rootTitle;
    if (heading.length > 0) {
      return html;
    }

    $.root().prepend($('<h1></h1>').text(context.rootTitle));
    return $.html();
  }
}
