import { BaseFilter, type FilterContext } from './Filter.js';

/**
 * Appends the site's license notice and a link back to the source page
 */
export class AttributionFilter extends BaseFilter {
  readonly name = 'attribution';

  apply(html: string, context: FilterContext): string {
    if (!context.attribution) {
      return html;
    }

    const $ = this.parse(html);
    const notice = $('<div class="_attribution"></div>');
    const text = $('<p class="_attribution-p"></p>').html(context.attribution);
    text.append('<br>').append($('<a class="_attribution-link"></a>').attr('href', context.url).text(context.url));
    notice.append(text);
    $.root().append(notice);

    return $.html();
  }
}
