import type { CheerioAPI, Cheerio } from 'cheerio';
import { isComment, type AnyNode } from 'domhandler';
import { BaseFilter, type FilterContext } from './Filter.js';

export interface CleanHtmlOptions {
  /** Main content container; defaults to body */
  container?: string;

  /** Extra selectors removed with their content */
  remove?: string[];

  /** Wrapper selectors replaced by their children */
  unwrap?: string[];

  /** Elements holding one line of highlighted code */
  codeLineSelector?: string;
}

const ALWAYS_REMOVED = 'script, style, link, noscript, iframe';
const LANGUAGE_CLASS = /(?:^|\s)(?:language|lang)-([\w+#-]+)/;

/**
 * Reduces a fetched page to its documentation content
 */
export class CleanHtmlFilter extends BaseFilter {
  readonly name = 'clean-html';

  constructor(private readonly options: CleanHtmlOptions = {}) {
    super();
  }

  apply(html: string, _context: FilterContext): string {
    const $ = this.parse(html, true);

    let root = this.atCss($, this.options.container ?? 'body');
    if (root.length === 0) {
      root = $('body');
    }

    this.within(root, ALWAYS_REMOVED).remove();
    for (const selector of this.options.remove ?? []) {
      this.within(root, selector).remove();
    }
    this.removeComments(root);

    this.normalizeCodeBlocks($, root);

    for (const selector of this.options.unwrap ?? []) {
      this.within(root, selector).each((_, element) => {
        const wrapper = $(element);
        wrapper.replaceWith(wrapper.contents());
      });
    }

    root.find('[class]').removeAttr('class');
    root.find('[style]').removeAttr('style');

    return (root.html() ?? '').trim();
  }

  private removeComments(root: Cheerio<AnyNode>): void {
    root.find('*').addBack().contents().filter((_, node) => isComment(node)).remove();
  }

  /**
   * Replace highlighted code with a plain pre/code pair tagged by language
   */
  private normalizeCodeBlocks($: CheerioAPI, root: Cheerio<AnyNode>): void {
    const lineSelector = this.options.codeLineSelector ?? '.token-line, .line';

    this.within(root, 'pre').each((_, element) => {
      const pre = $(element);
      const language = this.detectLanguage(pre);
      const lines = this.within(pre, lineSelector);
      const text = lines.length > 0
        ? lines.map((_i, line) => $(line).text()).get().join('\n')
        : pre.text();

      const code = $('<code></code>').text(text);
      const replacement = $('<pre></pre>').append(code);
      if (language) {
        replacement.attr('data-language', language);
        code.attr('data-language', language);
      }
      pre.replaceWith(replacement);
    });
  }

  private detectLanguage(pre: Cheerio<AnyNode>): string | undefined {
    const explicit = pre.attr('data-language');
    if (explicit) {
      return explicit;
    }

    const candidates = [
      pre.attr('class'),
      pre.children('code').attr('class'),
      pre.closest('[class*="language-"]').attr('class')
    ];

    for (const classes of candidates) {
      const match = classes ? LANGUAGE_CLASS.exec(classes) : null;
      if (match) {
        return match[1];
      }
    }
    return undefined;
  }
}
