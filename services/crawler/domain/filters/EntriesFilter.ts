import type { CheerioAPI } from 'cheerio';
import type { IndexEntry } from '../../../../shared/domain/models/Document.js';
import { BaseFilter, type FilterContext } from './Filter.js';

/**
 * Entry names starting with one of `prefixes` get `type`
 */
export interface NameRule {
  type: string;
  prefixes: string[];
}

/**
 * Pages whose path contains one of `contains` get `type`
 */
export interface PathRule {
  type: string;
  contains: string[];
}

export interface EntriesOptions {
  /** Checked first, in order */
  nameRules?: NameRule[];

  /** Checked when no name rule matched, in order */
  pathRules?: PathRule[];

  /** Type when no rule matches */
  defaultType?: string;

  /** Headings listed as extra entries pointing at their id */
  additionalSelector?: string;

  /** Give the root page an entry as well */
  includeRoot?: boolean;
}

export const DEFAULT_ENTRY_TYPE = 'Miscellaneous';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Derives the page's index entries from its heading and a per-site type table
 */
export class EntriesFilter extends BaseFilter {
  readonly name = 'entries';
  readonly emitsEntries = true;

  constructor(private readonly options: EntriesOptions = {}) {
    super();
  }

  /**
   * Adds the headings matching `additionalSelector` to the context's
   * additional entries, typed like the page
   */
  apply(html: string, context: FilterContext): string {
    const selector = this.options.additionalSelector;
    if (!selector || this.skips(context)) {
      return html;
    }

    const $ = this.parse(html);
    const { type } = this.primaryEntry($, context);
    this.css($, selector).each((_, element) => {
      const node = $(element);
      const id = node.attr('id');
      const text = collapse(node.text());
      if (id && text) {
        context.additionalEntries.push({ name: text, path: `${context.path}#${id}`, type });
      }
    });

    return html;
  }

  getEntries(html: string, context: FilterContext): IndexEntry[] {
    return this.skips(context) ? [] : [this.primaryEntry(this.parse(html), context)];
  }

  private skips(context: FilterContext): boolean {
    return this.isRootPage(context) && !this.options.includeRoot;
  }

  private primaryEntry($: CheerioAPI, context: FilterContext): IndexEntry {
    const name = this.getName(collapse(this.atCss($, 'h1').text()), context);
    return { name, path: context.path, type: this.getType(name, this.subpath(context)) };
  }

  getName(heading: string, context: FilterContext): string {
    if (heading) {
      return heading;
    }
    if (context.title) {
      return context.title;
    }
    const lastSegment = context.path.split('/').filter(Boolean).pop() ?? context.path;
    return lastSegment.replace(/[-_]+/g, ' ').trim() || context.path;
  }

  getType(name: string, subpath: string): string {
    for (const rule of this.options.nameRules ?? []) {
      if (rule.prefixes.some(prefix => name.startsWith(prefix))) {
        return rule.type;
      }
    }
    for (const rule of this.options.pathRules ?? []) {
      if (rule.contains.some(fragment => subpath.includes(fragment))) {
        return rule.type;
      }
    }
    return this.options.defaultType ?? DEFAULT_ENTRY_TYPE;
  }
}
