/**
 * FilterPipeline runs a page through an ordered list of filters
 */

import type { IndexEntry } from '../../../../shared/domain/models/Document.js';
import { FilterNotFoundError, toError } from '../../../../shared/domain/errors.js';
import { getLogger } from '../../../../shared/infrastructure/logging.js';
import type { Filter, FilterContext } from './Filter.js';
import type { FilterOptions, FilterRegistry } from './FilterRegistry.js';

const logger = getLogger();

/**
 * A filter named in a site definition
 */
export interface FilterSpec {
  name: string;
  options?: FilterOptions;
}

export class FilterPipeline {
  private filters: Filter[];

  constructor(filters: Filter[] = []) {
    this.filters = [...filters];
  }

  /**
   * Build a pipeline from named filters
   */
  static fromSpecs(registry: FilterRegistry, specs: FilterSpec[]): FilterPipeline {
    return new FilterPipeline(specs.map(spec => registry.create(spec.name, spec.options)));
  }

  push(filter: Filter): this {
    this.filters.push(filter);
    return this;
  }

  insertBefore(existing: string, filter: Filter): this {
    this.filters.splice(this.indexOf(existing), 0, filter);
    return this;
  }

  insertAfter(existing: string, filter: Filter): this {
    this.filters.splice(this.indexOf(existing) + 1, 0, filter);
    return this;
  }

  replace(existing: string, filter: Filter): this {
    this.filters.splice(this.indexOf(existing), 1, filter);
    return this;
  }

  contains(name: string): boolean {
    return this.filters.some(filter => filter.name === name);
  }

  names(): string[] {
    return this.filters.map(filter => filter.name);
  }

  clear(): void {
    this.filters = [];
  }

  get size(): number {
    return this.filters.length;
  }

  /**
   * Whether some filter produces the page's primary entry
   */
  get emitsEntries(): boolean {
    return this.filters.some(filter => filter.emitsEntries === true);
  }

  /**
   * Apply every filter in order. A filter that throws leaves the HTML as it
   * received it. When no filter set context.content, it becomes the final HTML.
   */
  run(html: string, context: FilterContext): string {
    let current = html;
    context.html = current;

    for (const filter of this.filters) {
      try {
        current = filter.apply(current, context);
        context.html = current;
      } catch (error) {
        logger.warn(`Filter ${filter.name} failed on ${context.url}, keeping its input`, 'FilterPipeline', toError(error).message);
      }
    }

    if (!context.content.trim()) {
      context.content = current.trim();
    }
    return current;
  }

  /**
   * Entries from every filter, in pipeline order
   */
  getEntries(html: string, context: FilterContext): IndexEntry[] {
    const entries: IndexEntry[] = [];
    for (const filter of this.filters) {
      try {
        entries.push(...filter.getEntries(html, context));
      } catch (error) {
        logger.warn(`Filter ${filter.name} could not extract entries from ${context.url}`, 'FilterPipeline', toError(error).message);
      }
    }
    return entries;
  }

  private indexOf(name: string): number {
    const index = this.filters.findIndex(filter => filter.name === name);
    if (index === -1) {
      throw new FilterNotFoundError(name, { pipeline: this.names() });
    }
    return index;
  }
}
