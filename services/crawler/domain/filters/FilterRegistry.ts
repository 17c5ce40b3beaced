/**
 * FilterRegistry maps filter names to factories
 *
 * Site definitions name their filters; the registry turns those names and
 * option objects into Filter instances. One registry is handed to each
 * crawler so different crawls can register different filters.
 */

import { z } from 'zod';
import { FilterNotFoundError, ValidationError } from '../../../../shared/domain/errors.js';
import type { Filter } from './Filter.js';
import { AttributionFilter } from './AttributionFilter.js';
import { CleanHtmlFilter } from './CleanHtmlFilter.js';
import { EntriesFilter } from './EntriesFilter.js';
import { ImagesFilter } from './ImagesFilter.js';
import { NormalizeUrlsFilter } from './NormalizeUrlsFilter.js';
import { TitleFilter } from './TitleFilter.js';

export type FilterOptions = Record<string, unknown>;

export type FilterFactory = (options: FilterOptions) => Filter;

const noOptionsSchema = z.object({}).strict();

const cleanHtmlOptionsSchema = z.object({
  container: z.string().optional(),
  remove: z.array(z.string()).optional(),
  unwrap: z.array(z.string()).optional(),
  codeLineSelector: z.string().optional()
}).strict();

const entriesOptionsSchema = z.object({
  nameRules: z.array(z.object({ type: z.string(), prefixes: z.array(z.string()) })).optional(),
  pathRules: z.array(z.object({ type: z.string(), contains: z.array(z.string()) })).optional(),
  defaultType: z.string().optional(),
  additionalSelector: z.string().optional(),
  includeRoot: z.boolean().optional()
}).strict();

const imagesOptionsSchema = z.object({
  inline: z.boolean().optional(),
  maxSize: z.number().int().positive().optional()
}).strict();

function parseOptions<T>(name: string, schema: z.ZodType<T>, options: FilterOptions): T {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new ValidationError(`invalid options for filter '${name}': ${result.error.message}`, { filter: name });
  }
  return result.data;
}

export class FilterRegistry {
  private readonly factories = new Map<string, FilterFactory>();

  /**
   * Register a factory; a later registration under the same name replaces the earlier one
   */
  register(name: string, factory: FilterFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /**
   * @throws FilterNotFoundError when nothing is registered under `name`
   */
  create(name: string, options: FilterOptions = {}): Filter {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new FilterNotFoundError(name, { registered: this.names() });
    }
    return factory(options);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Registry holding the built-in filters
   */
  static withDefaults(): FilterRegistry {
    return new FilterRegistry()
      .register('clean-html', options => new CleanHtmlFilter(parseOptions('clean-html', cleanHtmlOptionsSchema, options)))
      .register('normalize-urls', options => {
        parseOptions('normalize-urls', noOptionsSchema, options);
        return new NormalizeUrlsFilter();
      })
      .register('images', options => new ImagesFilter(parseOptions('images', imagesOptionsSchema, options)))
      .register('title', options => {
        parseOptions('title', noOptionsSchema, options);
        return new TitleFilter();
      })
      .register('entries', options => new EntriesFilter(parseOptions('entries', entriesOptionsSchema, options)))
      .register('attribution', options => {
        parseOptions('attribution', noOptionsSchema, options);
        return new AttributionFilter();
      });
  }
}
