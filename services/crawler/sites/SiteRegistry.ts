/**
 * SiteRegistry holds the documentation sites that can be scraped
 *
 * Sites are declared as JSON files, one per site. Each declares its crawl
 * policy and the filters its pages run through.
 */

import fsSync, { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { CrawlPolicy } from '../../../shared/domain/models/CrawlPolicy.js';
import { ConfigurationError, SiteNotFoundError, toError } from '../../../shared/domain/errors.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { CrawlJob } from '../domain/CrawlerEngine.js';
import { FilterPipeline } from '../domain/filters/FilterPipeline.js';
import type { FilterRegistry } from '../domain/filters/FilterRegistry.js';
import { docDirectory, type DocDescriptor } from '../domain/StorageManager.js';

const logger = getLogger();

const policySchema = z.object({
  baseUrl: z.string().url(),
  mirrorUrls: z.array(z.string().url()).optional(),
  rootPath: z.string().optional(),
  initialPaths: z.array(z.string()).optional(),
  skipPaths: z.array(z.string()).optional(),
  skipPatterns: z.array(z.string()).optional(),
  onlyPaths: z.array(z.string()).optional(),
  onlyPatterns: z.array(z.string()).optional(),
  skipLinkContains: z.array(z.string()).optional(),
  trailingSlash: z.boolean().optional(),
  replacePaths: z.record(z.string()).optional()
}).strict();

export const siteSchema = z.object({
  name: z.string().min(1),
  slug: z.string().regex(/^[a-z0-9_.-]+$/, 'lowercase letters, digits, ".", "_" and "-" only'),
  type: z.string().min(1),
  version: z.string().optional(),
  release: z.string().optional(),
  rootTitle: z.string().min(1),
  attribution: z.string().optional(),
  links: z.record(z.string()).default({}),
  policy: policySchema,
  filters: z.array(z.object({
    name: z.string(),
    options: z.record(z.unknown()).optional()
  })).min(1)
});

export type SiteDefinition = z.infer<typeof siteSchema>;

export type SitePolicy = z.infer<typeof policySchema>;

/**
 * Turn a declared policy into the crawler's policy
 */
export function toCrawlPolicy(policy: SitePolicy): CrawlPolicy {
  const { skipLinkContains, ...rest } = policy;
  if (!skipLinkContains || skipLinkContains.length === 0) {
    return rest;
  }
  return {
    ...rest,
    skipLink: (url: string) => skipLinkContains.some(fragment => url.includes(fragment))
  };
}

/**
 * Directory of the site files shipped with the project. Walks up from this
 * module so it is found from the sources and from a build under dist/.
 */
export function bundledSitesDir(): string {
  const hasSites = (dir: string) =>
    fsSync.existsSync(dir) && fsSync.readdirSync(dir).some(name => name.endsWith('.json'));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  if (hasSites(moduleDir)) {
    return moduleDir;
  }

  const relative = path.join('services', 'crawler', 'sites');
  let dir = moduleDir;
  for (;;) {
    const candidate = path.join(dir, relative);
    if (hasSites(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ConfigurationError('Cannot find the bundled site definitions; set DOCHIVE_SITES_DIR');
    }
    dir = parent;
  }
}

/**
 * Registry of site definitions keyed by slug
 */
export class SiteRegistry {
  private readonly sites = new Map<string, SiteDefinition>();

  /**
   * Validate and add a site; a later site with the same slug replaces the earlier one
   * @throws ConfigurationError when the definition is invalid
   */
  register(definition: unknown, source = 'inline definition'): SiteDefinition {
    const parsed = siteSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid site definition in ${source}`, { issues: parsed.error.issues });
    }
    for (const pattern of [...(parsed.data.policy.skipPatterns ?? []), ...(parsed.data.policy.onlyPatterns ?? [])]) {
      try {
        new RegExp(pattern);
      } catch (error: unknown) {
        throw new ConfigurationError(`Invalid pattern "${pattern}" in ${source}: ${toError(error).message}`);
      }
    }

    this.sites.set(parsed.data.slug, parsed.data);
    return parsed.data;
  }

  /**
   * Register every *.json file of a directory
   */
  async load(dir: string): Promise<number> {
    let names: string[];
    try {
      names = (await fs.readdir(dir)).filter(name => name.endsWith('.json')).sort();
    } catch (error: unknown) {
      throw new ConfigurationError(`Cannot read site directory ${dir}: ${toError(error).message}`);
    }

    for (const name of names) {
      const file = path.join(dir, name);
      let data: unknown;
      try {
        data = JSON.parse(await fs.readFile(file, 'utf-8'));
      } catch (error: unknown) {
        throw new ConfigurationError(`Cannot parse site file ${file}: ${toError(error).message}`);
      }
      this.register(data, file);
    }

    logger.info(`Loaded ${names.length} site definitions from ${dir}`, 'SiteRegistry');
    return names.length;
  }

  has(slug: string): boolean {
    return this.sites.has(slug);
  }

  /**
   * @throws SiteNotFoundError for an unknown slug
   */
  get(slug: string): SiteDefinition {
    const site = this.sites.get(slug);
    if (!site) {
      throw new SiteNotFoundError(slug, { known: [...this.sites.keys()].sort() });
    }
    return site;
  }

  list(): SiteDefinition[] {
    return [...this.sites.values()].sort((a, b) => a.slug.localeCompare(b.slug));
  }

  /**
   * Everything the crawler needs to scrape one site
   */
  toCrawlJob(slug: string, filters: FilterRegistry): CrawlJob {
    const site = this.get(slug);
    return {
      policy: toCrawlPolicy(site.policy),
      pipeline: FilterPipeline.fromSpecs(filters, site.filters),
      slug: docDirectory(site.slug, site.version),
      rootTitle: site.rootTitle,
      version: site.version,
      release: site.release,
      attribution: site.attribution
    };
  }

  /**
   * Metadata stored next to the scraped set
   */
  toDescriptor(slug: string): DocDescriptor {
    const site = this.get(slug);
    const descriptor: DocDescriptor = {
      name: site.name,
      slug: site.slug,
      type: site.type,
      links: site.links
    };
    if (site.version !== undefined) {
      descriptor.version = site.version;
    }
    if (site.release !== undefined) {
      descriptor.release = site.release;
    }
    return descriptor;
  }
}
