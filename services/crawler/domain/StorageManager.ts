/**
 * StorageManager persists crawled documentation sets
 *
 * Each set lives in its own directory of the store with fixed file names.
 * The manifest at the store root lists the metadata of every set.
 */

import EventEmitter from 'events';
import { z } from 'zod';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import type { Store } from '../../../shared/domain/repositories/Store.js';
import type { DocMeta, FullIndex, IndexEntry, Manifest, PageDb } from '../../../shared/domain/models/Document.js';
import { DocumentNotFoundError, SerializationError, toError } from '../../../shared/domain/errors.js';
import { naturalCompare } from './naturalSort.js';
import type { CrawlResult } from './CrawlerEngine.js';

const logger = getLogger();

export const INDEX_FILENAME = 'index.json';
export const DB_FILENAME = 'db.json';
export const META_FILENAME = 'meta.json';
export const ENTRIES_FILENAME = 'entries.json';
export const MANIFEST_FILENAME = 'manifest.json';

/**
 * Descriptive part of DocMeta; size and time are filled in on write
 */
export type DocDescriptor = Omit<DocMeta, 'mtime' | 'db_size'>;

const entrySchema = z.object({ name: z.string(), path: z.string(), type: z.string() });

const fullIndexSchema = z.object({
  entries: z.array(entrySchema),
  types: z.array(z.object({ name: z.string(), count: z.number(), slug: z.string() }))
});

const pageDbSchema = z.record(z.string());

const docMetaSchema = z.object({
  name: z.string(),
  slug: z.string(),
  type: z.string(),
  version: z.string().optional(),
  release: z.string().optional(),
  links: z.record(z.string()).default({}),
  mtime: z.number(),
  db_size: z.number()
});

const manifestSchema = z.record(docMetaSchema);

/**
 * Storage event payload
 */
export interface DocStorageEvent {
  slug: string;
  timestamp: Date;
  type: 'stored';
  pages: number;
  entries: number;
}

function serialize(value: unknown, what: string): string {
  try {
    return JSON.stringify(value);
  } catch (error: unknown) {
    throw new SerializationError(`Failed to serialize ${what}`, toError(error));
  }
}

/**
 * Directory name of a documentation set
 */
export function docDirectory(slug: string, version?: string): string {
  return version ? `${slug}~${version}` : slug;
}

/**
 * Manager for documentation set storage
 */
export class StorageManager {
  /** Event emitter for storage events */
  private eventEmitter = new EventEmitter();

  /** Manifest updates run one at a time, in call order */
  private manifestTail: Promise<void> = Promise.resolve();

  constructor(private readonly store: Store) {}

  /**
   * Write index.json, db.json, entries.json and meta.json for one crawl and
   * record the set in the manifest
   */
  async storeDocSet(descriptor: DocDescriptor, result: CrawlResult): Promise<DocMeta> {
    const dir = docDirectory(descriptor.slug, descriptor.version);
    const index: FullIndex = result.index.toJSON();

    await this.store.write(`${dir}/${INDEX_FILENAME}`, serialize(index, 'entry index'));
    await this.store.write(`${dir}/${DB_FILENAME}`, serialize(result.pages, 'page database'));
    await this.store.write(`${dir}/${ENTRIES_FILENAME}`, serialize(result.entries, 'entry list'));

    const meta: DocMeta = {
      ...descriptor,
      slug: dir,
      mtime: Math.floor(Date.now() / 1000),
      db_size: await this.store.size(`${dir}/${DB_FILENAME}`)
    };
    await this.store.write(`${dir}/${META_FILENAME}`, serialize(meta, 'metadata'));

    await this.updateManifest(manifest => {
      manifest[meta.slug] = meta;
    });

    logger.info(`Stored ${dir}: ${Object.keys(result.pages).length} pages, ${index.entries.length} entries, ${meta.db_size} bytes`, 'StorageManager');

    const event: DocStorageEvent = {
      slug: meta.slug,
      timestamp: new Date(),
      type: 'stored',
      pages: Object.keys(result.pages).length,
      entries: index.entries.length
    };
    this.eventEmitter.emit('stored', event);

    return meta;
  }

  /**
   * Every stored set keyed by slug; empty when nothing was stored yet
   */
  async readManifest(): Promise<Manifest> {
    if (!(await this.store.exists(MANIFEST_FILENAME))) {
      return {};
    }
    return this.readJson(MANIFEST_FILENAME, manifestSchema);
  }

  /**
   * Stored sets grouped by type, each group sorted case-insensitively by name
   */
  async docsByType(): Promise<Record<string, DocMeta[]>> {
    const groups: Record<string, DocMeta[]> = {};
    for (const meta of Object.values(await this.readManifest())) {
      (groups[meta.type] ??= []).push(meta);
    }
    for (const docs of Object.values(groups)) {
      docs.sort((a, b) => naturalCompare(a.name.toLowerCase(), b.name.toLowerCase()));
    }
    return groups;
  }

  async readMeta(slug: string): Promise<DocMeta> {
    return this.readJson(`${slug}/${META_FILENAME}`, docMetaSchema);
  }

  async readIndex(slug: string): Promise<FullIndex> {
    return this.readJson(`${slug}/${INDEX_FILENAME}`, fullIndexSchema);
  }

  async readEntries(slug: string): Promise<IndexEntry[]> {
    return this.readJson(`${slug}/${ENTRIES_FILENAME}`, z.array(entrySchema));
  }

  async readPages(slug: string): Promise<PageDb> {
    return this.readJson(`${slug}/${DB_FILENAME}`, pageDbSchema);
  }

  /**
   * Content of one stored page
   * @throws DocumentNotFoundError when the set has no page under that path
   */
  async readPage(slug: string, pagePath: string): Promise<string> {
    const pages = await this.readPages(slug);
    const content = pages[pagePath];
    if (content === undefined) {
      throw new DocumentNotFoundError(`${slug}/${pagePath}`);
    }
    return content;
  }

  /**
   * Remove a stored set and its manifest record
   */
  async deleteDocSet(slug: string): Promise<boolean> {
    const known = await this.updateManifest(async manifest => {
      if (!(slug in manifest) && !(await this.store.exists(slug))) {
        return false;
      }
      await this.store.delete(slug);
      delete manifest[slug];
      return true;
    });

    if (known) {
      logger.info(`Deleted ${slug}`, 'StorageManager');
    }
    return known;
  }

  /**
   * Get the event emitter for storage events
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  /**
   * Read, change and rewrite the manifest after every earlier update finished
   */
  private updateManifest<T>(update: (manifest: Manifest) => T | Promise<T>): Promise<T> {
    const turn = this.manifestTail.then(async () => {
      const manifest = await this.readManifest();
      const result = await update(manifest);
      await this.store.write(MANIFEST_FILENAME, serialize(manifest, 'manifest'));
      return result;
    });
    // A failed update rejects `turn` for its caller; later updates still run
    this.manifestTail = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    if (!(await this.store.exists(file))) {
      throw new DocumentNotFoundError(file);
    }

    const raw = await this.store.read(file);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error: unknown) {
      throw new SerializationError(`Failed to parse ${file}`, toError(error));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new SerializationError(`Unexpected content in ${file}`, undefined, { issues: parsed.error.issues });
    }
    return parsed.data;
  }
}
