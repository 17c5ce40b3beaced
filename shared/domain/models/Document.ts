/**
 * Documentation set models: the searchable entry index, the page database
 * and the metadata persisted beside them.
 */

/**
 * One searchable entry. Two entries are the same entry only when all
 * three fields are equal.
 */
export interface IndexEntry {
  /** Display name */
  name: string;

  /** Canonical page path, optionally with a #fragment */
  path: string;

  /** Category the entry is listed under */
  type: string;
}

/**
 * Per-category summary of an entry index
 */
export interface IndexType {
  /** Category name as shown */
  name: string;

  /** Number of unique entries in the category */
  count: number;

  /** Lowercased name */
  slug: string;
}

/**
 * Serialized form of an entry index (index.json)
 */
export interface FullIndex {
  entries: IndexEntry[];
  types: IndexType[];
}

/**
 * Canonical page path to cleaned page HTML (db.json)
 */
export type PageDb = Record<string, string>;

/**
 * Metadata of one stored documentation set (meta.json)
 */
export interface DocMeta {
  /** Display name */
  name: string;

  /** Directory-safe identifier */
  slug: string;

  /** Documentation family, used to group sets */
  type: string;

  version?: string;

  release?: string;

  /** Named external links (home, code, ...) */
  links: Record<string, string>;

  /** Seconds since the epoch when the set was written */
  mtime: number;

  /** Size of the persisted db.json in bytes */
  db_size: number;
}

/**
 * Every stored documentation set, keyed by slug (manifest.json)
 */
export type Manifest = Record<string, DocMeta>;
