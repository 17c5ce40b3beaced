/**
 * Per-site rules deciding which URLs a crawl may visit
 */
export interface CrawlPolicy {
  /** Primary base URL; canonical URLs are expressed against it */
  baseUrl: string;

  /** Additional base URLs serving the same documentation */
  mirrorUrls?: string[];

  /** Path of the documentation root page, relative to the base URL */
  rootPath?: string;

  /** Seed paths, resolved against every base URL */
  initialPaths?: string[];

  /** Paths skipped together with everything below them */
  skipPaths?: string[];

  /** Regular expressions matched against the canonical path */
  skipPatterns?: string[];

  /** When set, only these paths (and everything below them) are visited */
  onlyPaths?: string[];

  /** When set, only canonical paths matching one of these are visited */
  onlyPatterns?: string[];

  /** Per-URL veto, applied after base URL membership */
  skipLink?: (url: string) => boolean;

  /** Ensure directory-like URLs end with a slash */
  trailingSlash?: boolean;

  /** Path aliases rewritten before any check */
  replacePaths?: Record<string, string>;
}
