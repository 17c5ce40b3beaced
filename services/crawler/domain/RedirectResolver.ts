/**
 * RedirectResolver remembers which requested URLs ended up somewhere else
 * and re-keys the page database once the crawl is over.
 */

import type { IndexEntry, PageDb } from '../../../shared/domain/models/Document.js';

export type PathOf = (url: string) => string;

const pathname: PathOf = (url: string) => new URL(url).pathname;

export class RedirectResolver {
  private readonly redirects = new Map<string, string>();

  /**
   * Record that `from` was served from `to`; a later record for the same
   * source replaces the earlier one
   */
  record(from: string, to: string): void {
    if (from !== to) {
      this.redirects.set(from, to);
    }
  }

  get size(): number {
    return this.redirects.size;
  }

  /**
   * Effective URL for a requested one
   */
  resolve(url: string): string {
    return this.redirects.get(url) ?? url;
  }

  /**
   * Move every page stored under a redirected path to the target path.
   * Source paths match case-insensitively; when two sources map the same
   * lowercased path, the later record wins.
   */
  apply(pages: PageDb, pathOf: PathOf = pathname): PageDb {
    const pathRedirects = this.pathRedirects(pathOf);
    const result: PageDb = {};
    for (const [path, content] of Object.entries(pages)) {
      const target = pathRedirects.get(path.toLowerCase()) ?? path;
      result[target] = content;
    }
    return result;
  }

  /**
   * Point entries at the redirected paths, keeping any #fragment
   */
  applyToEntries(entries: IndexEntry[], pathOf: PathOf = pathname): IndexEntry[] {
    const pathRedirects = this.pathRedirects(pathOf);
    if (pathRedirects.size === 0) {
      return entries;
    }

    return entries.map(entry => {
      const hashIndex = entry.path.indexOf('#');
      const path = hashIndex === -1 ? entry.path : entry.path.slice(0, hashIndex);
      const fragment = hashIndex === -1 ? '' : entry.path.slice(hashIndex);
      const target = pathRedirects.get(path.toLowerCase());
      return target === undefined ? entry : { ...entry, path: target + fragment };
    });
  }

  private pathRedirects(pathOf: PathOf): Map<string, string> {
    const pathRedirects = new Map<string, string>();
    for (const [from, to] of this.redirects) {
      const fromPath = pathOf(from);
      const toPath = pathOf(to);
      if (fromPath.toLowerCase() !== toPath.toLowerCase()) {
        pathRedirects.set(fromPath.toLowerCase(), toPath);
      }
    }
    return pathRedirects;
  }
}
