/**
 * EntryIndex collects unique index entries and counts them per type
 */

import type { FullIndex, IndexEntry, IndexType } from '../../../shared/domain/models/Document.js';
import { sortByName } from './naturalSort.js';

export class EntryIndex {
  private readonly entries: IndexEntry[] = [];
  private readonly keys = new Set<string>();
  private readonly types = new Map<string, IndexType>();

  /**
   * Add an entry; returns false when the identical triple is already present
   */
  add(entry: IndexEntry): boolean {
    const key = JSON.stringify([entry.name, entry.path, entry.type]);
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);

    const type = this.types.get(entry.type);
    if (type) {
      type.count++;
    } else {
      this.types.set(entry.type, { name: entry.type, count: 1, slug: entry.type.toLowerCase() });
    }

    this.entries.push({ name: entry.name, path: entry.path, type: entry.type });
    return true;
  }

  addAll(entries: Iterable<IndexEntry>): void {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Entries and type summaries, each naturally sorted by name
   */
  toJSON(): FullIndex {
    return {
      entries: sortByName([...this.entries], entry => entry.name),
      types: sortByName([...this.types.values()].map(type => ({ ...type })), type => type.name)
    };
  }
}
