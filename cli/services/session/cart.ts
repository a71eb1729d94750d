import { MediaTable } from '../../lib/media-types';

export type CartSnapshot = Partial<Record<MediaTable, string[]>>;

/**
 * Per-session selection of asset ids, one set per table. Tables are created
 * on first access.
 */
export class CartSelection {
  private readonly tables = new Map<MediaTable, Set<string>>();

  constructor(snapshot: CartSnapshot = {}) {
    for (const [table, ids] of entries(snapshot)) {
      this.add(table, ids);
    }
  }

  /** Returns how many ids were new. */
  add(table: MediaTable, ids: string[]): number {
    const selected = this.ensure(table);
    const before = selected.size;
    for (const id of ids) selected.add(id);
    return selected.size - before;
  }

  remove(table: MediaTable, ids: string[]): number {
    const selected = this.ensure(table);
    let removed = 0;
    for (const id of ids) {
      if (selected.delete(id)) removed++;
    }
    return removed;
  }

  has(table: MediaTable, id: string): boolean {
    return this.ensure(table).has(id);
  }

  get(table: MediaTable): string[] {
    return [...this.ensure(table)];
  }

  count(table: MediaTable): number {
    return this.ensure(table).size;
  }

  clear(table: MediaTable): void {
    this.ensure(table).clear();
  }

  toJSON(): CartSnapshot {
    const snapshot: CartSnapshot = {};
    for (const [table, ids] of this.tables) {
      snapshot[table] = [...ids];
    }
    return snapshot;
  }

  private ensure(table: MediaTable): Set<string> {
    let selected = this.tables.get(table);
    if (!selected) {
      selected = new Set();
      this.tables.set(table, selected);
    }
    return selected;
  }
}

function entries(snapshot: CartSnapshot): Array<[MediaTable, string[]]> {
  const result: Array<[MediaTable, string[]]> = [];
  if (snapshot.media_proj) result.push(['media_proj', snapshot.media_proj]);
  if (snapshot.media_arch) result.push(['media_arch', snapshot.media_arch]);
  return result;
}
