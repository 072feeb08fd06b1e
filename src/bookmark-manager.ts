/**
 * @fileoverview Named offsets for navigation
 * @description Several bookmarks may share one offset; nothing is deduplicated.
 */

import { type Bookmark, type BookmarkRecord } from './types/common';

function copyBookmark(bookmark: Bookmark): Bookmark {
  return { ...bookmark, createdAt: new Date(bookmark.createdAt.getTime()) };
}

class BookmarkManager {
  private bookmarks: Map<number, Bookmark> = new Map();
  private nextId: number = 1;

  // Clock function (can be mocked for testing)
  private clockFunction: () => Date = () => new Date();

  setClock(clockFn: () => Date): void {
    this.clockFunction = clockFn;
  }

  get count(): number {
    return this.bookmarks.size;
  }

  add(name: string, offset: number, description: string = ''): Bookmark {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Bookmark offset must be a non-negative integer, got ${offset}`);
    }
    const bookmark: Bookmark = {
      id: this.nextId++,
      name,
      offset,
      description,
      createdAt: new Date(this.clockFunction().getTime())
    };
    this.bookmarks.set(bookmark.id, bookmark);
    return copyBookmark(bookmark);
  }

  get(id: number): Bookmark | null {
    const bookmark = this.bookmarks.get(id);
    return bookmark ? copyBookmark(bookmark) : null;
  }

  rename(id: number, name: string): boolean {
    const bookmark = this.bookmarks.get(id);
    if (!bookmark) return false;
    bookmark.name = name;
    return true;
  }

  describe(id: number, description: string): boolean {
    const bookmark = this.bookmarks.get(id);
    if (!bookmark) return false;
    bookmark.description = description;
    return true;
  }

  remove(id: number): boolean {
    return this.bookmarks.delete(id);
  }

  clear(): void {
    this.bookmarks.clear();
  }

  /**
   * All bookmarks ordered by offset, then by creation
   */
  list(): Bookmark[] {
    return Array.from(this.bookmarks.values())
      .sort((a, b) => a.offset - b.offset || a.id - b.id)
      .map(copyBookmark);
  }

  /**
   * Bookmarks at exactly `offset`
   */
  at(offset: number): Bookmark[] {
    return this.list().filter(bookmark => bookmark.offset === offset);
  }

  /**
   * First bookmark with the smallest offset strictly after `cursor`
   */
  next(cursor: number): Bookmark | null {
    let best: Bookmark | null = null;
    for (const bookmark of this.list()) {
      if (bookmark.offset > cursor) {
        best = bookmark;
        break;
      }
    }
    return best;
  }

  /**
   * First bookmark with the largest offset strictly before `cursor`
   */
  previous(cursor: number): Bookmark | null {
    let best: Bookmark | null = null;
    for (const bookmark of this.list()) {
      if (bookmark.offset >= cursor) {
        break;
      }
      if (best === null || bookmark.offset > best.offset) {
        best = bookmark;
      }
    }
    return best;
  }

  toJSON(): BookmarkRecord[] {
    return this.list().map(bookmark => ({
      name: bookmark.name,
      offset: bookmark.offset,
      description: bookmark.description,
      createdAt: bookmark.createdAt.toISOString()
    }));
  }

  /**
   * Replace all bookmarks with persisted records. Records with a bad offset
   * or date are skipped; returns how many were loaded.
   */
  fromJSON(records: ReadonlyArray<BookmarkRecord>): number {
    this.clear();
    let loaded = 0;
    for (const record of records) {
      const createdAt = new Date(record.createdAt);
      if (!Number.isInteger(record.offset) || record.offset < 0 || Number.isNaN(createdAt.getTime())) {
        continue;
      }
      const id = this.nextId++;
      this.bookmarks.set(id, {
        id,
        name: record.name,
        offset: record.offset,
        description: record.description,
        createdAt
      });
      loaded++;
    }
    return loaded;
  }
}

export { BookmarkManager };
