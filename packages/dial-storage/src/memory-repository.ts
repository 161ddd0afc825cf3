import type {
  RemoveOptions,
  StorageDriver,
  StorageRepository,
  StoredRecord,
  WriteOptions,
} from "./types.js";
import { RepositoryClosedError } from "./types.js";
import { assertKey, checkRevision, parseBody, selectKeys, serialize } from "./records.js";

interface Entry {
  body: string;
  revision: number;
}

/**
 * Records kept in process. Values are held as JSON text, so callers never
 * share an object with the repository. Dropped on `close()`.
 */
export class MemoryRepository<T = unknown> implements StorageRepository<T> {
  private entries: Map<string, Entry> | null = new Map();

  async read(key: string): Promise<StoredRecord<T> | undefined> {
    const entries = this.live();
    assertKey(key);
    const entry = entries.get(key);
    return entry && { key, value: parseBody<T>(entry.body), revision: entry.revision };
  }

  async write(key: string, value: T, options?: WriteOptions): Promise<StoredRecord<T>> {
    const entries = this.live();
    assertKey(key);
    const current = entries.get(key)?.revision ?? 0;
    checkRevision("memory", key, current, options);
    const entry = { body: serialize("memory", key, value), revision: current + 1 };
    entries.set(key, entry);
    return { key, value: parseBody<T>(entry.body), revision: entry.revision };
  }

  async remove(key: string, options?: RemoveOptions): Promise<boolean> {
    const entries = this.live();
    assertKey(key);
    checkRevision("memory", key, entries.get(key)?.revision ?? 0, options);
    return entries.delete(key);
  }

  async keys(prefix?: string): Promise<string[]> {
    return selectKeys(this.live().keys(), prefix);
  }

  async close(): Promise<void> {
    this.entries = null;
  }

  get isClosed(): boolean {
    return this.entries === null;
  }

  private live(): Map<string, Entry> {
    if (this.entries === null) throw new RepositoryClosedError("memory");
    return this.entries;
  }
}

/** `memory://` — ignores the URL remainder and the provider context. */
export const memoryDriver: StorageDriver = {
  async open() {
    return new MemoryRepository();
  },
};
