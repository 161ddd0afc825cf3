import {
  InvalidContextError,
  RepositoryClosedError,
  RevisionConflictError,
  assertKey,
  expectedRevision,
  parseBody,
  selectKeys,
  serialize,
} from "@dialkit/dial-storage";
import type {
  RemoveOptions,
  StorageDriver,
  StorageRepository,
  StoredRecord,
  WriteOptions,
} from "@dialkit/dial-storage";
import {
  isRecordCollection,
  wrapCollection,
  type RecordCollection,
  type RecordDocument,
} from "./mongo-collection.js";

export const DEFAULT_DATABASE = "dialkit";
export const DEFAULT_COLLECTION = "dial_records";

export interface MongoTarget {
  /** Connection string handed to MongoClient */
  uri: string;
  database: string;
  collection: string;
}

/**
 * MongoRepository
 *
 * One document per record. Conditional writes are single-document
 * operations filtered on the expected revision, so they hold across
 * processes sharing the collection.
 */
export class MongoRepository<T = unknown> implements StorageRepository<T> {
  private readonly records: RecordCollection;
  private readonly release?: () => Promise<void>;
  private closed = false;

  private constructor(records: RecordCollection, release?: () => Promise<void>) {
    this.records = records;
    this.release = release;
  }

  /**
   * Connect with the official client. The client is closed again if the
   * connection cannot be set up.
   */
  static async connect<T = unknown>(target: MongoTarget): Promise<MongoRepository<T>> {
    // Loaded on demand so importing this package never touches the driver
    const { MongoClient } = await import("mongodb");
    const client = new MongoClient(target.uri);
    try {
      await client.connect();
      const col = client.db(target.database).collection<RecordDocument>(target.collection);
      return new MongoRepository<T>(wrapCollection(col), () => client.close());
    } catch (err) {
      await client.close();
      throw err;
    }
  }

  /** Use an already-built collection; `release` runs on close. */
  static fromCollection<T = unknown>(
    records: RecordCollection,
    release?: () => Promise<void>
  ): MongoRepository<T> {
    return new MongoRepository<T>(records, release);
  }

  async read(key: string): Promise<StoredRecord<T> | undefined> {
    this.assertOpen();
    assertKey(key);
    const doc = await this.records.find(key);
    return doc === null ? undefined : { key, value: parseBody<T>(doc.body), revision: doc.revision };
  }

  async write(key: string, value: T, options?: WriteOptions): Promise<StoredRecord<T>> {
    this.assertOpen();
    assertKey(key);
    const expected = expectedRevision(options);
    const body = serialize("mongodb", key, value);

    let revision: number | null;
    if (expected === undefined) {
      revision = await this.records.bump(key, body);
    } else if (expected === 0) {
      revision = (await this.records.create(key, body)) ? 1 : null;
    } else {
      revision = await this.records.advance(key, expected, body);
    }
    if (revision === null) throw await this.conflict(key, expected ?? 0);
    return { key, value: parseBody<T>(body), revision };
  }

  async remove(key: string, options?: RemoveOptions): Promise<boolean> {
    this.assertOpen();
    assertKey(key);
    const expected = expectedRevision(options);
    if (expected === undefined) return this.records.delete(key);
    if (expected === 0) {
      if ((await this.records.find(key)) !== null) throw await this.conflict(key, 0);
      return false;
    }
    if (await this.records.delete(key, expected)) return true;
    throw await this.conflict(key, expected);
  }

  async keys(prefix = ""): Promise<string[]> {
    this.assertOpen();
    return selectKeys(await this.records.keysWithPrefix(prefix), prefix);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.release) await this.release();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async conflict(key: string, expected: number): Promise<RevisionConflictError> {
    const current = await this.records.find(key);
    return new RevisionConflictError("mongodb", key, expected, current?.revision ?? 0);
  }

  private assertOpen(): void {
    if (this.closed) throw new RepositoryClosedError("mongodb");
  }
}

function decodeDatabase(url: URL): string {
  try {
    return decodeURIComponent(url.pathname.replace(/^\//, ""));
  } catch (err) {
    if (err instanceof URIError) {
      throw new Error(`[mongodb] malformed database name in "${url.href}"`);
    }
    throw err;
  }
}

/**
 * Split a `mongodb://` / `mongodb+srv://` URL into what MongoClient needs.
 *
 * The path names the database and the `collection` query parameter the
 * collection; every other parameter stays in the connection string.
 */
export function mongoTarget(url: URL): MongoTarget {
  const database = decodeDatabase(url) || DEFAULT_DATABASE;
  const conn = new URL(url.href);
  const collection = conn.searchParams.get("collection") ?? DEFAULT_COLLECTION;
  conn.searchParams.delete("collection");
  return { uri: conn.href, database, collection };
}

/**
 * The provider context is either absent (connect for real) or
 * `{ collection }`, a RecordCollection to use instead of connecting.
 */
function injectedCollection(provider: unknown): RecordCollection | undefined {
  if (provider === undefined) return undefined;
  if (typeof provider === "object" && provider !== null && "collection" in provider) {
    const { collection } = provider;
    if (isRecordCollection(collection)) return collection;
  }
  throw new InvalidContextError("mongodb", "expected undefined or { collection: RecordCollection }");
}

export const mongoDriver: StorageDriver = {
  async open(url, provider) {
    const injected = injectedCollection(provider);
    if (injected !== undefined) return MongoRepository.fromCollection(injected);
    return MongoRepository.connect(mongoTarget(url));
  },
};
