import type { Collection, Filter } from "mongodb";

/** One record per document, keyed by `_id`. */
export interface RecordDocument {
  _id: string;
  revision: number;
  /** JSON text of the value */
  body: string;
}

/**
 * The record operations MongoRepository needs from a collection. Tests
 * inject an in-memory implementation through the provider context.
 */
export interface RecordCollection {
  find(key: string): Promise<RecordDocument | null>;
  /** Write unconditionally; resolves the new revision. */
  bump(key: string, body: string): Promise<number>;
  /** Insert at revision 1; resolves `false` when the key already exists. */
  create(key: string, body: string): Promise<boolean>;
  /** Replace the body of a record still at `revision`; `null` when it is not. */
  advance(key: string, revision: number, body: string): Promise<number | null>;
  /** Delete, optionally only at `revision`; resolves whether a record went. */
  delete(key: string, revision?: number): Promise<boolean>;
  keysWithPrefix(prefix: string): Promise<string[]>;
}

const DUPLICATE_KEY = 11000;

function isDuplicateKey(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === DUPLICATE_KEY;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Adapt a collection from the official driver to RecordCollection. */
export function wrapCollection(col: Collection<RecordDocument>): RecordCollection {
  return {
    find: (key) => col.findOne({ _id: key }),

    async bump(key, body) {
      const doc = await col.findOneAndUpdate(
        { _id: key },
        { $inc: { revision: 1 }, $set: { body } },
        { upsert: true, returnDocument: "after" }
      );
      if (doc === null) throw new Error(`[mongodb] upsert of ${JSON.stringify(key)} returned nothing`);
      return doc.revision;
    },

    async create(key, body) {
      try {
        await col.insertOne({ _id: key, revision: 1, body });
        return true;
      } catch (err) {
        if (isDuplicateKey(err)) return false;
        throw err;
      }
    },

    async advance(key, revision, body) {
      const doc = await col.findOneAndUpdate(
        { _id: key, revision },
        { $set: { body, revision: revision + 1 } },
        { returnDocument: "after" }
      );
      return doc === null ? null : doc.revision;
    },

    async delete(key, revision) {
      const filter: Filter<RecordDocument> =
        revision === undefined ? { _id: key } : { _id: key, revision };
      const { deletedCount } = await col.deleteOne(filter);
      return deletedCount > 0;
    },

    async keysWithPrefix(prefix) {
      const filter: Filter<RecordDocument> =
        prefix === "" ? {} : { _id: { $regex: `^${escapeRegExp(prefix)}` } };
      const docs = await col.find(filter).project<{ _id: string }>({ _id: 1 }).toArray();
      return docs.map((d) => d._id);
    },
  };
}

const RECORD_METHODS = ["find", "bump", "create", "advance", "delete", "keysWithPrefix"] as const;

export function isRecordCollection(value: unknown): value is RecordCollection {
  if (typeof value !== "object" || value === null) return false;
  return RECORD_METHODS.every((m) => typeof Reflect.get(value, m) === "function");
}
