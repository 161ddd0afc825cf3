import Database from "better-sqlite3";
import {
  RepositoryClosedError,
  assertKey,
  checkRevision,
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

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS dial_records (
    key      TEXT    PRIMARY KEY,
    revision INTEGER NOT NULL,
    body     TEXT    NOT NULL
  ) WITHOUT ROWID
`;

interface RecordRow {
  revision: number;
  body: string;
}

interface Prepared {
  select: Database.Statement<[string], RecordRow>;
  keysFrom: Database.Statement<[string], { key: string }>;
  write: (key: string, body: string, options?: WriteOptions) => number;
  remove: (key: string, options?: RemoveOptions) => boolean;
}

function prepare(db: Database.Database): Prepared {
  db.exec(SCHEMA);
  const select = db.prepare<[string], RecordRow>(
    "SELECT revision, body FROM dial_records WHERE key = ?"
  );
  const upsert = db.prepare<[string, number, string]>(
    `INSERT INTO dial_records (key, revision, body) VALUES (?, ?, ?)
     ON CONFLICT(key) DO UPDATE SET revision = excluded.revision, body = excluded.body`
  );
  const remove = db.prepare<[string]>("DELETE FROM dial_records WHERE key = ?");
  return {
    select,
    keysFrom: db.prepare<[string], { key: string }>("SELECT key FROM dial_records WHERE key >= ?"),
    write: db.transaction((key: string, body: string, options?: WriteOptions) => {
      const current = select.get(key)?.revision ?? 0;
      checkRevision("sqlite", key, current, options);
      upsert.run(key, current + 1, body);
      return current + 1;
    }),
    remove: db.transaction((key: string, options?: RemoveOptions) => {
      checkRevision("sqlite", key, select.get(key)?.revision ?? 0, options);
      return remove.run(key).changes > 0;
    }),
  };
}

/** Closes the handle when the file cannot take the schema, e.g. it is not a database. */
function prepareOrClose(db: Database.Database): Prepared {
  try {
    return prepare(db);
  } catch (err) {
    db.close();
    throw err;
  }
}

/**
 * Records in a single `dial_records` table. Conditional writes check and
 * bump the revision inside one transaction.
 */
export class SqliteRepository<T = unknown> implements StorageRepository<T> {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly statements: Prepared;
  private closed = false;

  constructor(path: string) {
    this.path = path;
    this.db = new Database(path);
    this.statements = prepareOrClose(this.db);
  }

  async read(key: string): Promise<StoredRecord<T> | undefined> {
    this.assertOpen();
    assertKey(key);
    const row = this.statements.select.get(key);
    return row && { key, value: parseBody<T>(row.body), revision: row.revision };
  }

  async write(key: string, value: T, options?: WriteOptions): Promise<StoredRecord<T>> {
    this.assertOpen();
    assertKey(key);
    const body = serialize("sqlite", key, value);
    const revision = this.statements.write(key, body, options);
    return { key, value: parseBody<T>(body), revision };
  }

  async remove(key: string, options?: RemoveOptions): Promise<boolean> {
    this.assertOpen();
    assertKey(key);
    return this.statements.remove(key, options);
  }

  async keys(prefix = ""): Promise<string[]> {
    this.assertOpen();
    // The range only narrows the scan; the prefix match happens in selectKeys
    const rows = this.statements.keysFrom.all(prefix);
    return selectKeys(
      rows.map((r) => r.key),
      prefix
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new RepositoryClosedError("sqlite");
  }
}

/**
 * Database file for a `sqlite:` URL.
 *
 *   sqlite:///var/lib/app.db  → /var/lib/app.db
 *   sqlite::memory:           → :memory:
 */
export function databasePath(url: URL): string {
  if (url.host !== "") {
    throw new Error(`[sqlite] remote hosts are not supported: "${url.host}"`);
  }
  const filename = decodePath(url);
  if (filename === "") throw new Error(`[sqlite] no database path in "${url.href}"`);
  return filename;
}

function decodePath(url: URL): string {
  try {
    return decodeURIComponent(url.pathname);
  } catch (err) {
    if (err instanceof URIError) throw new Error(`[sqlite] malformed path in "${url.href}"`);
    throw err;
  }
}

/** `sqlite:` — the provider context is not used. */
export const sqliteDriver: StorageDriver = {
  async open(url) {
    return new SqliteRepository(databasePath(url));
  },
};
