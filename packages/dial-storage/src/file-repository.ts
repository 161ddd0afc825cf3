import { promises as fs } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type {
  RemoveOptions,
  StorageDriver,
  StorageRepository,
  StoredRecord,
  WriteOptions,
} from "./types.js";
import { RepositoryClosedError } from "./types.js";
import { assertKey, checkRevision, parseBody, selectKeys, serialize } from "./records.js";

const SUFFIX = ".json";

// Characters encodeURIComponent leaves alone but a file name should not carry
const UNSAFE_IN_NAMES = /[!'()*.~]/g;
const ENCODED_NAME = /^(?:[A-Za-z0-9_-]|~[0-9A-F]{2})+$/;

/**
 * File-name stem for a key: percent-encoding with `~` as the escape
 * character, so only `[A-Za-z0-9_-]` and `~XX` appear.
 *
 *   "orders:2024/17" → "orders~3A2024~2F17"
 */
export function encodeKey(key: string): string {
  return encodeURIComponent(key)
    .replace(UNSAFE_IN_NAMES, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%/g, "~");
}

export function decodeKey(stem: string): string {
  return decodeURIComponent(stem.replace(/~/g, "%"));
}

/** Key stored in a directory entry, or `undefined` for files this repository did not write. */
function keyOfFile(name: string): string | undefined {
  if (!name.endsWith(SUFFIX)) return undefined;
  const stem = name.slice(0, -SUFFIX.length);
  if (!ENCODED_NAME.test(stem)) return undefined;
  let key: string;
  try {
    key = decodeKey(stem);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
  return encodeKey(key) === stem ? key : undefined;
}

interface Envelope<T> {
  revision: unknown;
  value: T;
}

/**
 * FileRepository
 *
 * One file per record inside a data directory, created on first write:
 *
 *   <dir>/orders~3A17.json  →  {"revision":3,"value":{…}}
 *
 * Writes go to a staging file that is renamed over the record, and writes
 * and removals run one at a time per repository.
 */
export class FileRepository<T = unknown> implements StorageRepository<T> {
  readonly directory: string;
  private closed = false;
  private pending: Promise<unknown> = Promise.resolve();
  private staged = 0;

  constructor(directory: string) {
    this.directory = directory;
  }

  async read(key: string): Promise<StoredRecord<T> | undefined> {
    this.assertOpen();
    assertKey(key);
    const stored = await this.load(key);
    return stored && { key, value: stored.value, revision: stored.revision };
  }

  async write(key: string, value: T, options?: WriteOptions): Promise<StoredRecord<T>> {
    this.assertOpen();
    assertKey(key);
    const body = serialize("file", key, value);
    return this.exclusive(async () => {
      const current = (await this.load(key))?.revision ?? 0;
      checkRevision("file", key, current, options);
      const revision = current + 1;
      const target = this.pathOf(key);
      const staging = `${target}.${process.pid}-${++this.staged}.tmp`;
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(staging, `{"revision":${revision},"value":${body}}\n`, "utf-8");
      await fs.rename(staging, target);
      return { key, value: parseBody<T>(body), revision };
    });
  }

  async remove(key: string, options?: RemoveOptions): Promise<boolean> {
    this.assertOpen();
    assertKey(key);
    return this.exclusive(async () => {
      const current = (await this.load(key))?.revision ?? 0;
      checkRevision("file", key, current, options);
      if (current === 0) return false;
      await fs.unlink(this.pathOf(key));
      return true;
    });
  }

  async keys(prefix?: string): Promise<string[]> {
    this.assertOpen();
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const keys: string[] = [];
    for (const name of names) {
      const key = keyOfFile(name);
      if (key !== undefined) keys.push(key);
    }
    return selectKeys(keys, prefix);
  }

  /** Waits for queued writes, then refuses further use. */
  async close(): Promise<void> {
    this.closed = true;
    await this.pending;
  }

  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.pending.then(task, task);
    // Later tasks wait for this one whether or not it fails; `run` carries the failure
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async load(key: string): Promise<{ revision: number; value: T } | undefined> {
    const file = this.pathOf(key);
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    const envelope = parseBody<Envelope<T> | null>(text);
    if (
      typeof envelope !== "object" ||
      envelope === null ||
      !("value" in envelope) ||
      typeof envelope.revision !== "number" ||
      !Number.isInteger(envelope.revision) ||
      envelope.revision < 1
    ) {
      throw new Error(`[file] malformed record file "${file}"`);
    }
    return { revision: envelope.revision, value: envelope.value };
  }

  private pathOf(key: string): string {
    return path.join(this.directory, `${encodeKey(key)}${SUFFIX}`);
  }

  private assertOpen(): void {
    if (this.closed) throw new RepositoryClosedError("file");
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** `file:///abs/dir` — stores records under the URL's path. */
export const fileDriver: StorageDriver = {
  async open(url) {
    return new FileRepository(fileURLToPath(url));
  },
};
