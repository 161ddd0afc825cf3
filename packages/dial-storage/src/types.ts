/**
 * dial-storage — Core type definitions
 *
 * A storage repository holds JSON records under string keys. Every record
 * carries a revision that starts at 1 and grows by one on each write, so
 * callers can make a write or a removal conditional on what they last read.
 */

import type { Driver, Repository } from "@dialkit/dial-registry";

export interface StoredRecord<T> {
  readonly key: string;
  readonly value: T;
  readonly revision: number;
}

export interface WriteOptions {
  /**
   * Apply only if the record is currently at this revision. `0` means the
   * key must not exist yet.
   */
  ifRevision?: number;
}

export type RemoveOptions = WriteOptions;

/**
 * @typeParam T Shape of the stored values. Values must survive
 *              `JSON.stringify`; reads always return a fresh copy.
 */
export interface StorageRepository<T = unknown> extends Repository {
  /** The record under `key`, or `undefined` when there is none. */
  read(key: string): Promise<StoredRecord<T> | undefined>;

  /**
   * Store `value` under `key` and return the record as written.
   * Rejects with `RevisionConflictError` when `ifRevision` does not match.
   */
  write(key: string, value: T, options?: WriteOptions): Promise<StoredRecord<T>>;

  /**
   * Delete the record under `key`. Resolves `false` when there was nothing
   * to delete.
   */
  remove(key: string, options?: RemoveOptions): Promise<boolean>;

  /** Keys starting with `prefix` (every key by default), sorted ascending. */
  keys(prefix?: string): Promise<string[]>;

  /** Idempotent. Every other operation rejects with `RepositoryClosedError` afterwards. */
  close(): Promise<void>;
}

export type StorageDriver = Driver<StorageRepository>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Environment variable holding the descriptor `openStorage()` falls back to. */
export const DIAL_STORAGE_URL_ENV = "DIAL_STORAGE_URL";

export const DEFAULT_STORAGE_URL = "memory://";

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

export class RepositoryClosedError extends Error {
  readonly driverName: string;

  constructor(driverName: string) {
    super(`[${driverName}] repository is closed`);
    this.name = "RepositoryClosedError";
    this.driverName = driverName;
  }
}

/**
 * A conditional write or removal found the record at another revision.
 * `actual` is 0 when the key does not exist.
 */
export class RevisionConflictError extends Error {
  readonly key: string;
  readonly expected: number;
  readonly actual: number;

  constructor(driverName: string, key: string, expected: number, actual: number) {
    super(
      `[${driverName}] revision conflict on ${JSON.stringify(key)}: expected ${expected}, found ${actual}`
    );
    this.name = "RevisionConflictError";
    this.key = key;
    this.expected = expected;
    this.actual = actual;
  }
}

/** Keys are non-empty strings without unpaired surrogates. */
export class InvalidKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`invalid record key ${JSON.stringify(key)}`);
    this.name = "InvalidKeyError";
    this.key = key;
  }
}

/**
 * Thrown by a driver whose provider context is missing something it needs.
 */
export class InvalidContextError extends Error {
  readonly driverName: string;

  constructor(driverName: string, reason: string) {
    super(`[${driverName}] unusable provider context: ${reason}`);
    this.name = "InvalidContextError";
    this.driverName = driverName;
  }
}
