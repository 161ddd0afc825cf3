import { InvalidKeyError, RevisionConflictError, type WriteOptions } from "./types.js";

// Helpers every storage driver shares, so the record rules live in one place.

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function assertKey(key: string): void {
  if (key === "" || UNPAIRED_SURROGATE.test(key)) throw new InvalidKeyError(key);
}

/** The `ifRevision` a caller asked for, if any. */
export function expectedRevision(options?: WriteOptions): number | undefined {
  const expected = options?.ifRevision;
  if (expected === undefined) return undefined;
  if (!Number.isInteger(expected) || expected < 0) {
    throw new RangeError(`ifRevision must be a non-negative integer, got ${expected}`);
  }
  return expected;
}

export function checkRevision(
  driverName: string,
  key: string,
  current: number,
  options?: WriteOptions
): void {
  const expected = expectedRevision(options);
  if (expected !== undefined && expected !== current) {
    throw new RevisionConflictError(driverName, key, expected, current);
  }
}

export function serialize(driverName: string, key: string, value: unknown): string {
  const body: string | undefined = JSON.stringify(value);
  if (body === undefined) {
    throw new TypeError(`[${driverName}] value for ${JSON.stringify(key)} is not JSON-serialisable`);
  }
  return body;
}

/** Stored bodies are untyped JSON; `T` is the caller's claim about them. */
export function parseBody<T>(body: string): T {
  return JSON.parse(body) as T;
}

export function selectKeys(keys: Iterable<string>, prefix = ""): string[] {
  const selected: string[] = [];
  for (const key of keys) if (key.startsWith(prefix)) selected.push(key);
  return selected.sort();
}
