/**
 * @dialkit/dial-storage
 *
 * The "storage" connection kind: revisioned JSON records behind a
 * repository contract, and the registry its drivers plug into.
 *
 * ```ts
 * import { openStorage } from "@dialkit/dial-storage";
 *
 * const repo = await openStorage("file:///var/lib/app/records");
 * const first = await repo.write("orders:17", { total: 40 });
 * await repo.write("orders:17", { total: 45 }, { ifRevision: first.revision });
 * await repo.close();
 * ```
 */

export type {
  RemoveOptions,
  StorageDriver,
  StorageRepository,
  StoredRecord,
  WriteOptions,
} from "./types.js";
export {
  DIAL_STORAGE_URL_ENV,
  DEFAULT_STORAGE_URL,
  InvalidContextError,
  InvalidKeyError,
  RepositoryClosedError,
  RevisionConflictError,
} from "./types.js";
export {
  assertKey,
  checkRevision,
  expectedRevision,
  parseBody,
  selectKeys,
  serialize,
} from "./records.js";

export { MemoryRepository, memoryDriver } from "./memory-repository.js";
export { FileRepository, fileDriver, encodeKey, decodeKey } from "./file-repository.js";

export { storageDrivers, openStorage } from "./registry.js";
