import { DriverRegistry } from "@dialkit/dial-registry";
import type { Descriptor } from "@dialkit/dial-registry";
import {
  DEFAULT_STORAGE_URL,
  DIAL_STORAGE_URL_ENV,
  type StorageRepository,
} from "./types.js";
import { memoryDriver } from "./memory-repository.js";
import { fileDriver } from "./file-repository.js";

/**
 * storageDrivers
 *
 * The registry for the "storage" connection kind.
 *
 * Built-in drivers:
 *   "memory" → MemoryRepository
 *   "file"   → FileRepository
 *
 * Other drivers (dial-storage-sqlite, dial-storage-mongodb …) register
 * themselves here when their package is imported.
 */
export const storageDrivers = new DriverRegistry<StorageRepository>("storage");

storageDrivers.register("memory", memoryDriver);
storageDrivers.register("file", fileDriver);

/**
 * Open a storage repository.
 *
 * @param descriptor Connection URL. When omitted, reads
 *                   `process.env.DIAL_STORAGE_URL`, then defaults to
 *                   `memory://`.
 * @param provider   Context forwarded to the driver.
 *
 * @example
 * import "@dialkit/dial-storage-sqlite";
 * const repo = await openStorage("sqlite:///var/lib/app/data.db");
 * await repo.write("session:abc", { user: "ada" });
 * await repo.close();
 */
export async function openStorage(
  descriptor?: Descriptor,
  provider?: unknown
): Promise<StorageRepository> {
  return storageDrivers.open(descriptor ?? configuredStorageUrl(), provider);
}

function configuredStorageUrl(): string {
  const raw = process.env[DIAL_STORAGE_URL_ENV]?.trim();
  return raw ? raw : DEFAULT_STORAGE_URL;
}
