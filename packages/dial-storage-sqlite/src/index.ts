/**
 * @dialkit/dial-storage-sqlite
 *
 * SQLite-backed storage driver. Importing this package registers it in
 * `storageDrivers` under the scheme `"sqlite"`:
 *
 *   import "@dialkit/dial-storage-sqlite";
 *   const repo = await openStorage("sqlite:///var/lib/app/data.db");
 *
 * With DIAL_STORAGE_URL=sqlite:///… the same import makes `openStorage()`
 * pick it up from the environment.
 */

import { storageDrivers } from "@dialkit/dial-storage";
import { sqliteDriver } from "./sqlite-repository.js";

storageDrivers.register("sqlite", sqliteDriver);

export { SqliteRepository, sqliteDriver, databasePath } from "./sqlite-repository.js";
