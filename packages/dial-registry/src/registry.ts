import type {
  Descriptor,
  Driver,
  DriverRegistryOptions,
  RegistryLogger,
  Repository,
} from "./types.js";
import {
  DuplicateRegistrationError,
  InvalidAddressError,
  UnknownDriverError,
} from "./errors.js";

/**
 * DriverRegistry
 *
 * Name → driver table for one connection kind. Create one instance per kind
 * (storage, database …) and let each driver module register itself against
 * it when imported:
 *
 * ```ts
 * export const storageDrivers = new DriverRegistry<StorageRepository>("storage");
 *
 * // in dial-storage-sqlite:
 * storageDrivers.register("sqlite", sqliteDriver);
 *
 * // application code:
 * const repo = await storageDrivers.open("sqlite:///var/lib/app.db");
 * ```
 *
 * The URL scheme picks the driver; the rest of the URL is the driver's
 * business. Entries are never removed or replaced.
 *
 * Every method runs to completion without yielding, so calls from concurrent
 * tasks cannot interleave inside the table. `open()` hands control to the
 * driver only after the lookup is done.
 */
export class DriverRegistry<R extends Repository, D extends Driver<R> = Driver<R>> {
  readonly label: string;
  private readonly entries = new Map<string, D>();
  private readonly logger: RegistryLogger;

  constructor(label: string, options: DriverRegistryOptions = {}) {
    this.label = label;
    this.logger = options.logger ?? console;
  }

  /**
   * Make `driver` available under `name`.
   *
   * @throws {DuplicateRegistrationError} if `name` is already registered.
   */
  register(name: string, driver: D): void {
    if (this.entries.has(name)) {
      const err = new DuplicateRegistrationError(this.label, name);
      this.logger.error(`[dialkit] ${err.message}`);
      throw err;
    }
    this.entries.set(name, driver);
  }

  /** Names of the registered drivers, sorted ascending. */
  drivers(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Resolve the driver for a descriptor's scheme.
   *
   * @throws {InvalidAddressError} if the descriptor is not an absolute URL.
   * @throws {UnknownDriverError} if no driver handles the scheme.
   */
  driver(descriptor: Descriptor): D {
    return this.driverByName(schemeOf(parseDescriptor(descriptor)));
  }

  /**
   * @throws {UnknownDriverError} if nothing is registered under `name`.
   */
  driverByName(name: string): D {
    const driver = this.entries.get(name);
    if (driver === undefined) throw new UnknownDriverError(name);
    return driver;
  }

  /**
   * Resolve the driver for `descriptor` and open a Repository with it.
   *
   * The driver receives the parsed URL and `provider` as given, and its
   * result or rejection comes back unchanged. The caller owns the returned
   * Repository and must close it.
   */
  async open(descriptor: Descriptor, provider?: unknown): Promise<R> {
    const url = parseDescriptor(descriptor);
    const driver = this.driverByName(schemeOf(url));
    return driver.open(url, provider);
  }
}

// ---------------------------------------------------------------------------
// Descriptor helpers
// ---------------------------------------------------------------------------

function parseDescriptor(descriptor: Descriptor): URL {
  if (descriptor instanceof URL) return descriptor;
  try {
    return new URL(descriptor);
  } catch {
    throw new InvalidAddressError(descriptor);
  }
}

function schemeOf(url: URL): string {
  // URL.protocol keeps the trailing ":"
  return url.protocol.slice(0, -1);
}
