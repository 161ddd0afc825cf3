const quote = (value: string): string => JSON.stringify(value);

/**
 * Thrown when a descriptor is not an absolute URL.
 */
export class InvalidAddressError extends Error {
  readonly descriptor: string;

  constructor(descriptor: string) {
    super(`invalid database source name ${quote(descriptor)}`);
    this.name = "InvalidAddressError";
    this.descriptor = descriptor;
  }
}

/**
 * Thrown when no driver is registered under the requested name or scheme.
 */
export class UnknownDriverError extends Error {
  readonly driverName: string;

  constructor(driverName: string) {
    super(`unknown driver ${quote(driverName)} (forgotten import?)`);
    this.name = "UnknownDriverError";
    this.driverName = driverName;
  }
}

/**
 * Thrown by `register()` when the name is already taken.
 *
 * Drivers register themselves while their module loads, so this surfaces as
 * a failed import: a wiring fault that must stop startup, never a condition
 * to catch and carry on from.
 */
export class DuplicateRegistrationError extends Error {
  readonly registryLabel: string;
  readonly driverName: string;

  constructor(registryLabel: string, driverName: string) {
    super(`Register called twice for ${registryLabel} driver ${driverName}`);
    this.name = "DuplicateRegistrationError";
    this.registryLabel = registryLabel;
    this.driverName = driverName;
  }
}
