/**
 * @dialkit/dial-registry
 *
 * Generic driver registry: drivers register under a name, callers open
 * connections by URL and the scheme picks the driver.
 *
 * Quick start:
 * ```ts
 * import { DriverRegistry } from "@dialkit/dial-registry";
 *
 * const drivers = new DriverRegistry<MyRepository>("queue");
 * drivers.register("amqp", amqpDriver);
 *
 * const repo = await drivers.open("amqp://broker:5672/jobs", services);
 * await repo.close();
 * ```
 */

export type {
  Descriptor,
  Driver,
  DriverRegistryOptions,
  RegistryLogger,
  Repository,
} from "./types.js";
export {
  DuplicateRegistrationError,
  InvalidAddressError,
  UnknownDriverError,
} from "./errors.js";
export { DriverRegistry } from "./registry.js";
