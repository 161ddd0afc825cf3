/**
 * dial-registry — Core contracts
 *
 * A connection kind (storage, database, queue …) extends `Repository` with
 * the operations its connections provide, and narrows `Driver` to produce
 * that richer type.
 */

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

/**
 * An established connection handed out by a driver.
 *
 * The caller that receives a Repository owns it and must call `close()`
 * exactly once when done. The registry keeps no reference to it.
 */
export interface Repository {
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

/**
 * A pluggable implementation that turns a connection URL into a Repository.
 *
 * @typeParam R The Repository type this driver produces.
 */
export interface Driver<R extends Repository> {
  /**
   * Open a new Repository for `url`.
   *
   * `provider` is an opaque context supplied by the caller. A driver that
   * needs other services from it must check its shape and reject when it is
   * unusable.
   */
  open(url: URL, provider: unknown): Promise<R>;
}

/** A connection descriptor: a parsed URL or a string holding an absolute URL. */
export type Descriptor = URL | string;

// ---------------------------------------------------------------------------
// Registry options
// ---------------------------------------------------------------------------

export interface RegistryLogger {
  error(message: string): void;
}

export interface DriverRegistryOptions {
  /** Sink for registry diagnostics. Defaults to `console`. */
  logger?: RegistryLogger;
}
