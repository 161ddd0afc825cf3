import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import type { Driver, Repository } from "./types.js";
import {
  DuplicateRegistrationError,
  InvalidAddressError,
  UnknownDriverError,
} from "./errors.js";
import { DriverRegistry } from "./registry.js";

// ---------------------------------------------------------------------------
// Stub driver that records every call it receives
// ---------------------------------------------------------------------------

class StubRepository implements Repository {
  closeCount = 0;

  async close(): Promise<void> {
    this.closeCount++;
  }
}

interface OpenCall {
  url: URL;
  provider: unknown;
}

function createStubDriver() {
  const calls: OpenCall[] = [];
  const repository = new StubRepository();
  const driver: Driver<StubRepository> = {
    async open(url, provider) {
      calls.push({ url, provider });
      return repository;
    },
  };
  return { driver, calls, repository };
}

function createRegistry(label = "test") {
  const logger = { error: vi.fn<[string], void>() };
  const registry = new DriverRegistry<StubRepository>(label, { logger });
  return { registry, logger };
}

// ---------------------------------------------------------------------------
// register / drivers
// ---------------------------------------------------------------------------

describe("DriverRegistry — registration", () => {
  it("lists a single registered driver", () => {
    const { registry } = createRegistry();
    registry.register("file", createStubDriver().driver);
    expect(registry.drivers()).toEqual(["file"]);
  });

  it("lists drivers sorted regardless of registration order", () => {
    const { registry } = createRegistry();
    registry.register("s3", createStubDriver().driver);
    registry.register("file", createStubDriver().driver);
    expect(registry.drivers()).toEqual(["file", "s3"]);
  });

  it("returns an empty list when nothing is registered", () => {
    const { registry } = createRegistry();
    expect(registry.drivers()).toEqual([]);
  });

  it("returns a copy that callers cannot use to mutate the table", () => {
    const { registry } = createRegistry();
    registry.register("file", createStubDriver().driver);
    registry.drivers().push("ghost");
    expect(registry.drivers()).toEqual(["file"]);
  });

  it("throws DuplicateRegistrationError when a name is registered twice", () => {
    const { registry } = createRegistry("storage");
    registry.register("file", createStubDriver().driver);
    expect(() => registry.register("file", createStubDriver().driver)).toThrow(
      DuplicateRegistrationError
    );
  });

  it("duplicate registration error names the registry and the driver", () => {
    const { registry } = createRegistry("storage");
    registry.register("file", createStubDriver().driver);
    let caught: unknown;
    try {
      registry.register("file", createStubDriver().driver);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DuplicateRegistrationError);
    if (!(caught instanceof DuplicateRegistrationError)) return;
    expect(caught.message).toBe("Register called twice for storage driver file");
    expect(caught.registryLabel).toBe("storage");
    expect(caught.driverName).toBe("file");
    expect(caught.name).toBe("DuplicateRegistrationError");
  });

  it("logs the duplicate before throwing", () => {
    const { registry, logger } = createRegistry("storage");
    registry.register("file", createStubDriver().driver);
    expect(() => registry.register("file", createStubDriver().driver)).toThrow();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      "[dialkit] Register called twice for storage driver file"
    );
  });

  it("keeps the first driver after a rejected duplicate", () => {
    const { registry } = createRegistry();
    const first = createStubDriver().driver;
    registry.register("file", first);
    expect(() => registry.register("file", createStubDriver().driver)).toThrow();
    expect(registry.driverByName("file")).toBe(first);
  });

  describe("default logger", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("falls back to console.error", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const registry = new DriverRegistry<StubRepository>("database");
      registry.register("pg", createStubDriver().driver);
      expect(() => registry.register("pg", createStubDriver().driver)).toThrow(
        DuplicateRegistrationError
      );
      expect(spy).toHaveBeenCalledWith("[dialkit] Register called twice for database driver pg");
    });
  });
});

// ---------------------------------------------------------------------------
// driverByName / driver
// ---------------------------------------------------------------------------

describe("DriverRegistry — lookup", () => {
  let registry: DriverRegistry<StubRepository>;
  let fileDriver: Driver<StubRepository>;

  beforeEach(() => {
    registry = createRegistry().registry;
    fileDriver = createStubDriver().driver;
    registry.register("file", fileDriver);
  });

  it("returns the registered driver by name", () => {
    expect(registry.driverByName("file")).toBe(fileDriver);
  });

  it("throws UnknownDriverError carrying the requested name", () => {
    expect(() => registry.driverByName("ftp")).toThrow(UnknownDriverError);
    expect(() => registry.driverByName("ftp")).toThrow('unknown driver "ftp" (forgotten import?)');
  });

  it("name lookup is case-sensitive", () => {
    expect(() => registry.driverByName("FILE")).toThrow('unknown driver "FILE" (forgotten import?)');
  });

  it("resolves a driver from a URL scheme", () => {
    expect(registry.driver(new URL("file:///tmp"))).toBe(fileDriver);
  });

  it("resolves a driver from a URL string", () => {
    expect(registry.driver("file:///var/data")).toBe(fileDriver);
  });

  it("reports an unknown scheme with the scheme name", () => {
    expect(() => registry.driver(new URL("ftp://host"))).toThrow(
      'unknown driver "ftp" (forgotten import?)'
    );
  });

  it("rejects a descriptor without a scheme", () => {
    expect(() => registry.driver("relative/path")).toThrow(InvalidAddressError);
    expect(() => registry.driver("relative/path")).toThrow(
      'invalid database source name "relative/path"'
    );
  });

  it("invalid address error exposes the literal descriptor", () => {
    let caught: unknown;
    try {
      registry.driver("");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidAddressError);
    if (!(caught instanceof InvalidAddressError)) return;
    expect(caught.descriptor).toBe("");
    expect(caught.message).toBe('invalid database source name ""');
  });

  it("accepts schemes containing '+'", () => {
    const srv = createStubDriver().driver;
    registry.register("mongodb+srv", srv);
    expect(registry.driver("mongodb+srv://cluster.example.test/app")).toBe(srv);
  });

  it("matches parsed schemes in lower case", () => {
    // URL parsing folds the scheme to lower case
    expect(registry.driver("FILE:///tmp")).toBe(fileDriver);
  });
});

// ---------------------------------------------------------------------------
// open
// ---------------------------------------------------------------------------

describe("DriverRegistry — open", () => {
  it("passes the same URL and provider through to the driver", async () => {
    const { registry } = createRegistry();
    const stub = createStubDriver();
    registry.register("file", stub.driver);

    const url = new URL("file:///tmp");
    const ctx = { services: "test" };
    const repo = await registry.open(url, ctx);

    expect(stub.calls).toHaveLength(1);
    const [call] = stub.calls;
    expect(call?.url).toBe(url);
    expect(call?.url.protocol).toBe("file:");
    expect(call?.url.pathname).toBe("/tmp");
    expect(call?.provider).toBe(ctx);
    expect(repo).toBe(stub.repository);
  });

  it("parses string descriptors before handing them to the driver", async () => {
    const { registry } = createRegistry();
    const stub = createStubDriver();
    registry.register("file", stub.driver);

    await registry.open("file:///tmp/data?mode=ro");

    expect(stub.calls[0]?.url.href).toBe("file:///tmp/data?mode=ro");
    expect(stub.calls[0]?.url.search).toBe("?mode=ro");
    expect(stub.calls[0]?.provider).toBeUndefined();
  });

  it("propagates the driver's failure unchanged", async () => {
    const { registry } = createRegistry();
    const failure = new Error("disk unavailable");
    registry.register("file", {
      async open() {
        throw failure;
      },
    });

    await expect(registry.open("file:///tmp")).rejects.toBe(failure);
  });

  it("rejects with InvalidAddressError without calling any driver", async () => {
    const { registry } = createRegistry();
    const stub = createStubDriver();
    registry.register("file", stub.driver);

    await expect(registry.open("relative/path")).rejects.toThrow(
      'invalid database source name "relative/path"'
    );
    expect(stub.calls).toHaveLength(0);
  });

  it("rejects with UnknownDriverError for an unregistered scheme", async () => {
    const { registry } = createRegistry();
    await expect(registry.open("ftp://host")).rejects.toBeInstanceOf(UnknownDriverError);
  });

  it("keeps no reference to returned repositories", async () => {
    const { registry } = createRegistry();
    const stub = createStubDriver();
    registry.register("file", stub.driver);

    const repo = await registry.open("file:///tmp");
    await repo.close();

    expect(stub.repository.closeCount).toBe(1);
  });

  it("a pending driver open does not block other registry calls", async () => {
    const { registry } = createRegistry();
    const gate: { release?: () => void } = {};
    const repository = new StubRepository();
    registry.register("slow", {
      open: () =>
        new Promise<StubRepository>((resolve) => {
          gate.release = () => resolve(repository);
        }),
    });

    const pending = registry.open("slow://host");

    const fast = createStubDriver();
    registry.register("fast", fast.driver);
    expect(registry.drivers()).toEqual(["fast", "slow"]);
    expect(await registry.open("fast://host")).toBe(fast.repository);

    gate.release?.();
    expect(await pending).toBe(repository);
  });
});

// ---------------------------------------------------------------------------
// Concurrent use
// ---------------------------------------------------------------------------

describe("DriverRegistry — concurrent use", () => {
  it("registers and resolves many drivers from concurrent tasks", async () => {
    const { registry } = createRegistry();
    const names = Array.from({ length: 50 }, (_, i) => `driver-${i}`);
    const drivers = new Map(names.map((name) => [name, createStubDriver().driver]));

    await Promise.all(
      names.map(async (name) => {
        await Promise.resolve();
        const driver = drivers.get(name);
        if (driver) registry.register(name, driver);
      })
    );

    const resolved = await Promise.all(
      names.map(async (name) => {
        await Promise.resolve();
        return registry.driver(`${name}://host`);
      })
    );

    resolved.forEach((driver, i) => {
      expect(driver).toBe(drivers.get(names[i] ?? ""));
    });
    expect(registry.drivers()).toEqual([...names].sort());
  });

  it("exactly one of two racing same-name registrations wins", async () => {
    const { registry, logger } = createRegistry("storage");
    const a = createStubDriver().driver;
    const b = createStubDriver().driver;

    const results = await Promise.allSettled(
      [a, b].map(async (driver) => {
        await Promise.resolve();
        registry.register("file", driver);
      })
    );

    const rejected = results.filter((r) => r.status === "rejected");
    expect(rejected).toHaveLength(1);
    const [failure] = rejected;
    if (failure?.status === "rejected") {
      expect(failure.reason).toBeInstanceOf(DuplicateRegistrationError);
    }
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(registry.driverByName("file")).toBe(a);
  });
});
