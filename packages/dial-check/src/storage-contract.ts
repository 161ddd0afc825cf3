/**
 * @dialkit/dial-check — storage contract
 *
 * Vitest suite every storage driver runs against repositories it opens.
 * Call it inside a `describe` block with a factory for a fresh, empty
 * repository:
 *
 * ```ts
 * describe("sqlite::memory:", () => {
 *   runStorageContractTests(() => storageDrivers.open("sqlite::memory:"));
 * });
 * ```
 *
 * Repositories are matched structurally so that dial-storage can depend on
 * this package for its own tests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";

export interface RecordLike {
  key: string;
  value: unknown;
  revision: number;
}

export interface RepositoryLike {
  read(key: string): Promise<RecordLike | undefined>;
  write(key: string, value: unknown, options?: { ifRevision?: number }): Promise<RecordLike>;
  remove(key: string, options?: { ifRevision?: number }): Promise<boolean>;
  keys(prefix?: string): Promise<string[]>;
  close(): Promise<void>;
}

export type RepositoryFactory = () => Promise<RepositoryLike> | RepositoryLike;

/** Keys whose characters tend to need escaping somewhere. */
const AWKWARD_KEYS = [
  "orders:17",
  "a/b/c",
  "snake_case",
  "double__underscore",
  "kebab-case",
  "double--dash",
  "with space",
  "tilde~key",
  "percent%41",
  "report.json",
  "..",
  "ünïcødé",
  "rocket 🚀",
];

function conflict(expected: number, actual: number) {
  return { name: "RevisionConflictError", expected, actual };
}

export function runStorageContractTests(factory: RepositoryFactory): void {
  let repo: RepositoryLike;

  beforeEach(async () => {
    repo = await factory();
  });

  afterEach(async () => {
    await repo.close();
  });

  describe("read / write", () => {
    it("reads nothing for an unknown key", async () => {
      expect(await repo.read("missing")).toBeUndefined();
    });

    it("starts a new record at revision 1", async () => {
      expect(await repo.write("orders:17", { total: 40 })).toEqual({
        key: "orders:17",
        value: { total: 40 },
        revision: 1,
      });
      expect(await repo.read("orders:17")).toEqual({
        key: "orders:17",
        value: { total: 40 },
        revision: 1,
      });
    });

    it("bumps the revision on every write", async () => {
      await repo.write("counter", 1);
      await repo.write("counter", 2);
      const third = await repo.write("counter", 3);
      expect(third.revision).toBe(3);
      expect(await repo.read("counter")).toEqual({ key: "counter", value: 3, revision: 3 });
    });

    it("round-trips nested JSON values", async () => {
      const value = { list: [1, "two", null], flags: { on: true }, text: "line\nbreak" };
      await repo.write("nested", value);
      expect((await repo.read("nested"))?.value).toEqual(value);
    });

    it("keeps no reference to the caller's object", async () => {
      const value = { n: 1 };
      await repo.write("copy", value);
      value.n = 2;
      expect((await repo.read("copy"))?.value).toEqual({ n: 1 });
    });

    it("rejects an empty key", async () => {
      await expect(repo.write("", 1)).rejects.toMatchObject({ name: "InvalidKeyError" });
      await expect(repo.read("")).rejects.toMatchObject({ name: "InvalidKeyError" });
    });

    it("rejects a value JSON cannot represent", async () => {
      await expect(repo.write("fn", undefined)).rejects.toThrow(TypeError);
      expect(await repo.read("fn")).toBeUndefined();
    });

    it.each(AWKWARD_KEYS)("stores the key %j as given", async (key) => {
      await repo.write(key, { key });
      expect(await repo.read(key)).toEqual({ key, value: { key }, revision: 1 });
      expect(await repo.keys()).toEqual([key]);
    });

    it("keeps keys that differ only in separators apart", async () => {
      const keys = ["a_:b", "a:_b", "a__b", "a--b", "a/-b"];
      for (const [i, key] of keys.entries()) await repo.write(key, i);
      for (const [i, key] of keys.entries()) expect((await repo.read(key))?.value).toBe(i);
      expect(await repo.keys()).toEqual(["a--b", "a/-b", "a:_b", "a_:b", "a__b"]);
    });
  });

  describe("conditional writes", () => {
    it("creates a record when ifRevision is 0", async () => {
      const created = await repo.write("job", "queued", { ifRevision: 0 });
      expect(created.revision).toBe(1);
    });

    it("refuses to create a record that exists", async () => {
      await repo.write("job", "queued");
      await expect(repo.write("job", "again", { ifRevision: 0 })).rejects.toMatchObject(
        conflict(0, 1)
      );
      expect((await repo.read("job"))?.value).toBe("queued");
    });

    it("updates when the revision matches", async () => {
      await repo.write("job", "queued");
      const next = await repo.write("job", "running", { ifRevision: 1 });
      expect(next).toEqual({ key: "job", value: "running", revision: 2 });
    });

    it("rejects a stale revision and leaves the record alone", async () => {
      await repo.write("job", "queued");
      await repo.write("job", "running");
      await expect(repo.write("job", "done", { ifRevision: 1 })).rejects.toMatchObject(
        conflict(1, 2)
      );
      expect(await repo.read("job")).toEqual({ key: "job", value: "running", revision: 2 });
    });

    it("rejects an update of a missing record", async () => {
      await expect(repo.write("ghost", 1, { ifRevision: 4 })).rejects.toMatchObject(
        conflict(4, 0)
      );
      expect(await repo.read("ghost")).toBeUndefined();
    });

    it("rejects a negative or fractional ifRevision", async () => {
      await expect(repo.write("job", 1, { ifRevision: -1 })).rejects.toThrow(RangeError);
      await expect(repo.write("job", 1, { ifRevision: 1.5 })).rejects.toThrow(RangeError);
    });

    it("gives concurrent writes distinct revisions", async () => {
      const written = await Promise.all([1, 2, 3, 4, 5].map((n) => repo.write("tally", n)));
      expect(written.map((r) => r.revision).sort()).toEqual([1, 2, 3, 4, 5]);
      expect((await repo.read("tally"))?.revision).toBe(5);
    });

    it("lets exactly one of several concurrent creates win", async () => {
      const outcomes = await Promise.allSettled(
        ["a", "b", "c"].map((v) => repo.write("lock", v, { ifRevision: 0 }))
      );
      expect(outcomes.filter((o) => o.status === "fulfilled")).toHaveLength(1);
      expect((await repo.read("lock"))?.revision).toBe(1);
    });
  });

  describe("remove", () => {
    it("removes a record and reports it", async () => {
      await repo.write("tmp", 1);
      expect(await repo.remove("tmp")).toBe(true);
      expect(await repo.read("tmp")).toBeUndefined();
    });

    it("reports false when there is nothing to remove", async () => {
      expect(await repo.remove("tmp")).toBe(false);
    });

    it("restarts revisions after a removal", async () => {
      await repo.write("tmp", 1);
      await repo.write("tmp", 2);
      await repo.remove("tmp");
      expect((await repo.write("tmp", 3)).revision).toBe(1);
    });

    it("removes only at the expected revision", async () => {
      await repo.write("tmp", 1);
      await repo.write("tmp", 2);
      await expect(repo.remove("tmp", { ifRevision: 1 })).rejects.toMatchObject(conflict(1, 2));
      expect((await repo.read("tmp"))?.value).toBe(2);
      expect(await repo.remove("tmp", { ifRevision: 2 })).toBe(true);
    });
  });

  describe("keys", () => {
    beforeEach(async () => {
      for (const key of ["orders:2", "orders:10", "invoices:1", "orders"]) {
        await repo.write(key, null);
      }
    });

    it("lists every key sorted", async () => {
      expect(await repo.keys()).toEqual(["invoices:1", "orders", "orders:10", "orders:2"]);
    });

    it("filters by prefix", async () => {
      expect(await repo.keys("orders:")).toEqual(["orders:10", "orders:2"]);
      expect(await repo.keys("ord")).toEqual(["orders", "orders:10", "orders:2"]);
    });

    it("returns nothing for an unmatched prefix", async () => {
      expect(await repo.keys("refunds:")).toEqual([]);
    });

    it("treats an empty prefix as no prefix", async () => {
      expect(await repo.keys("")).toHaveLength(4);
    });
  });

  describe("close", () => {
    const CLOSED = { name: "RepositoryClosedError" };

    it("refuses every operation afterwards", async () => {
      await repo.close();
      await expect(repo.read("k")).rejects.toMatchObject(CLOSED);
      await expect(repo.write("k", 1)).rejects.toMatchObject(CLOSED);
      await expect(repo.remove("k")).rejects.toMatchObject(CLOSED);
      await expect(repo.keys()).rejects.toMatchObject(CLOSED);
    });

    it("can be called more than once", async () => {
      await repo.close();
      await expect(repo.close()).resolves.toBeUndefined();
    });
  });
}
