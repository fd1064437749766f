import { describe, it, expect, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { migrate } from "../../src/db/client.js";
import { TransientStorageError } from "../../src/errors.js";
import { createTestStore, type TestStore } from "../helpers/store.js";

describe("store", () => {
  let t: TestStore;

  afterEach(() => t.cleanup());

  it("creates all five tables", () => {
    t = createTestStore();
    const tables = t.store.use((_db, sqlite) =>
      sqlite
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all()
    );

    expect(tables).toEqual([
      { name: "club_roles" },
      { name: "contributions" },
      { name: "member_roles" },
      { name: "moderation_logs" },
      { name: "warnings" },
    ]);
  });

  it("migrates idempotently", () => {
    t = createTestStore();
    expect(() => migrate(t.store)).not.toThrow();
    expect(() => migrate(t.store)).not.toThrow();
  });

  it("enables foreign keys on every connection", () => {
    t = createTestStore();
    const fk = t.store.use((_db, sqlite) => sqlite.pragma("foreign_keys", { simple: true }));
    expect(fk).toBe(1);
  });

  it("closes the connection when the callback throws", () => {
    t = createTestStore();
    const opened: Database.Database[] = [];

    expect(() =>
      t.store.use((_db, sqlite) => {
        opened.push(sqlite);
        throw new Error("boom");
      })
    ).toThrow("boom");

    expect(opened).toHaveLength(1);
    expect(opened[0].open).toBe(false);
  });

  it("rethrows busy errors as transient storage errors", () => {
    t = createTestStore();
    const busy = Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" });

    let caught: unknown;
    try {
      t.store.use(() => {
        throw busy;
      }, "contributions.submit");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransientStorageError);
    expect(caught).toMatchObject({
      kind: "transient_storage",
      operation: "contributions.submit",
      cause: busy,
    });
  });
});
