import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageConnectionError } from "../errors";
import { SqliteVisitStore } from "./sqlite";

describe("SqliteVisitStore", () => {
  let store: SqliteVisitStore;

  beforeEach(() => {
    store = SqliteVisitStore.open(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  it("counts 0 on a fresh database", async () => {
    await expect(store.getVisitCount()).resolves.toBe(0);
  });

  it("adds exactly one to the count per increment", async () => {
    const stamps = [
      new Date("2024-01-01T00:00:00.000Z"),
      new Date("1999-12-31T23:59:59.999Z"),
      new Date(0),
      new Date("2038-01-19T03:14:08.000Z"),
    ];

    for (const stamp of stamps) {
      const before = await store.getVisitCount();
      await store.incrementVisitCount(stamp);
      await expect(store.getVisitCount()).resolves.toBe(before + 1);
    }
  });

  it("answers ping", async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });

  it("rejects with a connection error after close", async () => {
    await store.close();

    const increment = store.incrementVisitCount(new Date());
    await expect(increment).rejects.toBeInstanceOf(StorageConnectionError);
    await expect(store.getVisitCount()).rejects.toThrow("database connection is closed");
    await expect(store.ping()).rejects.toBeInstanceOf(StorageConnectionError);
  });

  it("tolerates a second close", async () => {
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});

describe("SqliteVisitStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "visit-counter-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps visits across reopen and provisions idempotently", async () => {
    const file = join(dir, "visits.db");

    const first = SqliteVisitStore.open(file);
    await first.incrementVisitCount(new Date());
    await first.incrementVisitCount(new Date());
    await first.close();

    const second = SqliteVisitStore.open(file);
    await expect(second.getVisitCount()).resolves.toBe(2);
    await second.close();
  });

  it("stores timestamps in the same format as the column default", async () => {
    const file = join(dir, "visits.db");
    const store = SqliteVisitStore.open(file);
    await store.incrementVisitCount(new Date("2024-05-01T12:00:00.250Z"));
    await store.close();

    const db = new Database(file);
    db.prepare("INSERT INTO visits DEFAULT VALUES").run();
    const stamps = db
      .prepare<[], { timestamp: string }>("SELECT timestamp FROM visits ORDER BY id")
      .all()
      .map((row) => row.timestamp);
    db.close();

    expect(stamps).toHaveLength(2);
    expect(stamps[0]).toBe("2024-05-01 12:00:00");
    for (const stamp of stamps) expect(stamp).toMatch(/^\d{4}-\d\d-\d\d \d\d:\d\d:\d\d$/);
  });

  it("fails to open inside a missing directory", () => {
    const open = () => SqliteVisitStore.open(join(dir, "missing", "visits.db"));

    expect(open).toThrow(StorageConnectionError);
    expect(open).toThrow(/^failed to open database: /);
  });
});
