import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type BetterSqlite3 from "better-sqlite3";
import { openDatabase } from "./db.js";
import { MemoryPreferencesStore, SqlitePreferencesStore } from "./preferences.js";

describe("SqlitePreferencesStore", () => {
  let db: BetterSqlite3.Database;
  let store: SqlitePreferencesStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new SqlitePreferencesStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it("should report units as enabled by default", () => {
    expect(store.isDisabled("weather.5m.sh")).toBe(false);
    expect(store.disabledIds()).toEqual([]);
  });

  it("should remember disabled units", () => {
    store.addDisabled("weather.5m.sh");
    store.addDisabled("clock.1s.sh");

    expect(store.isDisabled("weather.5m.sh")).toBe(true);
    expect(store.disabledIds()).toEqual(["clock.1s.sh", "weather.5m.sh"]);
  });

  it("should ignore duplicate disables", () => {
    store.addDisabled("weather.5m.sh");
    store.addDisabled("weather.5m.sh");

    expect(store.disabledIds()).toEqual(["weather.5m.sh"]);
  });

  it("should re-enable a unit", () => {
    store.addDisabled("weather.5m.sh");
    store.removeDisabled("weather.5m.sh");

    expect(store.isDisabled("weather.5m.sh")).toBe(false);
  });

  it("should survive reopening the store on the same database", () => {
    store.addDisabled("cpu.10s.sh");
    expect(new SqlitePreferencesStore(db).isDisabled("cpu.10s.sh")).toBe(true);
  });
});

describe("MemoryPreferencesStore", () => {
  it("should start from the given disabled ids", () => {
    const store = new MemoryPreferencesStore(["b.sh", "a.sh"]);
    expect(store.disabledIds()).toEqual(["a.sh", "b.sh"]);

    store.removeDisabled("a.sh");
    expect(store.isDisabled("a.sh")).toBe(false);
    expect(store.isDisabled("b.sh")).toBe(true);
  });
});
