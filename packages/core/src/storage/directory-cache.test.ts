import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";
import pino from "pino";
import { initializeDatabase } from "./schema.js";
import { classifyEntry, createDirectoryCache } from "./directory-cache.js";
import { HOUR_MS } from "./types.js";
import { readCacheEntry } from "../test-utils/storage.js";

const T0 = 1_700_000_000_000;
const DAY = 24 * HOUR_MS;

describe("classifyEntry", () => {
  it("derives the four states", () => {
    expect(classifyEntry(undefined, T0, DAY)).toBe("not_cached");
    expect(
      classifyEntry({ lastSearched: T0 - 1000, completed: true }, T0, DAY),
    ).toBe("fresh");
    expect(
      classifyEntry({ lastSearched: T0 - 1000, completed: false }, T0, DAY),
    ).toBe("incomplete");
    expect(
      classifyEntry({ lastSearched: T0 - DAY, completed: true }, T0, DAY),
    ).toBe("stale");
    expect(
      classifyEntry({ lastSearched: T0 - DAY - 1, completed: false }, T0, DAY),
    ).toBe("stale");
  });
});

describe("DirectoryCache", () => {
  let db: Database.Database;
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    db = initializeDatabase(":memory:");
    clock = T0;
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it("reports not_cached for unknown paths", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    expect(cache.statusOf("/never/seen")).toBe("not_cached");
  });

  it("reports fresh after a clean completion", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/photos", true);

    expect(cache.statusOf("/photos")).toBe("fresh");
    expect(readCacheEntry(db, "/photos")).toEqual({
      path: "/photos",
      lastSearched: T0,
      completed: true,
      sessionId: "s-1",
      error: null,
    });
  });

  it("reports incomplete for partial scans within the window", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/photos", false);
    expect(cache.statusOf("/photos")).toBe("incomplete");
  });

  it("treats completed-with-error as fresh", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/slow", true, "timed out after 30000ms");

    expect(cache.statusOf("/slow")).toBe("fresh");
    expect(readCacheEntry(db, "/slow")?.error).toBe("timed out after 30000ms");
  });

  it("reports stale once the window has passed", () => {
    createDirectoryCache(db, { windowHours: 24, now }).recordResult(
      "s-1",
      "/photos",
      true,
    );

    clock = T0 + DAY;
    const later = createDirectoryCache(db, { windowHours: 24, now });
    expect(later.statusOf("/photos")).toBe("stale");
  });

  it("upserts one row per path, last writer wins", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/a", false);
    clock = T0 + 5;
    cache.recordResult("s-2", "/a", true);

    const count = db
      .prepare("SELECT COUNT(*) AS cnt FROM directory_cache")
      .get() as { cnt: number };
    expect(count.cnt).toBe(1);
    expect(readCacheEntry(db, "/a")).toMatchObject({
      sessionId: "s-2",
      completed: true,
      lastSearched: T0 + 5,
    });
  });

  it("force refresh bypasses reads but not writes", () => {
    createDirectoryCache(db, { windowHours: 24, now }).recordResult(
      "s-0",
      "/photos",
      true,
    );

    clock = T0 + HOUR_MS;
    const forced = createDirectoryCache(db, {
      windowHours: 24,
      forceRefresh: true,
      now,
    });
    expect(forced.statusOf("/photos")).toBe("not_cached");

    forced.recordResult("s-1", "/photos", true);
    expect(forced.statusOf("/photos")).toBe("not_cached");

    const normal = createDirectoryCache(db, { windowHours: 24, now });
    expect(normal.statusOf("/photos")).toBe("fresh");
    expect(readCacheEntry(db, "/photos")?.lastSearched).toBe(T0 + HOUR_MS);
  });

  it("answers repeat lookups from the freshness index", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    db.prepare(
      "INSERT INTO directory_cache (path, last_searched, completed) VALUES (?, ?, 1)",
    ).run("/photos", T0);

    expect(cache.freshIndexSize).toBe(0);
    expect(cache.statusOf("/photos")).toBe("fresh");
    expect(cache.freshIndexSize).toBe(1);

    db.prepare("DELETE FROM directory_cache").run();
    expect(cache.statusOf("/photos")).toBe("fresh");
  });

  it("loadFreshIndex picks up only fresh, completed rows", () => {
    const insert = db.prepare(
      "INSERT INTO directory_cache (path, last_searched, completed) VALUES (?, ?, ?)",
    );
    insert.run("/fresh", T0 - HOUR_MS, 1);
    insert.run("/partial", T0 - HOUR_MS, 0);
    insert.run("/old", T0 - 2 * DAY, 1);

    const cache = createDirectoryCache(db, { windowHours: 24, now });
    expect(cache.loadFreshIndex()).toBe(1);

    const forced = createDirectoryCache(db, {
      windowHours: 24,
      forceRefresh: true,
      now,
    });
    expect(forced.loadFreshIndex()).toBe(0);
  });

  it("an incomplete write evicts the path from the freshness index", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/a", true);
    cache.recordResult("s-1", "/a", false);
    expect(cache.statusOf("/a")).toBe("incomplete");
  });

  it("prune removes entries older than the cutoff", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/old", true);
    clock = T0 + 3 * DAY;
    cache.recordResult("s-1", "/new", true);

    expect(cache.prune(T0 + DAY)).toBe(1);
    expect(readCacheEntry(db, "/old")).toBeUndefined();
    expect(readCacheEntry(db, "/new")).toBeDefined();
  });

  it("lists, counts and clears incomplete entries", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    cache.recordResult("s-1", "/done", true);
    cache.recordResult("s-1", "/err", true, "EACCES");
    clock = T0 + 1;
    cache.recordResult("s-1", "/half-a", false);
    clock = T0 + 2;
    cache.recordResult("s-1", "/half-b", false);

    expect(cache.incompletePaths()).toEqual(["/half-b", "/half-a"]);
    expect(cache.stats()).toEqual({
      totalEntries: 4,
      completed: 2,
      incomplete: 2,
      withErrors: 1,
      fresh: 2,
    });

    expect(cache.clearIncomplete()).toBe(2);
    expect(cache.incompletePaths()).toEqual([]);
  });

  it("stats are zero on an empty table", () => {
    const cache = createDirectoryCache(db, { windowHours: 24, now });
    expect(cache.stats()).toEqual({
      totalEntries: 0,
      completed: 0,
      incomplete: 0,
      withErrors: 0,
      fresh: 0,
    });
  });

  describe("when storage fails", () => {
    it("degrades reads to not_cached and drops writes", () => {
      const logger = pino({ level: "silent" });
      const debug = vi.spyOn(logger, "debug");
      const cache = createDirectoryCache(db, { windowHours: 24, now, logger });
      db.close();

      expect(cache.statusOf("/photos")).toBe("not_cached");
      expect(() => cache.recordResult("s-1", "/photos", true)).not.toThrow();
      expect(cache.recordBatch([
        { sessionId: "s-1", path: "/x", completed: true },
      ])).toBe(false);
      expect(cache.loadFreshIndex()).toBe(0);
      expect(cache.prune(T0)).toBe(0);
      expect(debug).toHaveBeenCalledTimes(5);
    });

    it("keeps expired entries when the prune delete is refused", () => {
      const cache = createDirectoryCache(db, { windowHours: 24, now });
      cache.recordResult("s-1", "/old", true);
      db.exec(`CREATE TRIGGER refuse_cache_delete BEFORE DELETE ON directory_cache
               BEGIN SELECT RAISE(FAIL, 'cache delete refused'); END`);

      expect(cache.prune(T0 + DAY)).toBe(0);
      expect(readCacheEntry(db, "/old")).toBeDefined();
    });
  });
});
