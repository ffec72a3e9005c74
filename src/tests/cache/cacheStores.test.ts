import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { FileCacheStore, SqliteCacheStore, openCacheStore } from "../../cache/index.js";
import type { Config } from "../../config/types.js";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "subtitle-story-cache-"));
}

test("file cache stores each kind in its own file", () => {
  const dir = tempDir();
  const cache = new FileCacheStore(dir);

  expect(cache.get("abcDEF12345", "raw_vtt")).toBeNull();
  cache.put("abcDEF12345", "raw_vtt", "WEBVTT\n\nraw");
  cache.put("abcDEF12345", "clean_txt", "clean");

  expect(cache.get("abcDEF12345", "raw_vtt")).toBe("WEBVTT\n\nraw");
  expect(cache.get("abcDEF12345", "clean_txt")).toBe("clean");
  expect(fs.readFileSync(path.join(dir, "abcDEF12345", "clean.txt"), "utf-8")).toBe("clean");
});

test("file cache keys cannot escape the cache directory", () => {
  const dir = tempDir();
  const cache = new FileCacheStore(dir);
  expect(cache.pathFor("../evil", "clean_txt")).toBe(path.join(dir, "_evil", "clean.txt"));
});

test("sqlite cache round-trips and overwrites by key", () => {
  const cache = new SqliteCacheStore(":memory:");
  try {
    expect(cache.get("vid", "clean_txt")).toBeNull();
    cache.put("vid", "clean_txt", "first");
    cache.put("vid", "clean_txt", "second");
    cache.put("vid", "raw_vtt", "raw");

    expect(cache.get("vid", "clean_txt")).toBe("second");
    expect(cache.get("vid", "raw_vtt")).toBe("raw");
    expect(cache.get("other", "raw_vtt")).toBeNull();
  } finally {
    cache.close();
  }
});

test("sqlite cache persists to a file", () => {
  const dbPath = path.join(tempDir(), "nested", "cache.sqlite");
  const writer = new SqliteCacheStore(dbPath);
  writer.put("vid", "raw_vtt", "persisted");
  writer.close();

  const reader = new SqliteCacheStore(dbPath);
  try {
    expect(reader.get("vid", "raw_vtt")).toBe("persisted");
  } finally {
    reader.close();
  }
});

test("openCacheStore follows the configured backend", () => {
  const dir = tempDir();
  const cacheConfig = (backend: Config["cache"]["backend"]): Pick<Config, "cache"> => ({
    cache: { backend, dir, dbPath: ":memory:" },
  });

  expect(openCacheStore(cacheConfig("file"))).toBeInstanceOf(FileCacheStore);
  const sqlite = openCacheStore(cacheConfig("sqlite"));
  expect(sqlite).toBeInstanceOf(SqliteCacheStore);
  sqlite.close?.();
});
