import type { Config } from "../config/types.js";
import { FileCacheStore } from "./fileCache.js";
import { SqliteCacheStore } from "./sqliteCache.js";
import type { CacheStore } from "./types.js";

export type { CacheKind, CacheStore } from "./types.js";
export { FileCacheStore } from "./fileCache.js";
export { SqliteCacheStore } from "./sqliteCache.js";

export function openCacheStore(config: Pick<Config, "cache">): CacheStore {
  if (config.cache.backend === "sqlite") {
    return new SqliteCacheStore(config.cache.dbPath);
  }
  return new FileCacheStore(config.cache.dir);
}
