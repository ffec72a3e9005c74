import fs from "node:fs";
import path from "node:path";
import type { CacheKind, CacheStore } from "./types.js";

const FILENAMES: Record<CacheKind, string> = {
  raw_vtt: "raw.vtt",
  clean_txt: "clean.txt",
};

function sanitizeVideoId(videoId: string): string {
  const safe = videoId.trim().replace(/[^a-zA-Z0-9_-]+/g, "_");
  if (!safe) throw new Error(`Invalid cache key: '${videoId}'`);
  return safe;
}

/** `<dir>/<videoId>/raw.vtt` and `<dir>/<videoId>/clean.txt`, UTF-8. */
export class FileCacheStore implements CacheStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  pathFor(videoId: string, kind: CacheKind): string {
    return path.join(this.rootDir, sanitizeVideoId(videoId), FILENAMES[kind]);
  }

  get(videoId: string, kind: CacheKind): string | null {
    const filePath = this.pathFor(videoId, kind);
    if (!fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, "utf-8");
  }

  put(videoId: string, kind: CacheKind, content: string): void {
    const filePath = this.pathFor(videoId, kind);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf-8");
  }
}
