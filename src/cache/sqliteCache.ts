import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { CacheKind, CacheStore } from "./types.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS cache_entries (
  video_id      TEXT NOT NULL,
  kind          TEXT NOT NULL,
  content       TEXT NOT NULL,
  updated_at_ms INTEGER NOT NULL,
  PRIMARY KEY (video_id, kind)
);
`;

type ContentRow = { content: string };

function ensureDirFor(dbPath: string): void {
  if (dbPath === ":memory:") return;
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

export class SqliteCacheStore implements CacheStore {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string, string], ContentRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string, number]>;

  constructor(dbPath: string) {
    ensureDirFor(dbPath);
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(SCHEMA_SQL);

    this.selectStmt = this.db.prepare<[string, string], ContentRow>(
      `SELECT content FROM cache_entries WHERE video_id = ? AND kind = ?`,
    );
    this.upsertStmt = this.db.prepare<[string, string, string, number]>(
      `INSERT INTO cache_entries (video_id, kind, content, updated_at_ms)
       VALUES (?, ?, ?, ?)
       ON CONFLICT (video_id, kind)
       DO UPDATE SET content = excluded.content, updated_at_ms = excluded.updated_at_ms`,
    );
  }

  get(videoId: string, kind: CacheKind): string | null {
    const row = this.selectStmt.get(videoId, kind);
    return row ? row.content : null;
  }

  put(videoId: string, kind: CacheKind, content: string): void {
    this.upsertStmt.run(videoId, kind, content, Date.now());
  }

  close(): void {
    this.db.close();
  }
}
