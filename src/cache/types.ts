export type CacheKind = "raw_vtt" | "clean_txt";

/** Keyed by video identifier. No locking: one writer per key at a time. */
export interface CacheStore {
  get(videoId: string, kind: CacheKind): string | null;
  put(videoId: string, kind: CacheKind, content: string): void;
  close?(): void;
}
