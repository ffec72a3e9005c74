import fs from "node:fs";
import path from "node:path";
import { cfg } from "./config/env.js";

type ResolveOptions = {
  ensureExists?: boolean;
};

const DEFAULT_RUN_LABEL = "run";

export function sanitizeRunLabel(input?: string | null): string {
  const normalized = (input ?? DEFAULT_RUN_LABEL)
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9-_]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  const safe = normalized || DEFAULT_RUN_LABEL;
  if (safe.includes("..") || safe.includes("/") || safe.includes("\\")) {
    return DEFAULT_RUN_LABEL;
  }
  return safe;
}

function ensureDirIfRequested(dirPath: string, ensureExists?: boolean): string {
  if (ensureExists) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
  return dirPath;
}

export function resolveDataRoot(dataRoot: string = cfg.data.root): string {
  return path.resolve(dataRoot);
}

export function resolveRunsDir(opts: ResolveOptions & { dataRoot?: string } = {}): string {
  return ensureDirIfRequested(path.join(resolveDataRoot(opts.dataRoot), "runs"), opts.ensureExists);
}

export function resolveRunDir(label: string, opts: ResolveOptions & { dataRoot?: string } = {}): string {
  return ensureDirIfRequested(
    path.join(resolveRunsDir({ dataRoot: opts.dataRoot }), sanitizeRunLabel(label)),
    opts.ensureExists,
  );
}
