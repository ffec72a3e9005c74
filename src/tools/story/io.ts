import fs from "node:fs";
import path from "node:path";
import { resolveRunDir, sanitizeRunLabel } from "../../dataPaths.js";
import { InputError } from "../../errors.js";

/** `<command>_<yyyymmdd-hhmmss>` in UTC. */
export function defaultRunLabel(command: string, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "-");
  return sanitizeRunLabel(`${command}_${stamp}`);
}

export function readTextInput(inputPath: string): string {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved)) {
    throw new InputError(`Input file not found: ${resolved}`);
  }
  return fs.readFileSync(resolved, "utf-8");
}

export function writeRunOutputs(args: {
  label: string;
  files: Record<string, string>;
  meta: unknown;
  outputDirOverride?: string;
  dataRoot?: string;
}): {
  outputDir: string;
  filePaths: string[];
  metaPath: string;
} {
  const outputDir = args.outputDirOverride
    ? path.resolve(args.outputDirOverride)
    : resolveRunDir(args.label, { ensureExists: true, dataRoot: args.dataRoot });
  fs.mkdirSync(outputDir, { recursive: true });

  const filePaths = Object.entries(args.files).map(([filename, content]) => {
    const filePath = path.join(outputDir, filename);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  });

  const metaPath = path.join(outputDir, "meta.json");
  fs.writeFileSync(metaPath, JSON.stringify(args.meta, null, 2), "utf-8");

  return { outputDir, filePaths, metaPath };
}
