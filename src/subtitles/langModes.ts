import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";

export const DEFAULT_LANGS: readonly string[] = ["en", "uk", "ru"];

export type LangModes = {
  defaultMode: string;
  modes: Map<string, string[]>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string" && item.trim() !== "");
}

/**
 * Load the language-mode table from YAML.
 * Hard fails on schema errors; a missing file yields the built-in table.
 */
export function loadLangModes(filePath: string): LangModes {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    return builtinLangModes();
  }

  const raw: unknown = yaml.parse(fs.readFileSync(resolved, "utf-8"));
  if (!isRecord(raw)) {
    throw new Error(`Language modes file must contain a mapping: ${resolved}`);
  }

  const rawModes = raw.modes;
  if (!isRecord(rawModes)) {
    throw new Error(`Language modes file is missing a 'modes' mapping: ${resolved}`);
  }

  const modes = new Map<string, string[]>();
  for (const [mode, langs] of Object.entries(rawModes)) {
    if (!isStringArray(langs) || langs.length === 0) {
      throw new Error(`Language mode '${mode}' must list at least one language code (${resolved})`);
    }
    modes.set(mode, langs.map((lang) => lang.trim()));
  }

  const rawDefault = raw.default;
  const defaultMode = typeof rawDefault === "string" ? rawDefault : "auto";
  if (!modes.has(defaultMode)) {
    throw new Error(`Default language mode '${defaultMode}' is not defined in ${resolved}`);
  }

  return { defaultMode, modes };
}

export function builtinLangModes(): LangModes {
  return {
    defaultMode: "auto",
    modes: new Map([
      ["auto", [...DEFAULT_LANGS]],
      ...DEFAULT_LANGS.map((lang): [string, string[]] => [lang, [lang]]),
    ]),
  };
}

/** Ordered languages for a mode; unknown modes get the default mode's list. */
export function resolveLangs(table: LangModes, mode: string): string[] {
  const langs = table.modes.get(mode) ?? table.modes.get(table.defaultMode) ?? DEFAULT_LANGS;
  return [...langs];
}
