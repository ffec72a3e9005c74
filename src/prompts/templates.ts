import fs from "node:fs";
import path from "node:path";
import type { Config } from "../config/types.js";
import { ConfigurationError } from "../errors.js";

export function defaultStoryTemplate(): string {
  return [
    "STORY_CORE:",
    "{STORY_CORE}",
    "",
    "TARGET_LENGTH_CHARS: {TARGET_LENGTH_CHARS}",
    "CHAR_TOLERANCE: ±100",
    "",
    "Write the story based on STORY_CORE.",
  ].join("\n");
}

/** Read a prompt file exactly as-is. A missing file is a configuration error. */
export function loadPromptFile(filePath: string): string {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Prompt file not found: ${resolved}`);
  }
  return fs.readFileSync(resolved, "utf-8");
}

/** Lenient variant: null when the file is absent. */
export function loadTemplateFromFile(filePath: string): string | null {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) return null;
  return fs.readFileSync(resolved, "utf-8");
}

export function storyCoreTemplatePath(config: Pick<Config, "prompts">): string {
  return path.join(config.prompts.dir, config.prompts.storyCoreFilename);
}

export function storyTemplatePath(config: Pick<Config, "prompts">): string {
  return path.join(config.prompts.dir, config.prompts.storyFilename);
}

/** The story-core template has no fallback. */
export function loadStoryCoreTemplate(config: Pick<Config, "prompts">): string {
  return loadPromptFile(storyCoreTemplatePath(config));
}

export function loadStoryTemplate(config: Pick<Config, "prompts">): string {
  return loadTemplateFromFile(storyTemplatePath(config)) ?? defaultStoryTemplate();
}
