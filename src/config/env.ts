import "dotenv/config";
import type {
  CacheBackend,
  Config,
  GenaiAuthMode,
  LlmBackend,
  LogFormat,
  LogLevel,
} from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function optBool(name: string, def: boolean): boolean {
  const v = opt(name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${v}`);
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((candidate) => candidate === v.toLowerCase());
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const dataRoot = opt("DATA_ROOT") ?? "./data";

  return {
    llm: {
      backend: enumOf<LlmBackend>("LLM_BACKEND", ["openai", "genai_app"] as const, "openai"),
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 1.0),
      maxTokens: optInt("LLM_MAX_TOKENS", 4096),
    },

    // Credentials are checked when a backend is actually built, not here.
    openai: {
      apiKey: opt("OPENAI_API_KEY"),
    },

    genaiApp: {
      url: opt("GENAI_APP_URL"),
      token: opt("GENAI_APP_TOKEN"),
      authMode: enumOf<GenaiAuthMode>("GENAI_APP_AUTH_MODE", ["bearer", "api-key"] as const, "bearer"),
      timeoutMs: optInt("GENAI_APP_TIMEOUT_MS", 60000),
    },

    subtitles: {
      maxChars: optInt("MAX_SUBTITLE_CHARS", 200000),
      defaultLangMode: opt("DEFAULT_LANG_MODE") ?? "auto",
      preferManual: optBool("PREFER_MANUAL", true),
      langModesPath: opt("LANG_MODES_PATH") ?? "data/lang-modes.yml",
    },

    cache: {
      backend: enumOf<CacheBackend>("CACHE_BACKEND", ["file", "sqlite"] as const, "file"),
      dir: opt("CACHE_DIR") ?? `${dataRoot}/cache`,
      dbPath: opt("CACHE_DB_PATH") ?? `${dataRoot}/cache/cache.sqlite`,
    },

    prompts: {
      dir: opt("PROMPTS_DIR") ?? ".",
      storyCoreFilename: "story_core_prompt.txt",
      storyFilename: "prompt_story.txt",
    },

    data: {
      root: dataRoot,
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function printConfigSnapshot(config: Config): void {
  const snap = redactConfigSnapshot({
    LLM_BACKEND: config.llm.backend,
    LLM_MODEL: config.llm.model,
    LLM_TEMPERATURE: config.llm.temperature,
    LLM_MAX_TOKENS: config.llm.maxTokens,
    OPENAI_API_KEY: config.openai.apiKey,
    GENAI_APP_URL: config.genaiApp.url,
    GENAI_APP_TOKEN: config.genaiApp.token,
    GENAI_APP_AUTH_MODE: config.genaiApp.authMode,
    GENAI_APP_TIMEOUT_MS: config.genaiApp.timeoutMs,
    MAX_SUBTITLE_CHARS: config.subtitles.maxChars,
    DEFAULT_LANG_MODE: config.subtitles.defaultLangMode,
    PREFER_MANUAL: config.subtitles.preferManual,
    LANG_MODES_PATH: config.subtitles.langModesPath,
    CACHE_BACKEND: config.cache.backend,
    CACHE_DIR: config.cache.dir,
    CACHE_DB_PATH: config.cache.dbPath,
    PROMPTS_DIR: config.prompts.dir,
    DATA_ROOT: config.data.root,
    LOG_LEVEL: config.logging.level,
    LOG_SCOPES: config.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: config.logging.format,
  });

  console.log("=== STORY PIPELINE CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("======================================");
}

export const cfg = loadConfig();
