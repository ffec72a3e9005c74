export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type LlmBackend = "openai" | "genai_app";
export type GenaiAuthMode = "bearer" | "api-key";
export type CacheBackend = "file" | "sqlite";

export interface Config {
  llm: {
    backend: LlmBackend;
    model: string;
    temperature: number;
    maxTokens: number;
  };

  openai: {
    apiKey?: string;
  };

  genaiApp: {
    url?: string;
    token?: string;
    authMode: GenaiAuthMode;
    timeoutMs: number;
  };

  subtitles: {
    maxChars: number;
    defaultLangMode: string;
    preferManual: boolean;
    langModesPath: string;
  };

  cache: {
    backend: CacheBackend;
    dir: string;
    dbPath: string;
  };

  prompts: {
    dir: string;
    storyCoreFilename: string;
    storyFilename: string;
  };

  data: {
    root: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
