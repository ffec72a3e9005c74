/**
 * Centralized logging for the story pipeline.
 *
 * Environment Variables:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=subtitles,cache,llm,pipeline,multipass,analysis,cli
 *      (optional, default: all scopes allowed)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * Example Usage:
 *   LOG_LEVEL=debug LOG_SCOPES=multipass,llm  tsx src/tools/story/run-story.ts multipass --input clean.txt
 *
 * The normalizer, the template injector and JSON extraction never log;
 * only the orchestration layers and tools do.
 */

import { getEnv } from "../config/rawEnv.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogScope =
  | "subtitles"
  | "cache"
  | "llm"
  | "pipeline"
  | "multipass"
  | "analysis"
  | "cli";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ABBR: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: "pretty" | "json";

  constructor() {
    const logLevelEnv = (getEnv("LOG_LEVEL") ?? "info").toLowerCase();
    this.level = isLogLevel(logLevelEnv) ? LOG_LEVELS[logLevelEnv] : LOG_LEVELS.info;

    this.scopes = new Set(
      (getEnv("LOG_SCOPES") ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s)
    );

    this.format = getEnv("LOG_FORMAT") === "json" ? "json" : "pretty";
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    if (LOG_LEVELS[level] < this.level) return false;

    // If scopes are set, only log matching scopes
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) {
      return false;
    }

    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify(entry);
    }

    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
    const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : "";

    return `${time} [${LEVEL_ABBR[entry.level]}]${scopeStr} ${entry.message}${dataStr}`;
  }

  private emit(entry: LogEntry): void {
    const output = this.formatOutput(entry);

    switch (entry.level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "trace":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  log(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;
    this.emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.log("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.log("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.log("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.log("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.log("error", message, scope, data);
  }

  /**
   * Create a logger bound to one scope.
   * Usage: const llmLog = log.withScope("llm");
   *        llmLog.debug("message") -> logs with scope="llm"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

export const log = new Logger();
export default log;
