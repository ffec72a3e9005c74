import type { Config } from "../config/types.js";
import { ConfigurationError, GenerationError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import { chat } from "./client.js";

const llmLog = log.withScope("llm");

/** The one capability the pipelines need from a language model. */
export type GenerateText = (prompt: string) => Promise<string>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull the generated text out of a GenAI App reply. Several response
 * shapes are in use; the first recognised key wins.
 */
export function extractGenaiText(data: unknown): string | null {
  if (!isRecord(data)) return null;

  for (const key of ["text", "output"]) {
    const value = data[key];
    if (typeof value === "string") return value;
  }

  const candidates = data.candidates;
  if (Array.isArray(candidates) && candidates.length > 0) {
    const first: unknown = candidates[0];
    if (isRecord(first)) {
      if (typeof first.content === "string") return first.content;
      if (typeof first.text === "string") return first.text;
    }
  }

  for (const key of ["response", "message"]) {
    const value = data[key];
    if (typeof value === "string") return value;
  }

  return null;
}

export function createOpenAiBackend(config: Pick<Config, "llm" | "openai">): GenerateText {
  return (prompt) => chat(config, { userMessage: prompt });
}

export function createGenaiAppBackend(
  config: Pick<Config, "genaiApp">,
  fetchImpl: FetchLike = fetch,
): GenerateText {
  const { url, token, authMode, timeoutMs } = config.genaiApp;

  return async (prompt) => {
    if (!url) {
      throw new ConfigurationError("GENAI_APP_URL is not set. Set it in .env to use the genai_app backend.");
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (token) {
      if (authMode === "bearer") headers.Authorization = `Bearer ${token}`;
      else headers["X-API-Key"] = token;
    }

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify({ prompt }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new GenerationError(`GenAI App request timed out (${timeoutMs}ms)`, "genai_app", { cause: err });
      }
      throw new GenerationError(`GenAI App request failed: ${errorMessage(err)}`, "genai_app", { cause: err });
    }

    const body = await response.text();
    if (response.status !== 200) {
      throw new GenerationError(
        `GenAI App returned status ${response.status}: ${body.slice(0, 500) || "(empty body)"}`,
        "genai_app",
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      throw new GenerationError(`GenAI App returned invalid JSON: ${body.slice(0, 500)}`, "genai_app", { cause: err });
    }

    const text = extractGenaiText(data);
    if (text === null) {
      const keys = isRecord(data) ? Object.keys(data).join(", ") : typeof data;
      throw new GenerationError(`Could not find generated text in GenAI App response (keys: ${keys})`, "genai_app");
    }
    return text.trim();
  };
}

/** Backend chosen by LLM_BACKEND. Every call is timed at debug level. */
export function createGenerateText(config: Pick<Config, "llm" | "openai" | "genaiApp">): GenerateText {
  const backend = config.llm.backend;
  const inner = backend === "genai_app" ? createGenaiAppBackend(config) : createOpenAiBackend(config);

  return async (prompt) => {
    const started = Date.now();
    llmLog.debug(`generate (${backend})`, { promptChars: prompt.length });
    const text = await inner(prompt);
    llmLog.debug(`generate (${backend}) done`, { ms: Date.now() - started, responseChars: text.length });
    return text;
  };
}
