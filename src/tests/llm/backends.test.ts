import { expect, test } from "vitest";
import type { Config } from "../../config/types.js";
import { ConfigurationError, GenerationError } from "../../errors.js";
import type { FetchLike } from "../../llm/backends.js";
import { createGenaiAppBackend, createGenerateText, extractGenaiText } from "../../llm/backends.js";

function genaiConfig(overrides: Partial<Config["genaiApp"]> = {}): Pick<Config, "genaiApp"> {
  return {
    genaiApp: {
      url: "http://genai.test/generate",
      token: "test-secret",
      authMode: "bearer",
      timeoutMs: 5000,
      ...overrides,
    },
  };
}

type Captured = { url: string; init: RequestInit };

function fakeFetch(status: number, body: string, captured: Captured[] = []): FetchLike {
  return async (url, init) => {
    captured.push({ url, init });
    return new Response(body, { status });
  };
}

test("generated text is found under any of the known response keys", () => {
  expect(extractGenaiText({ text: "a" })).toBe("a");
  expect(extractGenaiText({ output: "b" })).toBe("b");
  expect(extractGenaiText({ candidates: [{ content: "c" }] })).toBe("c");
  expect(extractGenaiText({ candidates: [{ text: "d" }] })).toBe("d");
  expect(extractGenaiText({ response: "e" })).toBe("e");
  expect(extractGenaiText({ message: "f" })).toBe("f");
  expect(extractGenaiText({ other: "g" })).toBeNull();
  expect(extractGenaiText("plain")).toBeNull();
});

test("genai backend posts the prompt with bearer auth", async () => {
  const captured: Captured[] = [];
  const generate = createGenaiAppBackend(genaiConfig(), fakeFetch(200, '{"text":"  hello  "}', captured));

  await expect(generate("write")).resolves.toBe("hello");
  expect(captured).toHaveLength(1);
  expect(captured[0]?.url).toBe("http://genai.test/generate");
  expect(captured[0]?.init.method).toBe("POST");
  expect(captured[0]?.init.body).toBe('{"prompt":"write"}');
  expect(captured[0]?.init.headers).toEqual({
    "Content-Type": "application/json",
    Authorization: "Bearer test-secret",
  });
});

test("api-key auth uses the X-API-Key header", async () => {
  const captured: Captured[] = [];
  const generate = createGenaiAppBackend(
    genaiConfig({ authMode: "api-key" }),
    fakeFetch(200, '{"output":"ok"}', captured),
  );
  await generate("write");
  expect(captured[0]?.init.headers).toEqual({ "Content-Type": "application/json", "X-API-Key": "test-secret" });
});

test("non-200 replies, bad JSON and unknown shapes are generation errors", async () => {
  await expect(createGenaiAppBackend(genaiConfig(), fakeFetch(500, "boom"))("x")).rejects.toThrow(
    "GenAI App returned status 500: boom",
  );
  await expect(createGenaiAppBackend(genaiConfig(), fakeFetch(200, "not json"))("x")).rejects.toBeInstanceOf(
    GenerationError,
  );
  await expect(createGenaiAppBackend(genaiConfig(), fakeFetch(200, '{"data":1}'))("x")).rejects.toThrow(
    "keys: data",
  );
});

test("transport failures are wrapped as generation errors", async () => {
  const failing: FetchLike = async () => {
    throw new Error("connection refused");
  };
  const err = await createGenaiAppBackend(genaiConfig(), failing)("x").catch((e: unknown) => e);
  expect(err).toBeInstanceOf(GenerationError);
  if (err instanceof GenerationError) {
    expect(err.backend).toBe("genai_app");
    expect(err.message).toBe("GenAI App request failed: connection refused");
  }
});

test("a missing URL is a configuration error at call time", async () => {
  const generate = createGenaiAppBackend(genaiConfig({ url: undefined }), fakeFetch(200, "{}"));
  await expect(generate("x")).rejects.toBeInstanceOf(ConfigurationError);
});

test("the openai backend needs an API key", async () => {
  const generate = createGenerateText({
    llm: { backend: "openai", model: "gpt-4o-mini", temperature: 1, maxTokens: 100 },
    openai: { apiKey: undefined },
    genaiApp: genaiConfig().genaiApp,
  });
  await expect(generate("x")).rejects.toBeInstanceOf(ConfigurationError);
});
