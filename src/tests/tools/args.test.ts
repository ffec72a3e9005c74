import { expect, test } from "vitest";
import { InputError } from "../../errors.js";
import { parseArgs } from "../../tools/story/args.js";

test("clean takes a video URL with defaults", () => {
  expect(parseArgs(["clean", "--url", "https://youtu.be/abcDEF12345", "--no-cache"])).toEqual({
    command: "clean",
    label: null,
    outDir: null,
    input: null,
    url: "https://youtu.be/abcDEF12345",
    vtt: null,
    kind: "manual",
    lang: "en",
    langMode: null,
    preferManual: null,
    useCache: false,
    maxChars: null,
  });
});

test("clean flags override the defaults", () => {
  const args = parseArgs([
    "clean",
    "--input",
    "track.vtt",
    "--kind",
    "auto",
    "--prefer-auto",
    "--max-chars",
    "5000",
    "--label",
    "night run",
  ]);
  expect(args).toMatchObject({
    command: "clean",
    input: "track.vtt",
    kind: "auto",
    preferManual: false,
    useCache: true,
    maxChars: 5000,
    label: "night run",
  });
});

test("each command requires its inputs", () => {
  expect(() => parseArgs(["clean"])).toThrow("clean needs --input <track.vtt> or --url <video-url>");
  expect(() => parseArgs(["core"])).toThrow("Missing required argument: --input");
  expect(() => parseArgs(["story", "--core", "core.txt"])).toThrow("Missing required argument: --target");
  expect(() => parseArgs(["analyze", "--original", "a.txt"])).toThrow("Missing required argument: --story");
});

test("numeric flags must be positive integers", () => {
  expect(parseArgs(["story", "--core", "core.txt", "--target", "1500"])).toEqual({
    command: "story",
    label: null,
    outDir: null,
    core: "core.txt",
    target: 1500,
  });
  expect(() => parseArgs(["story", "--core", "c.txt", "--target", "0"])).toThrow(
    "--target must be a positive integer, got '0'",
  );
  expect(() => parseArgs(["multipass", "--input", "c.txt", "--slides", "2.5"])).toThrow(InputError);
});

test("multipass and analyze parse their optional flags", () => {
  expect(parseArgs(["multipass", "--input", "c.txt", "--slides", "8", "--out", "out"])).toEqual({
    command: "multipass",
    label: null,
    outDir: "out",
    input: "c.txt",
    target: null,
    slides: 8,
  });
  expect(parseArgs(["analyze", "--original", "a.txt", "--story", "b.txt", "--improve"])).toMatchObject({
    command: "analyze",
    improve: true,
  });
});

test("unknown commands, stray arguments and bad kinds are input errors", () => {
  expect(() => parseArgs(["publish"])).toThrow("Unknown command 'publish'");
  expect(() => parseArgs([])).toThrow(InputError);
  expect(() => parseArgs(["core", "stray"])).toThrow("Unexpected argument 'stray'");
  expect(() => parseArgs(["clean", "--input", "t.vtt", "--kind", "live"])).toThrow(
    "Invalid --kind 'live'. Expected manual|auto.",
  );
  expect(() => parseArgs(["core", "--input"])).toThrow("--input needs a value");
});
