import { expect, test } from "vitest";
import {
  JsonExtractionError,
  extractJsonFromText,
  parseJsonFromLlm,
  stripCodeFence,
} from "../../llm/parseJsonFromLlm.js";

test("code fences are stripped before extraction", () => {
  expect(extractJsonFromText('```json\n{"a":1}\n```')).toBe('{"a":1}');
  expect(stripCodeFence("```\n[1, 2]\n```")).toBe("[1, 2]");
});

test("brackets inside strings do not close the value", () => {
  expect(extractJsonFromText('{"a":"x}x"}')).toBe('{"a":"x}x"}');
  expect(extractJsonFromText('prefix {"a":"say \\"}\\" now","b":[1]} suffix')).toBe(
    '{"a":"say \\"}\\" now","b":[1]}',
  );
});

test("the first value wins, object or array", () => {
  expect(extractJsonFromText('Sure! [{"slide":1}] and then {"x":2}')).toBe('[{"slide":1}]');
  expect(extractJsonFromText('Result: {"ok":true} [9]')).toBe('{"ok":true}');
});

test("missing or unterminated JSON is an extraction error", () => {
  expect(() => extractJsonFromText("no json here")).toThrow(JsonExtractionError);
  expect(() => extractJsonFromText('{"a": [1, 2')).toThrow("Incomplete JSON in text");
});

test("parseJsonFromLlm parses the extracted value", () => {
  expect(parseJsonFromLlm('```json\n{"a":"x}x","n":[1,2]}\n```')).toEqual({ a: "x}x", n: [1, 2] });
  expect(() => parseJsonFromLlm("{'single': 'quotes'}")).toThrow(JsonExtractionError);
});
