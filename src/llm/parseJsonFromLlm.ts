/** The model's reply held no complete JSON value, or the value did not parse. */
export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonExtractionError";
  }
}

/** Drop a leading ``` line and a trailing ``` line, if the text opens with a fence. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;

  let lines = trimmed.split("\n");
  if (lines[0]?.startsWith("```")) lines = lines.slice(1);
  if (lines.length > 0 && lines[lines.length - 1]?.startsWith("```")) lines = lines.slice(0, -1);
  return lines.join("\n").trim();
}

/**
 * First complete `{...}` or `[...]` in the text. Brackets inside string
 * literals do not count; backslash escapes are honored.
 */
export function extractJsonFromText(text: string): string {
  const cleaned = stripCodeFence(text);

  const start = cleaned.search(/[{[]/);
  if (start < 0) {
    throw new JsonExtractionError("No JSON object/array found in text");
  }

  const open = cleaned[start];
  const close = open === "{" ? "}" : "]";
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = start; i < cleaned.length; i++) {
    const ch = cleaned[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (ch === "\\") {
      escapeNext = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === open) depth += 1;
    else if (ch === close) {
      depth -= 1;
      if (depth === 0) return cleaned.slice(start, i + 1);
    }
  }

  throw new JsonExtractionError("Incomplete JSON in text");
}

export function parseJsonFromLlm(raw: string): unknown {
  const parsed = tryParse(extractJsonFromText(raw));
  if (parsed.ok) return parsed.value;
  throw new JsonExtractionError(`Model response did not contain parseable JSON: ${parsed.error}`);
}

function tryParse(value: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(value) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
