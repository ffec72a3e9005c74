import { collapseConsecutiveRepeatedPhrases } from "./phraseDedupe.js";

export const DEFAULT_MAX_SUBTITLE_CHARS = 200000;

export type CleanStats = {
  cleanCharsBeforeDedupe: number;
  cleanCharsAfterDedupe: number;
  /** after / before; 1 when there was nothing to dedupe. */
  dedupeRatio: number;
  removedChars: number;
};

export type CleanResult = {
  text: string;
  stats: CleanStats;
};

const CUE_TIMING = /^(?:\d{2}:)?\d{2}:\d{2}[.,]\d{3}\s*-->\s*(?:\d{2}:)?\d{2}:\d{2}[.,]\d{3}/;
const CUE_INDEX = /^\d+$/;
const INLINE_TAG = /<[^>]+>/g;
const CUE_SETTING_PREFIX = /^\S+:\s*/;
const METADATA_PREFIXES = ["NOTE", "STYLE", "REGION"];
const TERMINAL_PUNCT = /[.!?]\s*$/;
const MAX_REPEATS = 2;

function isStructural(trimmed: string): boolean {
  return (
    trimmed.startsWith("WEBVTT") ||
    CUE_TIMING.test(trimmed) ||
    CUE_INDEX.test(trimmed) ||
    METADATA_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
  );
}

function splitLines(raw: string): string[] {
  return raw.replace(/\r\n?/g, "\n").split("\n");
}

/**
 * Drops the file header block ("Kind:", "Language:" and so on) that follows
 * a WEBVTT signature, up to the first blank line or cue timing.
 */
function dropHeaderBlock(lines: string[]): string[] {
  if (!lines[0]?.trim().startsWith("WEBVTT")) return lines;
  let end = 1;
  while (end < lines.length) {
    const trimmed = (lines[end] ?? "").trim();
    if (!trimmed || CUE_TIMING.test(trimmed)) break;
    end += 1;
  }
  return lines.slice(end);
}

/** Step 1: remove header, timings, cue indices, metadata and inline markup. */
export function stripStructure(lines: string[]): string[] {
  const out: string[] = [];
  for (const line of dropHeaderBlock(lines)) {
    const trimmed = line.trim();
    if (!trimmed || isStructural(trimmed)) continue;

    const cleaned = trimmed
      .replace(INLINE_TAG, "")
      .replace(CUE_SETTING_PREFIX, "")
      .trim();
    if (cleaned) out.push(cleaned);
  }
  return out;
}

/** Step 2: a line may repeat itself once in a row; further repeats are dropped. */
export function dedupeConsecutiveLines(lines: string[]): string[] {
  const out: string[] = [];
  let prev: string | null = null;
  let repeats = 0;

  for (const line of lines) {
    const key = line.trim().toLowerCase();
    if (!key) continue;

    if (key === prev) {
      repeats += 1;
      if (repeats >= MAX_REPEATS) continue;
    } else {
      prev = key;
      repeats = 0;
    }
    out.push(line);
  }
  return out;
}

/** Step 3: glue a line onto the previous one until a sentence ends. */
export function joinContinuationLines(lines: string[]): string[] {
  const parts: string[] = [];
  for (const line of lines) {
    const last = parts.length - 1;
    if (last >= 0 && !TERMINAL_PUNCT.test(parts[last] ?? "")) {
      parts[last] = `${parts[last]} ${line}`;
    } else {
      parts.push(line);
    }
  }
  return parts;
}

/** Step 4 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/ +/g, " ").replace(/\n\s*\n+/g, "\n");
}

/** Step 5: drop a sentence identical to the one right before it. */
export function dedupeConsecutiveSentences(text: string): string {
  const chunks = text.split(/([.!?]\s+)/);
  const kept: string[] = [];
  let prev: string | null = null;

  for (let i = 0; i < chunks.length; i += 2) {
    const sentence = (chunks[i] ?? "") + (chunks[i + 1] ?? "");
    const key = sentence.trim().toLowerCase();
    if (key && key !== prev) {
      kept.push(sentence);
      prev = key;
    }
  }

  return kept.join("").trim();
}

/** Step 7: visible lines straight from the raw track, used when cleaning ate everything. */
export function extractFallbackText(raw: string): string {
  const visible: string[] = [];
  for (const line of splitLines(raw)) {
    const trimmed = line.trim();
    if (!trimmed || isStructural(trimmed)) continue;
    const stripped = trimmed.replace(INLINE_TAG, "").trim();
    if (stripped.length > 2) visible.push(stripped);
  }
  return visible.join(" ").replace(/ +/g, " ").trim();
}

/**
 * Step 8: cut to `maxChars`, on the last sentence or line boundary if one
 * falls inside the final 20% of the allowance.
 */
export function capLength(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const truncated = text.slice(0, maxChars);
  const boundary = Math.max(
    truncated.lastIndexOf("."),
    truncated.lastIndexOf("!"),
    truncated.lastIndexOf("?"),
    truncated.lastIndexOf("\n"),
  );

  if (boundary > maxChars * 0.8) {
    return truncated.slice(0, boundary + 1).trimEnd();
  }
  return truncated;
}

function emptyResult(): CleanResult {
  return {
    text: "",
    stats: {
      cleanCharsBeforeDedupe: 0,
      cleanCharsAfterDedupe: 0,
      dedupeRatio: 1,
      removedChars: 0,
    },
  };
}

/**
 * Raw timed-caption track to clean prose.
 * Deterministic; the same track always yields the same text and stats.
 */
export function vttToCleanText(
  raw: string,
  opts: { maxChars?: number } = {},
): CleanResult {
  if (!raw) return emptyResult();
  const maxChars = opts.maxChars ?? DEFAULT_MAX_SUBTITLE_CHARS;

  const lines = dedupeConsecutiveLines(stripStructure(splitLines(raw)));
  const joined = normalizeWhitespace(joinContinuationLines(lines).join("\n"));
  const sentences = dedupeConsecutiveSentences(joined);

  let cleanCharsBeforeDedupe = sentences.length;
  let text = collapseConsecutiveRepeatedPhrases(sentences);

  if (!text) {
    const fallback = extractFallbackText(raw);
    if (fallback) {
      cleanCharsBeforeDedupe = fallback.length;
      text = collapseConsecutiveRepeatedPhrases(fallback);
    }
  }

  text = capLength(text, maxChars);

  const cleanCharsAfterDedupe = text.length;
  return {
    text,
    stats: {
      cleanCharsBeforeDedupe,
      cleanCharsAfterDedupe,
      dedupeRatio: cleanCharsBeforeDedupe > 0 ? cleanCharsAfterDedupe / cleanCharsBeforeDedupe : 1,
      removedChars: cleanCharsBeforeDedupe - cleanCharsAfterDedupe,
    },
  };
}
