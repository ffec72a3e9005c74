/**
 * Variable injection into free-form, user-edited prompt templates.
 *
 * A variable can sit in a template in three ways, tried in this order:
 *   1. an explicit placeholder, `{{STORY_CORE}}`: every occurrence is replaced;
 *   2. a labeled block, `STORY_CORE:` followed by braced or bare content up to
 *      the next all-caps header line (or end of text): only the first block
 *      is rewritten;
 *   3. nothing: a new labeled block is inserted next to a known anchor.
 *
 * A value already sitting on lines of its own (what a placeholder fill leaves
 * behind) counts as injected; a value that only appears inside prose does not.
 *
 * Injection is a projection. Running it again with the same value returns the
 * text unchanged, and a template never ends up with two blocks for one label.
 * Nothing in here throws: unknown template shapes degrade to insertion.
 */

export type VariableName = "ORIGINAL_STORY" | "STORY_CORE" | "TARGET_LENGTH_CHARS";

/** block: label on its own line, value wrapped in braces; inline: bare value after the label. */
export type VariableFormat = "block" | "inline";

export type InsertionAnchor =
  | { kind: "afterHeader"; header: string }
  | { kind: "beforeHeader"; header: string }
  | { kind: "afterBlock"; label: string }
  | { kind: "prepend" }
  | { kind: "append" };

export type VariableSpec = {
  label: string;
  placeholders: readonly string[];
  format: VariableFormat;
  insertion: readonly InsertionAnchor[];
};

export const INPUT_VARIABLES_HEADER = "INPUT VARIABLES";
export const CORE_OBJECTIVE_HEADER = "CORE OBJECTIVE";
export const GLOBAL_HARD_RULES_HEADER = "GLOBAL HARD RULES";

export const SLIDE_COUNT_INSTRUCTION =
  "Choose the number of slides automatically based on TARGET_LENGTH_CHARS.";
const SLIDE_COUNT_MARKER = "Choose the number of slides automatically";

export const VARIABLE_SPECS: Record<VariableName, VariableSpec> = {
  ORIGINAL_STORY: {
    label: "ORIGINAL_STORY",
    placeholders: ["{{SUBTITLES}}", "{{ORIGINAL_STORY}}"],
    format: "block",
    insertion: [
      { kind: "afterHeader", header: INPUT_VARIABLES_HEADER },
      { kind: "beforeHeader", header: CORE_OBJECTIVE_HEADER },
      { kind: "append" },
    ],
  },
  STORY_CORE: {
    label: "STORY_CORE",
    placeholders: ["{{STORY_CORE}}"],
    format: "block",
    insertion: [
      { kind: "afterHeader", header: INPUT_VARIABLES_HEADER },
      { kind: "prepend" },
    ],
  },
  TARGET_LENGTH_CHARS: {
    label: "TARGET_LENGTH_CHARS",
    placeholders: ["{{TARGET_LENGTH_CHARS}}"],
    format: "inline",
    insertion: [
      { kind: "afterBlock", label: "STORY_CORE" },
      { kind: "afterHeader", header: INPUT_VARIABLES_HEADER },
      { kind: "prepend" },
    ],
  },
};

// ---------------------------------------------------------------------------
// Text scanning
// ---------------------------------------------------------------------------

const HEADER_LINE = /^[ \t]*([A-Z][A-Z0-9_]*(?:[ \t]+[A-Z0-9_]+)*)[ \t]*(?::.*|\([^)\n]*\)[ \t]*:?)?[ \t]*$/;
const MIN_HEADER_CHARS = 4;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** An all-caps section header such as `CORE OBJECTIVE` or `TARGET_LENGTH_CHARS: 900`. */
export function isHeaderLine(line: string): boolean {
  const match = HEADER_LINE.exec(line);
  return Boolean(match?.[1] && match[1].length >= MIN_HEADER_CHARS);
}

function lineEndAt(text: string, from: number): number {
  const idx = text.indexOf("\n", from);
  return idx < 0 ? text.length : idx;
}

/** Start offset of the first header line after the line containing `from`, or -1. */
function findNextHeaderLine(text: string, from: number): number {
  let newline = text.indexOf("\n", from);
  while (newline >= 0) {
    const lineStart = newline + 1;
    if (isHeaderLine(text.slice(lineStart, lineEndAt(text, lineStart)))) {
      return lineStart;
    }
    newline = text.indexOf("\n", lineStart);
  }
  return -1;
}

type LabeledBlock = {
  start: number;
  labelText: string;
  content: string;
  /** Text that follows the block in its rewritten form. */
  tail: string;
  /** Offset just past a closing brace, when the content was braced. */
  bracedEnd: number | null;
};

function findLabel(text: string, label: string): { start: number; labelText: string } | null {
  const match = new RegExp(`^([ \\t]*${escapeRegExp(label)}:)`, "m").exec(text);
  if (!match?.[1]) return null;
  return { start: match.index, labelText: match[1] };
}

/** What follows a braced block: normalized spacing before a header, verbatim otherwise. */
function tailAfterBrace(after: string): string {
  if (!after.trim()) return "";
  const lead = /^\s*\n/.exec(after);
  if (lead) {
    const remaining = after.slice(lead[0].length);
    if (isHeaderLine(remaining.slice(0, lineEndAt(remaining, 0)))) {
      return `\n\n${remaining}`;
    }
  }
  return after;
}

/** Offset of the brace closing the one at `open`, by nesting depth, or -1. */
function matchingBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function endsLine(text: string, offset: number): boolean {
  return /^[ \t]*(?:\n|$)/.test(text.slice(offset));
}

/**
 * End of a braced value starting at `contentStart` (just past its closing brace).
 * The value being injected is matched verbatim first; otherwise braces are
 * matched by depth, then the first brace that ends its line is taken.
 */
function bracedContentEnd(text: string, contentStart: number, value?: string): number | null {
  if (value !== undefined) {
    const rendered = `{${value}}`;
    if (text.startsWith(rendered, contentStart) && endsLine(text, contentStart + rendered.length)) {
      return contentStart + rendered.length;
    }
  }

  const close = matchingBrace(text, contentStart);
  if (close >= 0 && endsLine(text, close + 1)) return close + 1;

  const closing = /\}[ \t]*(?:\n|$)/g;
  closing.lastIndex = contentStart + 1;
  const fallback = closing.exec(text);
  return fallback ? fallback.index + 1 : null;
}

function findLabeledBlock(text: string, spec: VariableSpec, value?: string): LabeledBlock | null {
  const found = findLabel(text, spec.label);
  if (!found) return null;
  const afterLabel = found.start + found.labelText.length;

  if (spec.format === "inline") {
    const lineEnd = lineEndAt(text, afterLabel);
    return {
      ...found,
      content: text.slice(afterLabel, lineEnd),
      tail: text.slice(lineEnd),
      bracedEnd: null,
    };
  }

  const leadingWs = /^\s*/.exec(text.slice(afterLabel))?.[0].length ?? 0;
  const contentStart = afterLabel + leadingWs;

  if (text[contentStart] === "{") {
    const contentEnd = bracedContentEnd(text, contentStart, value);
    if (contentEnd !== null) {
      return {
        ...found,
        content: text.slice(contentStart, contentEnd),
        tail: tailAfterBrace(text.slice(contentEnd)),
        bracedEnd: contentEnd,
      };
    }
  }

  const header = findNextHeaderLine(text, afterLabel);
  if (header < 0) {
    return { ...found, content: text.slice(contentStart), tail: "", bracedEnd: null };
  }
  return {
    ...found,
    content: text.slice(Math.min(contentStart, header), header),
    tail: `\n\n${text.slice(header)}`,
    bracedEnd: null,
  };
}

function unwrapBraces(content: string): string | null {
  const trimmed = content.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed.slice(1, -1).trim();
  }
  return null;
}

function blockHoldsValue(block: LabeledBlock, spec: VariableSpec, value: string): boolean {
  const expected = value.trim();
  const unwrapped = unwrapBraces(block.content);
  if (unwrapped !== null) return unwrapped === expected;
  const bare = block.content.trim();
  if (bare === expected) return true;
  // Bare value left by an earlier placeholder fill, followed by the template's own lines.
  return spec.format === "block" && bare.startsWith(`${expected}\n`);
}

/** The value fills whole lines, as a placeholder on a line of its own leaves it. */
function valueFillsLines(text: string, value: string): boolean {
  return new RegExp(`(^|\\n)[ \\t]*${escapeRegExp(value.trim())}[ \\t]*(\\n|$)`).test(text);
}

function renderBlock(spec: VariableSpec, value: string): string {
  return spec.format === "inline" ? `${spec.label}: ${value}` : `${spec.label}:\n{${value}}`;
}

// ---------------------------------------------------------------------------
// Strategies: each returns the rewritten text, or null when it does not apply.
// ---------------------------------------------------------------------------

type InjectStrategy = (text: string, spec: VariableSpec, value: string) => string | null;

const replacePlaceholders: InjectStrategy = (text, spec, value) => {
  const present = spec.placeholders.filter((placeholder) => text.includes(placeholder));
  if (present.length === 0) return null;
  return present.reduce((acc, placeholder) => acc.split(placeholder).join(value), text);
};

const replaceLabeledBlock: InjectStrategy = (text, spec, value) => {
  const block = findLabeledBlock(text, spec, value);
  if (!block) return null;
  if (blockHoldsValue(block, spec, value)) return text;
  const separator = spec.format === "inline" ? " " : "\n";
  const body = spec.format === "inline" ? value : `{${value}}`;
  return `${text.slice(0, block.start)}${block.labelText}${separator}${body}${block.tail}`;
};

const keepPlaceholderFill: InjectStrategy = (text, _spec, value) =>
  valueFillsLines(text, value) ? text : null;

function insertAt(text: string, anchor: InsertionAnchor, rendered: string): string | null {
  switch (anchor.kind) {
    case "afterHeader": {
      const match = new RegExp(`^[ \\t]*${escapeRegExp(anchor.header)}\\b[^\\n]*`, "m").exec(text);
      if (!match) return null;
      const lineEnd = match.index + match[0].length;
      if (lineEnd >= text.length) return `${text}\n${rendered}`;
      return `${text.slice(0, lineEnd + 1)}${rendered}\n\n${text.slice(lineEnd + 1)}`;
    }
    case "beforeHeader": {
      const match = new RegExp(`^[ \\t]*${escapeRegExp(anchor.header)}\\b`, "m").exec(text);
      if (!match) return null;
      return `${text.slice(0, match.index)}${rendered}\n\n${text.slice(match.index)}`;
    }
    case "afterBlock": {
      const block = findLabeledBlock(text, {
        label: anchor.label,
        placeholders: [],
        format: "block",
        insertion: [],
      });
      if (!block || block.bracedEnd === null) return null;
      return `${text.slice(0, block.bracedEnd)}\n\n${rendered}${text.slice(block.bracedEnd)}`;
    }
    case "prepend":
      return text ? `${rendered}\n\n${text}` : rendered;
    case "append":
      return text ? `${text}\n\n${rendered}` : rendered;
  }
}

const insertBlock: InjectStrategy = (text, spec, value) => {
  const rendered = renderBlock(spec, value);
  for (const anchor of spec.insertion) {
    const result = insertAt(text, anchor, rendered);
    if (result !== null) return result;
  }
  return `${text}\n\n${rendered}`;
};

const STRATEGIES: readonly InjectStrategy[] = [
  replacePlaceholders,
  replaceLabeledBlock,
  keepPlaceholderFill,
  insertBlock,
];

function renderValue(value: string | number): string | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(Math.trunc(value)) : null;
  }
  const trimmed = value.trimEnd();
  return trimmed.trim() ? trimmed : null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function injectWithSpec(template: string, spec: VariableSpec, value: string | number): string {
  const rendered = renderValue(value);
  if (rendered === null) return template;

  for (const strategy of STRATEGIES) {
    const result = strategy(template, spec, rendered);
    if (result !== null) return result;
  }
  return template;
}

/** Inject one named variable. An empty value leaves the template as it is. */
export function injectVariable(template: string, name: VariableName, value: string | number): string {
  return injectWithSpec(template, VARIABLE_SPECS[name], value);
}

export function injectSubtitles(template: string, subtitles: string): string {
  return injectVariable(template, "ORIGINAL_STORY", subtitles);
}

export function injectStoryCore(template: string, storyCore: string): string {
  return injectVariable(template, "STORY_CORE", storyCore);
}

export function injectTargetLength(template: string, targetLengthChars: number): string {
  return injectVariable(template, "TARGET_LENGTH_CHARS", targetLengthChars);
}

/** Removes the retired slide-count variable in both its placeholder and block forms. */
export function stripSlideCount(template: string): string {
  return template
    .split("{{SLIDE_COUNT}}")
    .join("")
    .replace(/^[ \t]*SLIDE_COUNT:[^\n]*(?:\n|$)/gm, "");
}

function addSlideCountInstruction(template: string): string {
  if (template.includes(SLIDE_COUNT_MARKER) || template.includes("SLIDE_COUNT")) {
    return template;
  }

  const rules = new RegExp(`^[ \\t]*${GLOBAL_HARD_RULES_HEADER}\\b[^\\n]*`, "m").exec(template);
  if (rules) {
    const lineEnd = rules.index + rules[0].length;
    return `${template.slice(0, lineEnd)}\n${SLIDE_COUNT_INSTRUCTION}${template.slice(lineEnd)}`;
  }

  const target = findLabel(template, VARIABLE_SPECS.TARGET_LENGTH_CHARS.label);
  if (target) {
    const lineEnd = lineEndAt(template, target.start);
    return `${template.slice(0, lineEnd)}\n${SLIDE_COUNT_INSTRUCTION}${template.slice(lineEnd)}`;
  }

  return template ? `${template}\n\n${SLIDE_COUNT_INSTRUCTION}` : SLIDE_COUNT_INSTRUCTION;
}

/**
 * Fill the story template: STORY_CORE and TARGET_LENGTH_CHARS, drop any
 * SLIDE_COUNT directive, and make sure the model is told to pick the slide
 * count itself.
 */
export function injectAllStoryVariables(
  template: string,
  vars: { storyCore: string; targetLengthChars: number },
): string {
  if (!template) return template;

  let result = template;
  if (vars.storyCore.trim()) {
    result = injectStoryCore(result, vars.storyCore);
  } else {
    result = result.split("{{STORY_CORE}}").join("");
  }

  result = injectTargetLength(result, vars.targetLengthChars);
  result = stripSlideCount(result);
  return addSlideCountInstruction(result);
}
