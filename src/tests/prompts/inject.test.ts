import { expect, test } from "vitest";
import {
  SLIDE_COUNT_INSTRUCTION,
  injectAllStoryVariables,
  injectStoryCore,
  injectSubtitles,
  injectTargetLength,
  injectVariable,
  isHeaderLine,
  stripSlideCount,
} from "../../prompts/inject.js";
import { defaultStoryTemplate } from "../../prompts/templates.js";

function countLabel(text: string, label: string): number {
  return text.match(new RegExp(`^[ \\t]*${label}:`, "gm"))?.length ?? 0;
}

test("header lines are all-caps section titles", () => {
  expect(isHeaderLine("CORE OBJECTIVE")).toBe(true);
  expect(isHeaderLine("TARGET_LENGTH_CHARS: 900")).toBe(true);
  expect(isHeaderLine("OUTPUT (JSON only):")).toBe(true);
  expect(isHeaderLine("Write the story.")).toBe(false);
  expect(isHeaderLine("ONE")).toBe(false);
  expect(isHeaderLine("")).toBe(false);
});

test("explicit placeholders are replaced everywhere", () => {
  const out = injectStoryCore("Core:\n{{STORY_CORE}}\nAgain {{STORY_CORE}}", "the core\n");
  expect(out).toBe("Core:\nthe core\nAgain the core");
  expect(injectStoryCore(out, "the core\n")).toBe(out);
});

test("both subtitle placeholders are filled", () => {
  expect(injectSubtitles("A {{SUBTITLES}} B {{ORIGINAL_STORY}}", "text")).toBe("A text B text");
});

test("a braced labeled block is rewritten in place", () => {
  const template = "Intro\nSTORY_CORE:\n{old core}\n\nOUTPUT RULES\n- short";
  expect(injectStoryCore(template, "new core")).toBe("Intro\nSTORY_CORE:\n{new core}\n\nOUTPUT RULES\n- short");
});

test("an unbraced labeled block runs to the next header", () => {
  const template = "STORY_CORE:\nsome draft text\nmore draft\n\nOUTPUT RULES\n- short";
  expect(injectStoryCore(template, "final core")).toBe("STORY_CORE:\n{final core}\n\nOUTPUT RULES\n- short");
});

test("only the first of several labeled blocks is touched", () => {
  const template = "STORY_CORE:\n{a}\n\nNOTES\nSTORY_CORE:\n{b}";
  expect(injectStoryCore(template, "c")).toBe("STORY_CORE:\n{c}\n\nNOTES\nSTORY_CORE:\n{b}");
});

test("original story is inserted before the objective section", () => {
  const out = injectSubtitles("You are an editor.\n\nCORE OBJECTIVE\nFind the conflict.", "subs");
  expect(out).toBe("You are an editor.\n\nORIGINAL_STORY:\n{subs}\n\nCORE OBJECTIVE\nFind the conflict.");
});

test("original story goes right after the input-variables header when present", () => {
  const out = injectSubtitles("INPUT VARIABLES\nCORE OBJECTIVE\nGo.", "subs");
  expect(out).toBe("INPUT VARIABLES\nORIGINAL_STORY:\n{subs}\n\nCORE OBJECTIVE\nGo.");
});

test("original story is appended when no anchor exists", () => {
  expect(injectSubtitles("Just write.", "abc def")).toBe("Just write.\n\nORIGINAL_STORY:\n{abc def}");
});

test("story core is prepended when no anchor exists, then replaced in place", () => {
  const first = injectStoryCore("Write a story.", "core");
  expect(first).toBe("STORY_CORE:\n{core}\n\nWrite a story.");
  expect(injectStoryCore(first, "core two")).toBe("STORY_CORE:\n{core two}\n\nWrite a story.");
});

test("target length is a bare number after its label", () => {
  expect(injectTargetLength("TARGET_LENGTH_CHARS: {TARGET_LENGTH_CHARS}\nGo.", 1500.9)).toBe(
    "TARGET_LENGTH_CHARS: 1500\nGo.",
  );
  expect(injectTargetLength("TARGET_LENGTH_CHARS: 900\nGo.", 1200)).toBe("TARGET_LENGTH_CHARS: 1200\nGo.");
});

test("empty values leave the template unchanged", () => {
  const template = "ORIGINAL_STORY:\n{keep}\n\nCORE OBJECTIVE";
  expect(injectSubtitles(template, "   ")).toBe(template);
  expect(injectStoryCore(template, "")).toBe(template);
  expect(injectTargetLength(template, Number.NaN)).toBe(template);
});

const JSON_CORE = JSON.stringify({ core: { a: 1 } }, null, 2);

test("injection is idempotent across template shapes", () => {
  const templates = [
    "Core:\n{{STORY_CORE}}",
    "INPUT VARIABLES\nSTORY_CORE:\n{old}\n\nCORE OBJECTIVE\nGo.",
    "STORY_CORE:\ndraft\n\nRULES\n- x",
    "STORY_CORE:\ndraft text here\n\nRULES\n- x",
    "Write a story.",
    "CHAR_TOLERANCE: ±100\nWrite it.",
    "",
  ];
  const values = ["a fresh core", "multi\nline core\n", "story", "draft", "Facts:\n- {hero}\n- villain", JSON_CORE];

  for (const template of templates) {
    for (const value of values) {
      const once = injectVariable(template, "STORY_CORE", value);
      expect(injectVariable(once, "STORY_CORE", value)).toBe(once);
      expect(countLabel(once, "STORY_CORE")).toBeLessThanOrEqual(1);
    }
    for (const target of [777, 100]) {
      const withTarget = injectVariable(template, "TARGET_LENGTH_CHARS", target);
      expect(injectVariable(withTarget, "TARGET_LENGTH_CHARS", target)).toBe(withTarget);
      expect(countLabel(withTarget, "TARGET_LENGTH_CHARS")).toBe(1);
    }
  }
});

test("a value that only appears inside prose is still inserted", () => {
  const story = injectStoryCore("Write a short story about the cat.", "cat");
  expect(story).toBe("STORY_CORE:\n{cat}\n\nWrite a short story about the cat.");
  expect(injectStoryCore(story, "cat")).toBe(story);

  const target = injectTargetLength("CHAR_TOLERANCE: ±100\nWrite it.", 100);
  expect(target).toBe("TARGET_LENGTH_CHARS: 100\n\nCHAR_TOLERANCE: ±100\nWrite it.");
  expect(injectTargetLength(target, 100)).toBe(target);
});

test("a value on its own line after a placeholder fill is left alone", () => {
  const filled = injectStoryCore("STORY_CORE:\n{{STORY_CORE}}\nWrite it.", "core");
  expect(filled).toBe("STORY_CORE:\ncore\nWrite it.");
  expect(injectStoryCore(filled, "core")).toBe(filled);
});

test("a new value that is a prefix of bare block content replaces it", () => {
  const out = injectStoryCore("STORY_CORE:\nThe dog ran home fast\n\nOUTPUT RULES\n- x", "The dog");
  expect(out).toBe("STORY_CORE:\n{The dog}\n\nOUTPUT RULES\n- x");
});

test("values with nested braces are re-targeted as one block", () => {
  const template = "STORY_CORE:\n{old}\n\nOUTPUT RULES\n- x";
  const value = "Facts:\n- {hero}\n- villain";

  const once = injectStoryCore(template, value);
  expect(once).toBe("STORY_CORE:\n{Facts:\n- {hero}\n- villain}\n\nOUTPUT RULES\n- x");
  expect(injectStoryCore(once, value)).toBe(once);
  expect(injectStoryCore(once, "plain")).toBe("STORY_CORE:\n{plain}\n\nOUTPUT RULES\n- x");
});

test("a JSON story core survives repeated story-variable injection", () => {
  const vars = { storyCore: JSON_CORE, targetLengthChars: 900 };
  const once = injectAllStoryVariables("STORY_CORE:\n{x}\n\nWrite it.", vars);
  expect(once).toBe(
    `STORY_CORE:\n{${JSON_CORE}}\n\nTARGET_LENGTH_CHARS: 900\n${SLIDE_COUNT_INSTRUCTION}\n\nWrite it.`,
  );
  expect(injectAllStoryVariables(once, vars)).toBe(once);
});

test("repeated injection never produces a second labeled block", () => {
  let text = "INPUT VARIABLES\nSTORY_CORE:\n{v0}\n\nCORE OBJECTIVE\nGo.";
  for (const value of ["v1", "v2", "v2", "v3"]) {
    text = injectStoryCore(text, value);
    expect(countLabel(text, "STORY_CORE")).toBe(1);
  }
  expect(text).toBe("INPUT VARIABLES\nSTORY_CORE:\n{v3}\n\nCORE OBJECTIVE\nGo.");

  let inserted = "Plain template.";
  for (const value of ["a", "b", "b"]) {
    inserted = injectSubtitles(inserted, `story ${value}`);
    expect(countLabel(inserted, "ORIGINAL_STORY")).toBe(1);
  }
});

test("slide count directives are stripped", () => {
  expect(stripSlideCount("A\nSLIDE_COUNT: 8\nB {{SLIDE_COUNT}}")).toBe("A\nB ");
});

test("story variables fill core and target and add the slide-count instruction under the rules", () => {
  const template =
    "INPUT VARIABLES\nSTORY_CORE:\n{old core}\n\nTARGET_LENGTH_CHARS: 900\n\nGLOBAL HARD RULES\n- Keep it short.";
  const out = injectAllStoryVariables(template, { storyCore: "new core", targetLengthChars: 1200 });
  expect(out).toBe(
    "INPUT VARIABLES\nSTORY_CORE:\n{new core}\n\nTARGET_LENGTH_CHARS: 1200\n\nGLOBAL HARD RULES\n" +
      `${SLIDE_COUNT_INSTRUCTION}\n- Keep it short.`,
  );
  expect(injectAllStoryVariables(out, { storyCore: "new core", targetLengthChars: 1200 })).toBe(out);
});

test("the default story template is filled through its brace slots", () => {
  const out = injectAllStoryVariables(defaultStoryTemplate(), { storyCore: "core text", targetLengthChars: 1200 });
  expect(out).toBe(
    [
      "STORY_CORE:",
      "{core text}",
      "",
      "TARGET_LENGTH_CHARS: 1200",
      SLIDE_COUNT_INSTRUCTION,
      "CHAR_TOLERANCE: ±100",
      "",
      "Write the story based on STORY_CORE.",
    ].join("\n"),
  );
});

test("a missing target is inserted after the story core block", () => {
  const out = injectAllStoryVariables("STORY_CORE:\n{x}\n\nWrite it.", { storyCore: "x", targetLengthChars: 900 });
  expect(out).toBe(`STORY_CORE:\n{x}\n\nTARGET_LENGTH_CHARS: 900\n${SLIDE_COUNT_INSTRUCTION}\n\nWrite it.`);
});

test("slide count placeholders are removed and replaced by the instruction", () => {
  const out = injectAllStoryVariables(
    "STORY_CORE:\n{x}\nSLIDE_COUNT: {{SLIDE_COUNT}}\nTARGET_LENGTH_CHARS: {{TARGET_LENGTH_CHARS}}",
    { storyCore: "x", targetLengthChars: 700 },
  );
  expect(out).toBe(`STORY_CORE:\n{x}\nTARGET_LENGTH_CHARS: 700\n${SLIDE_COUNT_INSTRUCTION}`);
});

test("an empty story core drops its placeholder", () => {
  const out = injectAllStoryVariables("A {{STORY_CORE}} B", { storyCore: "  ", targetLengthChars: 500 });
  expect(out).toBe(`TARGET_LENGTH_CHARS: 500\n${SLIDE_COUNT_INSTRUCTION}\n\nA  B`);
});
