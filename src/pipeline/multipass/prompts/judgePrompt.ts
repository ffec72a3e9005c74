import type { Slide, StoryCoreJson } from "../types.js";
import { JSON_ONLY_FOOTER, jsonBlock } from "./common.js";

export function buildJudgePrompt(input: { slides: Slide[]; storyCore: StoryCoreJson }): string {
  const generated = input.slides.map((slide) => ({ Text: slide.narration, Prompt: slide.voiceDirection }));

  return `You are a Quality Judge for YouTube stories.

GENERATED SLIDES:
${jsonBlock(generated)}

STORY CORE:
${jsonBlock(input.storyCore)}

TASK:
Evaluate the generated slides and identify issues. Repair if needed.

EVALUATION CRITERIA:
- Hook strength (slides 1-2)
- Retention chain (unresolved loops)
- Pacing consistency
- POV consistency
- Repetition or filler
- Ending impact

OUTPUT (JSON only, no markdown):
{
    "status": "pass|fail",
    "issues": [
        {"slide": integer, "problem": "string", "fix": "string"}
    ],
    "repaired_slides": [
        {"slide": integer, "Text": "{...}", "Prompt": "{...}"}
    ]
}

If status is "pass", repaired_slides can be empty.
If status is "fail", provide repaired versions of problematic slides only.

${JSON_ONLY_FOOTER}`;
}
