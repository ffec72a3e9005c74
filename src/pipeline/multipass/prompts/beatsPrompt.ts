import type { Pass0Analysis, StoryCoreJson } from "../types.js";
import { JSON_ONLY_FOOTER, jsonBlock } from "./common.js";

export function buildBeatsPrompt(input: {
  storyCore: StoryCoreJson;
  analysis: Pass0Analysis;
  slideCount: number;
}): string {
  return `You are a Beat Architect for YouTube storytelling.

STORY CORE:
${jsonBlock(input.storyCore)}

PASS0 RECOMMENDATIONS:
${jsonBlock(input.analysis)}

TARGET SLIDE COUNT: ${input.slideCount}

TASK:
Design beat-by-beat structure for each slide.

OUTPUT (JSON array only, no markdown):
[
    {
        "slide": 1,
        "beat_goal": "string",
        "pressure": "string",
        "reveal": "string",
        "viewer_question": "string",
        "physical_anchor": "string"
    },
    ...
]

${JSON_ONLY_FOOTER}`;
}
