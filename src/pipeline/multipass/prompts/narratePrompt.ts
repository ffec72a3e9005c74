import type { Beat, StoryCoreJson } from "../types.js";
import { JSON_ONLY_FOOTER, jsonBlock } from "./common.js";

export function buildNarratePrompt(input: {
  storyCore: StoryCoreJson;
  beats: Beat[];
  targetChars?: number;
  tone: string;
}): string {
  return `You are a Narration Controller for YouTube stories.

STORY CORE:
${jsonBlock(input.storyCore)}

BEATS:
${jsonBlock(input.beats)}

TARGET CHARACTER COUNT: ${input.targetChars ? input.targetChars : "flexible"}
TONE: ${input.tone}

TASK:
Write the actual narrative for each slide following the beats.

CRITICAL REQUIREMENTS:
- Output MUST be a JSON array
- Each slide MUST have exactly: {"Text":"{...}","Prompt":"{...}"}
- Text: The spoken narration (wrapped in braces { })
- Prompt: Voice style instructions for TTS (wrapped in braces { }, rich but concise)
- Stay close to target character count ±10%
- Use conversational, first-person POV where appropriate
- Show don't tell, no moralizing

FORMAT RULES:
- Text and Prompt MUST include braces { }
- DO NOT include anything outside JSON
- No markdown
- No explanations

OUTPUT (JSON array only):
[
    {"Text":"{Your narration here}","Prompt":"{Voice delivery style}"},
    {"Text":"{Slide 2 narration}","Prompt":"{Voice style 2}"},
    ...
]

${JSON_ONLY_FOOTER}`;
}
