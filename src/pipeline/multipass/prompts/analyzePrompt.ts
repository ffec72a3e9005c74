import { JSON_ONLY_FOOTER, clipSource } from "./common.js";

export function buildAnalyzePrompt(input: { cleanSubtitles: string; targetChars?: number }): string {
  const target = input.targetChars ? `TARGET CHARACTER COUNT: ${input.targetChars}` : "";

  return `You are a YouTube Story Analyzer.

INPUT:
Clean subtitles from a YouTube video (ORIGINAL_STORY):
${clipSource(input.cleanSubtitles)}

${target}

TASK:
Analyze this story and provide recommendations for optimal slide structure.

OUTPUT (JSON only, no explanations, no markdown):
{
    "avg_wpm_guess": number,
    "pacing_risk": "low|medium|high",
    "recommended_slide_sec": number (typically 45-75, around 1 minute per slide),
    "recommended_slide_count": integer,
    "target_chars_per_slide": integer (computed from TARGET/slide_count),
    "tone_target": "neutral|intimate|cold|energetic",
    "notes": "string"
}

${JSON_ONLY_FOOTER}`;
}
