import { InputError } from "../../errors.js";
import type { GenerateText } from "../../llm/backends.js";
import { log } from "../../utils/logger.js";
import type { AnalysisSections } from "./parseAnalysis.js";
import { parseAnalysisResponse } from "./parseAnalysis.js";
import { buildAnalysisPrompt, buildImprovePrompt } from "./prompts.js";
import { containsCyrillic, similarityRatio } from "./similarity.js";

const analysisLog = log.withScope("analysis");

export const MAX_IMPROVE_SIMILARITY = 0.97;

export type AnalysisResult = AnalysisSections & {
  /** False when the improvement prompt still had Cyrillic after the retry. */
  englishOnly: boolean;
  retried: boolean;
};

/**
 * Score a generated story against its source. If the improvement prompt
 * comes back with Cyrillic, ask once more with a stricter instruction.
 */
export async function analyzeStory(
  input: { original: string; story: string },
  deps: { generate: GenerateText },
): Promise<AnalysisResult> {
  if (!input.story.trim()) {
    throw new InputError("Story to analyse must not be empty");
  }

  const first = parseAnalysisResponse(await deps.generate(buildAnalysisPrompt(input.original, input.story)));
  if (!containsCyrillic(first.improvementPrompt)) {
    return { ...first, englishOnly: true, retried: false };
  }

  analysisLog.warn("improvement prompt is not English, retrying with a strict prompt");
  const second = parseAnalysisResponse(
    await deps.generate(buildAnalysisPrompt(input.original, input.story, { strictEnglish: true })),
  );
  const englishOnly = !containsCyrillic(second.improvementPrompt);
  if (!englishOnly) {
    analysisLog.warn("improvement prompt is still not English after retry");
  }
  return { ...second, englishOnly, retried: true };
}

export type ImproveResult =
  | { accepted: true; story: string; similarity: number }
  | { accepted: false; reason: "non_english"; story: string }
  | { accepted: false; reason: "too_similar"; story: string; similarity: number };

/** Rewrite a story with an improvement prompt. Non-English or near-copy rewrites are rejected. */
export async function improveStory(
  input: { story: string; improvementPrompt: string },
  deps: { generate: GenerateText },
): Promise<ImproveResult> {
  if (!input.story.trim()) {
    throw new InputError("Story to improve must not be empty");
  }
  if (!input.improvementPrompt.trim()) {
    throw new InputError("Improvement prompt must not be empty");
  }

  const improved = await deps.generate(buildImprovePrompt(input.improvementPrompt, input.story));

  if (containsCyrillic(improved)) {
    analysisLog.warn("rewrite rejected: not English");
    return { accepted: false, reason: "non_english", story: improved };
  }

  const similarity = similarityRatio(input.story, improved);
  if (similarity > MAX_IMPROVE_SIMILARITY) {
    analysisLog.warn("rewrite rejected: too similar", { similarity: Number(similarity.toFixed(4)) });
    return { accepted: false, reason: "too_similar", story: improved, similarity };
  }

  analysisLog.info("rewrite accepted", { similarity: Number(similarity.toFixed(4)) });
  return { accepted: true, story: improved, similarity };
}
