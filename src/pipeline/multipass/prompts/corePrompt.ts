import type { Pass0Analysis } from "../types.js";
import { JSON_ONLY_FOOTER, clipSource, jsonBlock } from "./common.js";

export function buildCorePrompt(input: { cleanSubtitles: string; analysis: Pass0Analysis }): string {
  return `You are a Story Core Architect for YouTube retention.

INPUT:
${clipSource(input.cleanSubtitles)}

PASS0 ANALYSIS:
${jsonBlock(input.analysis)}

TASK:
Extract the core conflict and structure that will drive retention.

OUTPUT (JSON only, no explanations, no markdown):
{
    "core_conflict": "string",
    "promise_to_viewer": "string",
    "stakes": "string",
    "hidden_reveal": "string",
    "twist_timing": "early|mid|late",
    "ending_payoff": "string"
}

${JSON_ONLY_FOOTER}`;
}
