import { ContractViolationError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { GenerateText } from "./backends.js";
import { parseJsonFromLlm } from "./parseJsonFromLlm.js";

const llmLog = log.withScope("llm");

export function buildJsonRepairPrompt(brokenText: string): string {
  return `The following text should be valid JSON but has errors. Fix it and output ONLY valid JSON, nothing else.

TEXT TO REPAIR:
${brokenText}

OUTPUT REQUIREMENTS:
- Valid JSON only
- No explanations
- No markdown
- No code fences`;
}

/**
 * Ask for JSON; on an unparseable reply ask once more to repair it.
 * A second failure is fatal for the stage. Generation errors propagate untouched.
 */
export async function llmJson(prompt: string, generate: GenerateText, stage: string): Promise<unknown> {
  const response = await generate(prompt);

  let firstError: unknown;
  try {
    return parseJsonFromLlm(response);
  } catch (err) {
    firstError = err;
  }

  llmLog.warn(`${stage}: reply was not valid JSON, requesting repair`, { error: errorMessage(firstError) });
  const repaired = await generate(buildJsonRepairPrompt(response));

  try {
    return parseJsonFromLlm(repaired);
  } catch (err) {
    throw new ContractViolationError(
      `${stage}: JSON parsing failed even after repair. Original: ${errorMessage(firstError)}, Repair: ${errorMessage(err)}`,
      stage,
      { cause: err },
    );
  }
}
