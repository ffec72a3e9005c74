import { InputError, TemplateContractError } from "../errors.js";

const ORIGINAL_STORY_LABEL = "ORIGINAL_STORY:";
const CORE_OBJECTIVE = "CORE OBJECTIVE";
const ORIGINAL_STORY_SECTION = /(ORIGINAL_STORY:)\s*[\s\S]*?\n(CORE OBJECTIVE\b)/;

/**
 * Strict fill for the story-core template. Its contract is fixed: an
 * `ORIGINAL_STORY:` label followed, further down, by a `CORE OBJECTIVE`
 * line. Everything between them is replaced with the braced source text.
 */
export function fillStoryCorePrompt(template: string, originalStory: string): string {
  const story = originalStory.trimEnd();
  if (!story.trim()) {
    throw new InputError("ORIGINAL_STORY must not be empty");
  }

  const match = ORIGINAL_STORY_SECTION.exec(template);
  if (!match) {
    if (!template.includes(ORIGINAL_STORY_LABEL)) {
      throw new TemplateContractError(
        `Story core template does not contain '${ORIGINAL_STORY_LABEL}'`,
        "label",
      );
    }
    if (!template.includes(CORE_OBJECTIVE)) {
      throw new TemplateContractError(
        `Story core template does not contain '${CORE_OBJECTIVE}' after '${ORIGINAL_STORY_LABEL}'`,
        "terminator",
      );
    }
    throw new TemplateContractError(
      `Could not locate the ORIGINAL_STORY block: '${CORE_OBJECTIVE}' must start a line below '${ORIGINAL_STORY_LABEL}'`,
      "block",
    );
  }

  const replacement = `${match[1]}\n{${story}}\n\n${match[2]}`;
  return template.slice(0, match.index) + replacement + template.slice(match.index + match[0].length);
}
