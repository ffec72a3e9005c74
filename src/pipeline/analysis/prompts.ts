export const ORIGINAL_SHORTEN_THRESHOLD = 5000;
export const ORIGINAL_KEEP_EDGE_CHARS = 2000;
export const SHORTENED_MARKER = "\n\n[...text shortened...]\n\n";

export const COMPARISON_TABLE_HEADER = "## COMPARISON TABLE";
export const IMPROVEMENT_PROMPT_HEADER = "## IMPROVEMENT PROMPT";

const ENGLISH_SECTION_PREAMBLE = `OUTPUT LANGUAGE: For the "IMPROVEMENT PROMPT" section, output ENGLISH ONLY. Do not output any Ukrainian/Russian in that section.`;
const ENGLISH_ONLY_PREAMBLE = "OUTPUT LANGUAGE: ENGLISH ONLY. Do not output any Ukrainian/Russian.";
const ENGLISH_ONLY_CODA = `CRITICAL: The "IMPROVEMENT PROMPT" section must be in ENGLISH ONLY. No other language.`;

/** Long originals keep their opening and closing stretches only. */
export function shortenOriginal(original: string): string {
  if (original.length <= ORIGINAL_SHORTEN_THRESHOLD) return original;
  return (
    original.slice(0, ORIGINAL_KEEP_EDGE_CHARS) +
    SHORTENED_MARKER +
    original.slice(original.length - ORIGINAL_KEEP_EDGE_CHARS)
  );
}

function analysisBody(original: string, generated: string): string {
  return `You are an expert in analysing narrative texts for YouTube.

Your task: give an honest analysis of the generated story compared with the original.

INPUT:

ORIGINAL (subtitles):
${original}

GENERATED STORY:
${generated}

TASK:

1. Score the generated story from 0 to 10 on each metric:
   - Hook (strength of the opening slides)
   - Retention chain (open loops / tension)
   - Clarity
   - Pacing
   - Repetition (absence of repeats)
   - Ending impact

2. List 3 strengths (bullet list)

3. List 3 weaknesses (bullet list)

4. Build a comparison table in markdown:
   | Criterion | Original | Generated | Comment |
   |-----------|----------|-----------|---------|
   | Hook | ... | ... | ... |
   | Stakes clarity | ... | ... | ... |
   | Loops | ... | ... | ... |
   | Escalation | ... | ... | ... |
   | Specificity | ... | ... | ... |
   | Ending | ... | ... | ... |

5. Write an "Improvement prompt": a ready-to-use prompt telling a model how to rewrite the generated story:
   - Keep the key facts
   - Fix the weaknesses found
   - Follow the style rules: show-don't-tell, conversational, no moralizing
   - Avoid repetition

OUTPUT FORMAT (follow strictly):

## SCORES (0-10)
- Hook: [number]/10
- Retention chain: [number]/10
- Clarity: [number]/10
- Pacing: [number]/10
- Repetition: [number]/10
- Ending impact: [number]/10

## STRENGTHS
- [first]
- [second]
- [third]

## WEAKNESSES
- [first]
- [second]
- [third]

${COMPARISON_TABLE_HEADER}
[markdown table here]

${IMPROVEMENT_PROMPT_HEADER}
[improvement prompt text]`;
}

export function buildAnalysisPrompt(
  original: string,
  generated: string,
  opts: { strictEnglish?: boolean } = {},
): string {
  const body = analysisBody(shortenOriginal(original), generated);
  if (opts.strictEnglish) {
    return `${ENGLISH_ONLY_PREAMBLE}\n\n${body}\n\n${ENGLISH_ONLY_CODA}`;
  }
  return `${ENGLISH_SECTION_PREAMBLE}\n\n${body}`;
}

export function buildImprovePrompt(improvementPrompt: string, story: string): string {
  return `${ENGLISH_ONLY_PREAMBLE}

${improvementPrompt}

ORIGINAL GENERATED STORY (to rewrite):
${story}

Rewrite the story according to the instructions above, preserving key facts and improving identified weaknesses.

STRICT FORMAT REQUIREMENTS:
- Each slide must be exactly:
  text:{...}
  prompt:{...}
- No headings, no numbering, no markdown.
- Preserve the exact slide structure.
- Output in ENGLISH ONLY.

ANTI-COPY RULES (CRITICAL):
- You MUST rewrite every text:{...} block.
- DO NOT reuse original sentences.
- Change wording in EVERY slide while keeping meaning.
- If output is too similar to input, rewrite more aggressively.
- Paraphrase, rephrase, restructure - but keep the core facts and narrative flow.
- This is a REWRITE task, not a copy-paste task.`;
}
