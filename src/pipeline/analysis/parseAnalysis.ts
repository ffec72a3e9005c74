import { COMPARISON_TABLE_HEADER, IMPROVEMENT_PROMPT_HEADER } from "./prompts.js";

export type AnalysisSections = {
  report: string;
  comparisonTable: string;
  improvementPrompt: string;
};

/**
 * Split an analysis reply on its section headers. The report is whatever
 * precedes the first recognised section; with no sections it is the whole reply.
 */
export function parseAnalysisResponse(text: string): AnalysisSections {
  const tableStart = text.indexOf(COMPARISON_TABLE_HEADER);
  const promptStart = text.indexOf(IMPROVEMENT_PROMPT_HEADER);

  let comparisonTable = "";
  if (tableStart !== -1) {
    const tableEnd = promptStart > tableStart ? promptStart : text.length;
    comparisonTable = text.slice(tableStart + COMPARISON_TABLE_HEADER.length, tableEnd).trim();
  }

  const improvementPrompt =
    promptStart !== -1 ? text.slice(promptStart + IMPROVEMENT_PROMPT_HEADER.length).trim() : "";

  const firstSection = [tableStart, promptStart].filter((index) => index !== -1);
  const report = firstSection.length > 0 ? text.slice(0, Math.min(...firstSection)).trim() : text.trim();

  return { report, comparisonTable, improvementPrompt };
}
