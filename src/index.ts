export * from "./errors.js";
export { loadConfig } from "./config/env.js";
export type { Config } from "./config/types.js";

export {
  DEFAULT_MAX_SUBTITLE_CHARS,
  vttToCleanText,
  stripStructure,
  dedupeConsecutiveLines,
  joinContinuationLines,
  normalizeWhitespace,
  dedupeConsecutiveSentences,
  extractFallbackText,
  capLength,
} from "./subtitles/vttToCleanText.js";
export type { CleanResult, CleanStats } from "./subtitles/vttToCleanText.js";
export { collapseConsecutiveRepeatedPhrases, normalizeToken } from "./subtitles/phraseDedupe.js";
export { extractVideoId } from "./subtitles/videoId.js";
export { StaticSubtitleFetcher, selectSubtitleTrack } from "./subtitles/fetchSubtitles.js";
export type { FetchedSubtitles, SubtitleFetcher, TrackKind } from "./subtitles/fetchSubtitles.js";
export { builtinLangModes, loadLangModes, resolveLangs } from "./subtitles/langModes.js";
export type { LangModes } from "./subtitles/langModes.js";

export { FileCacheStore, SqliteCacheStore, openCacheStore } from "./cache/index.js";
export type { CacheKind, CacheStore } from "./cache/index.js";

export {
  injectAllStoryVariables,
  injectStoryCore,
  injectSubtitles,
  injectTargetLength,
  injectVariable,
  stripSlideCount,
} from "./prompts/inject.js";
export { fillStoryCorePrompt } from "./prompts/fillStoryCore.js";
export {
  defaultStoryTemplate,
  loadPromptFile,
  loadStoryCoreTemplate,
  loadStoryTemplate,
  loadTemplateFromFile,
} from "./prompts/templates.js";

export { createGenerateText, createGenaiAppBackend, createOpenAiBackend } from "./llm/backends.js";
export type { GenerateText } from "./llm/backends.js";
export { extractJsonFromText, parseJsonFromLlm } from "./llm/parseJsonFromLlm.js";
export { llmJson } from "./llm/llmJson.js";

export { fetchAndCleanSubtitles, generateStory, generateStoryCore } from "./pipeline/classic.js";
export { formatSlide, formatSlides } from "./pipeline/formatSlides.js";
export { runMultipass } from "./pipeline/multipass/orchestrate.js";
export { applySlideRepairs } from "./pipeline/multipass/repair.js";
export type { MultipassInput, MultipassOutput, Slide } from "./pipeline/multipass/types.js";
export { analyzeStory, improveStory } from "./pipeline/analysis/analyze.js";
export { buildAnalysisPrompt } from "./pipeline/analysis/prompts.js";
export { parseAnalysisResponse } from "./pipeline/analysis/parseAnalysis.js";
export { similarityRatio } from "./pipeline/analysis/similarity.js";
