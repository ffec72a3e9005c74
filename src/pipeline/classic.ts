import type { CacheStore } from "../cache/types.js";
import { InputError } from "../errors.js";
import type { GenerateText } from "../llm/backends.js";
import { fillStoryCorePrompt } from "../prompts/fillStoryCore.js";
import { injectAllStoryVariables } from "../prompts/inject.js";
import type { SubtitleFetcher, TrackKind } from "../subtitles/fetchSubtitles.js";
import type { LangModes } from "../subtitles/langModes.js";
import { resolveLangs } from "../subtitles/langModes.js";
import { extractVideoId } from "../subtitles/videoId.js";
import type { CleanStats } from "../subtitles/vttToCleanText.js";
import { vttToCleanText } from "../subtitles/vttToCleanText.js";
import { log } from "../utils/logger.js";

const subsLog = log.withScope("subtitles");
const cacheLog = log.withScope("cache");
const pipeLog = log.withScope("pipeline");

export type SubtitleSource = TrackKind | "cache";

export type SubtitlesMeta = {
  videoId: string;
  source: SubtitleSource;
  /** "unknown" when both artifacts came from the cache. */
  lang: string;
  langMode: string;
  langs: string[];
  stats: CleanStats;
};

export type FetchAndCleanOptions = {
  langMode?: string;
  preferManual?: boolean;
  useCache?: boolean;
};

export type FetchAndCleanDeps = {
  fetcher: SubtitleFetcher;
  cache: CacheStore | null;
  langModes: LangModes;
  maxChars: number;
};

export type FetchAndCleanResult = {
  rawVtt: string;
  cleanText: string;
  meta: SubtitlesMeta;
};

function passthroughStats(text: string): CleanStats {
  return {
    cleanCharsBeforeDedupe: text.length,
    cleanCharsAfterDedupe: text.length,
    dedupeRatio: 1,
    removedChars: 0,
  };
}

/**
 * Subtitles for a video as clean prose. With the cache on, a cached clean
 * text (plus its raw track) short-circuits everything, and a cached raw
 * track skips the fetch. Fresh artifacts are written back.
 */
export async function fetchAndCleanSubtitles(
  url: string,
  opts: FetchAndCleanOptions,
  deps: FetchAndCleanDeps,
): Promise<FetchAndCleanResult> {
  const langMode = opts.langMode ?? deps.langModes.defaultMode;
  const langs = resolveLangs(deps.langModes, langMode);
  const preferManual = opts.preferManual ?? true;
  const cache = opts.useCache === false ? null : deps.cache;

  const videoId = extractVideoId(url);
  if (!videoId) {
    throw new InputError(`Not a valid YouTube video URL: ${url}`);
  }

  if (cache) {
    const cachedClean = cache.get(videoId, "clean_txt");
    const cachedRaw = cache.get(videoId, "raw_vtt");
    if (cachedClean !== null && cachedRaw !== null) {
      cacheLog.info(`hit clean_txt ${videoId}`);
      return {
        rawVtt: cachedRaw,
        cleanText: cachedClean,
        meta: { videoId, source: "cache", lang: "unknown", langMode, langs, stats: passthroughStats(cachedClean) },
      };
    }
    if (cachedRaw !== null) {
      cacheLog.info(`hit raw_vtt ${videoId}`);
      const cleaned = vttToCleanText(cachedRaw, { maxChars: deps.maxChars });
      cache.put(videoId, "clean_txt", cleaned.text);
      return {
        rawVtt: cachedRaw,
        cleanText: cleaned.text,
        meta: { videoId, source: "cache", lang: "unknown", langMode, langs, stats: cleaned.stats },
      };
    }
  }

  subsLog.info(`fetching ${videoId}`, { langs, preferManual });
  const fetched = await deps.fetcher.fetchSubtitles(url, langs, preferManual);
  const cleaned = vttToCleanText(fetched.rawVtt, { maxChars: deps.maxChars });
  subsLog.info(`cleaned ${videoId}`, {
    source: fetched.source,
    lang: fetched.lang,
    chars: cleaned.text.length,
    dedupeRatio: Number(cleaned.stats.dedupeRatio.toFixed(3)),
  });

  if (cache) {
    cache.put(videoId, "raw_vtt", fetched.rawVtt);
    cache.put(videoId, "clean_txt", cleaned.text);
  }

  return {
    rawVtt: fetched.rawVtt,
    cleanText: cleaned.text,
    meta: {
      videoId,
      source: fetched.source,
      lang: fetched.lang,
      langMode,
      langs,
      stats: cleaned.stats,
    },
  };
}

export type StoryCoreResult = {
  filledPrompt: string;
  storyCore: string;
};

/** Strict fill of the story-core template, then one generation call. */
export async function generateStoryCore(
  cleanText: string,
  deps: { generate: GenerateText; template: string },
): Promise<StoryCoreResult> {
  const filledPrompt = fillStoryCorePrompt(deps.template, cleanText);
  pipeLog.info("generating story core", { promptChars: filledPrompt.length });
  const storyCore = await deps.generate(filledPrompt);
  return { filledPrompt, storyCore };
}

export type StoryResult = {
  filledPrompt: string;
  story: string;
};

export async function generateStory(
  storyCore: string,
  targetLengthChars: number,
  deps: { generate: GenerateText; template: string },
): Promise<StoryResult> {
  if (!storyCore.trim()) {
    throw new InputError("STORY_CORE must not be empty");
  }
  if (!Number.isFinite(targetLengthChars) || targetLengthChars <= 0) {
    throw new InputError(`TARGET_LENGTH_CHARS must be a positive number, got ${targetLengthChars}`);
  }

  const filledPrompt = injectAllStoryVariables(deps.template, { storyCore, targetLengthChars });
  pipeLog.info("generating story", { promptChars: filledPrompt.length, targetLengthChars });
  const story = await deps.generate(filledPrompt);
  return { filledPrompt, story };
}
