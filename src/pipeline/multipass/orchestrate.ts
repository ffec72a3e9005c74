import { InputError } from "../../errors.js";
import type { GenerateText } from "../../llm/backends.js";
import { llmJson } from "../../llm/llmJson.js";
import { log } from "../../utils/logger.js";
import { buildAnalyzePrompt } from "./prompts/analyzePrompt.js";
import { buildBeatsPrompt } from "./prompts/beatsPrompt.js";
import { buildCorePrompt } from "./prompts/corePrompt.js";
import { buildJudgePrompt } from "./prompts/judgePrompt.js";
import { buildNarratePrompt } from "./prompts/narratePrompt.js";
import { applySlideRepairs } from "./repair.js";
import type {
  MultipassDeps,
  MultipassInput,
  MultipassOutput,
  Pass0Analysis,
  StageLog,
  StageName,
} from "./types.js";
import { expectArray, expectObject, expectQualityReport, expectSlides } from "./validate.js";

const passLog = log.withScope("multipass");

export const DEFAULT_SLIDE_COUNT = 10;
const DEFAULT_TONE = "neutral";

function positiveInteger(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  const n = Math.trunc(value);
  return n > 0 ? n : undefined;
}

export function resolveSlideCount(analysis: Pass0Analysis, slidesHint?: number): number {
  return positiveInteger(analysis.recommended_slide_count) ?? positiveInteger(slidesHint) ?? DEFAULT_SLIDE_COUNT;
}

export function resolveTone(analysis: Pass0Analysis): string {
  const tone = analysis.tone_target;
  return typeof tone === "string" && tone.trim() ? tone.trim() : DEFAULT_TONE;
}

/**
 * One stage: ask for JSON (with at most one repair), then check its shape.
 * The shape check is fatal; nothing is retried after a wrong shape.
 */
async function runStage<T>(
  stage: StageName,
  prompt: string,
  generate: GenerateText,
  validate: (value: unknown, stage: StageName) => T,
  stageLogs: StageLog[],
): Promise<T> {
  const entry: StageLog = { stage, calls: 0, promptChars: prompt.length, responseChars: 0, durationMs: 0 };
  const counted: GenerateText = async (text) => {
    entry.calls += 1;
    const response = await generate(text);
    entry.responseChars += response.length;
    return response;
  };

  const started = Date.now();
  passLog.debug(`${stage}: start`, { promptChars: prompt.length });

  const parsed = await llmJson(prompt, counted, stage);
  const value = validate(parsed, stage);

  entry.durationMs = Date.now() - started;
  stageLogs.push(entry);
  passLog.info(`${stage}: ok`, { calls: entry.calls, ms: entry.durationMs });
  return value;
}

/**
 * Five dependent generation stages over the same clean text:
 * analyze, extract core, plan beats, narrate, judge. A failing judgement
 * may carry replacement slides, which are applied by position.
 */
export async function runMultipass(input: MultipassInput, deps: MultipassDeps): Promise<MultipassOutput> {
  if (!input.cleanSubtitles.trim()) {
    throw new InputError("Clean subtitles must not be empty");
  }

  const { generate } = deps;
  const stageLogs: StageLog[] = [];

  const pass0Analysis = await runStage(
    "analyze",
    buildAnalyzePrompt({ cleanSubtitles: input.cleanSubtitles, targetChars: input.targetChars }),
    generate,
    expectObject,
    stageLogs,
  );

  const storyCore = await runStage(
    "core",
    buildCorePrompt({ cleanSubtitles: input.cleanSubtitles, analysis: pass0Analysis }),
    generate,
    expectObject,
    stageLogs,
  );

  const slideCount = resolveSlideCount(pass0Analysis, input.slidesHint);
  const beats = await runStage(
    "beats",
    buildBeatsPrompt({ storyCore, analysis: pass0Analysis, slideCount }),
    generate,
    expectArray,
    stageLogs,
  );

  const narrated = await runStage(
    "narrate",
    buildNarratePrompt({ storyCore, beats, targetChars: input.targetChars, tone: resolveTone(pass0Analysis) }),
    generate,
    expectSlides,
    stageLogs,
  );

  const qualityReport = await runStage(
    "judge",
    buildJudgePrompt({ slides: narrated, storyCore }),
    generate,
    expectQualityReport,
    stageLogs,
  );

  const { slides, applied } = applySlideRepairs(narrated, qualityReport);
  if (applied.length > 0) {
    passLog.info(`judge: applied ${applied.length} slide repair(s)`, { positions: applied });
  }

  return {
    pass0Analysis,
    storyCore,
    beats,
    slides,
    qualityReport,
    repairsApplied: applied,
    stageLogs,
  };
}
