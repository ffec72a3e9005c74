import type { GenerateText } from "../../llm/backends.js";

export type JsonObject = Record<string, unknown>;

export type StageName = "analyze" | "core" | "beats" | "narrate" | "judge";

export type MultipassInput = {
  /** Clean subtitle text, used as the original story. */
  cleanSubtitles: string;
  targetChars?: number;
  slidesHint?: number;
};

/** Pacing and slide-count recommendation. Keys are whatever the model returned. */
export type Pass0Analysis = JsonObject;

/** Conflict, stakes, reveal and payoff. */
export type StoryCoreJson = JsonObject;

export type Beat = unknown;

export type Slide = {
  narration: string;
  voiceDirection: string;
};

export type RepairedSlide = Slide & {
  /** 1-based position in the narrated slide list. */
  position: number;
};

export type QualityReport = {
  status: string;
  issues: unknown[];
  repairedSlides: RepairedSlide[];
  raw: JsonObject;
};

export type StageLog = {
  stage: StageName;
  /** 1, or 2 when a JSON repair was requested. */
  calls: number;
  promptChars: number;
  responseChars: number;
  durationMs: number;
};

export type MultipassOutput = {
  pass0Analysis: Pass0Analysis;
  storyCore: StoryCoreJson;
  beats: Beat[];
  /** Narrated slides with judge repairs applied. */
  slides: Slide[];
  qualityReport: QualityReport;
  repairsApplied: number[];
  stageLogs: StageLog[];
};

export type MultipassDeps = {
  generate: GenerateText;
};
