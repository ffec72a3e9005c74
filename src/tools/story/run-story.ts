#!/usr/bin/env node
import "dotenv/config";
import { openCacheStore } from "../../cache/index.js";
import { cfg, printConfigSnapshot } from "../../config/env.js";
import { getEnvBool } from "../../config/rawEnv.js";
import { errorMessage, exitCodeForError, isStoryPipelineError } from "../../errors.js";
import { createGenerateText } from "../../llm/backends.js";
import { analyzeStory, improveStory } from "../../pipeline/analysis/analyze.js";
import { fetchAndCleanSubtitles, generateStory, generateStoryCore } from "../../pipeline/classic.js";
import { formatSlides } from "../../pipeline/formatSlides.js";
import { runMultipass } from "../../pipeline/multipass/orchestrate.js";
import { loadStoryCoreTemplate, loadStoryTemplate } from "../../prompts/templates.js";
import { StaticSubtitleFetcher } from "../../subtitles/fetchSubtitles.js";
import { loadLangModes } from "../../subtitles/langModes.js";
import { extractVideoId } from "../../subtitles/videoId.js";
import { vttToCleanText } from "../../subtitles/vttToCleanText.js";
import { log } from "../../utils/logger.js";
import type { AnalyzeArgs, CleanArgs, CliArgs, CoreArgs, MultipassArgs, StoryArgs } from "./args.js";
import { parseArgs } from "./args.js";
import { defaultRunLabel, readTextInput, writeRunOutputs } from "./io.js";

const cliLog = log.withScope("cli");

type Written = ReturnType<typeof writeRunOutputs>;

function writeOutputs(args: CliArgs, files: Record<string, string>, meta: Record<string, unknown>): Written {
  return writeRunOutputs({
    label: args.label ?? defaultRunLabel(args.command),
    files,
    meta: { command: args.command, generated_at: new Date().toISOString(), ...meta },
    outputDirOverride: args.outDir ?? undefined,
  });
}

function report(output: Written): void {
  for (const filePath of output.filePaths) {
    console.log(`✅ Written: ${filePath}`);
  }
  console.log(`✅ Meta written: ${output.metaPath}`);
}

async function runClean(args: CleanArgs): Promise<void> {
  const maxChars = args.maxChars ?? cfg.subtitles.maxChars;

  if (args.input) {
    const cleaned = vttToCleanText(readTextInput(args.input), { maxChars });
    report(writeOutputs(args, { "clean.txt": cleaned.text }, { input: args.input, stats: cleaned.stats }));
    return;
  }

  const url = args.url ?? "";
  const fetcher = new StaticSubtitleFetcher();
  const videoId = extractVideoId(url);
  if (videoId && args.vtt) {
    fetcher.addTrackFile(videoId, args.kind, args.lang, args.vtt);
  }

  const cache = args.useCache ? openCacheStore(cfg) : null;
  try {
    const result = await fetchAndCleanSubtitles(
      url,
      {
        langMode: args.langMode ?? cfg.subtitles.defaultLangMode,
        preferManual: args.preferManual ?? cfg.subtitles.preferManual,
        useCache: args.useCache,
      },
      {
        fetcher,
        cache,
        langModes: loadLangModes(cfg.subtitles.langModesPath),
        maxChars,
      },
    );
    report(
      writeOutputs(
        args,
        { "raw.vtt": result.rawVtt, "clean.txt": result.cleanText },
        { url, ...result.meta },
      ),
    );
  } finally {
    cache?.close?.();
  }
}

async function runCore(args: CoreArgs): Promise<void> {
  const result = await generateStoryCore(readTextInput(args.input), {
    generate: createGenerateText(cfg),
    template: loadStoryCoreTemplate(cfg),
  });
  report(
    writeOutputs(
      args,
      { "story_core_prompt.filled.txt": result.filledPrompt, "story_core.txt": result.storyCore },
      { input: args.input, backend: cfg.llm.backend, model: cfg.llm.model },
    ),
  );
}

async function runStory(args: StoryArgs): Promise<void> {
  const result = await generateStory(readTextInput(args.core), args.target, {
    generate: createGenerateText(cfg),
    template: loadStoryTemplate(cfg),
  });
  report(
    writeOutputs(
      args,
      { "prompt_story.filled.txt": result.filledPrompt, "story.txt": result.story },
      { core: args.core, target_length_chars: args.target, backend: cfg.llm.backend, model: cfg.llm.model },
    ),
  );
}

async function runMultipassCommand(args: MultipassArgs): Promise<void> {
  const result = await runMultipass(
    {
      cleanSubtitles: readTextInput(args.input),
      targetChars: args.target ?? undefined,
      slidesHint: args.slides ?? undefined,
    },
    { generate: createGenerateText(cfg) },
  );

  report(
    writeOutputs(
      args,
      {
        "slides.txt": formatSlides(result.slides),
        "multipass.json": JSON.stringify(
          {
            pass0_analysis: result.pass0Analysis,
            story_core: result.storyCore,
            beats: result.beats,
            slides: result.slides,
            quality_report: result.qualityReport.raw,
          },
          null,
          2,
        ),
      },
      {
        input: args.input,
        target_chars: args.target,
        slides_hint: args.slides,
        quality_status: result.qualityReport.status,
        repairs_applied: result.repairsApplied,
        stages: result.stageLogs,
      },
    ),
  );
}

async function runAnalyze(args: AnalyzeArgs): Promise<void> {
  const generate = createGenerateText(cfg);
  const story = readTextInput(args.story);
  const analysis = await analyzeStory({ original: readTextInput(args.original), story }, { generate });

  const files: Record<string, string> = {
    "analysis_report.md": analysis.report,
    "comparison_table.md": analysis.comparisonTable,
    "improvement_prompt.txt": analysis.improvementPrompt,
  };
  const meta: Record<string, unknown> = {
    original: args.original,
    story: args.story,
    english_only: analysis.englishOnly,
    retried: analysis.retried,
  };

  if (!analysis.englishOnly) {
    console.warn("⚠️ The improvement prompt is not in English after a retry.");
  }

  if (args.improve && analysis.improvementPrompt) {
    const improved = await improveStory({ story, improvementPrompt: analysis.improvementPrompt }, { generate });
    meta.improve = improved.accepted
      ? { accepted: true, similarity: improved.similarity }
      : { accepted: false, reason: improved.reason };
    if (improved.accepted) {
      files["improved_story.txt"] = improved.story;
    } else {
      console.warn(`⚠️ Rewrite rejected (${improved.reason}); improved story not written.`);
    }
  }

  report(writeOutputs(args, files, meta));
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (getEnvBool("PRINT_CONFIG", false)) {
    printConfigSnapshot(cfg);
  }
  cliLog.debug(`command ${args.command}`);

  switch (args.command) {
    case "clean":
      return runClean(args);
    case "core":
      return runCore(args);
    case "story":
      return runStory(args);
    case "multipass":
      return runMultipassCommand(args);
    case "analyze":
      return runAnalyze(args);
  }
}

main().catch((err: unknown) => {
  const kind = isStoryPipelineError(err) ? ` [${err.kind}]` : "";
  console.error(`❌${kind}`, errorMessage(err));
  process.exit(exitCodeForError(err));
});
