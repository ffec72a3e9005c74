import { InputError } from "../../errors.js";
import type { TrackKind } from "../../subtitles/fetchSubtitles.js";

export const COMMANDS = ["clean", "core", "story", "multipass", "analyze"] as const;
export type Command = (typeof COMMANDS)[number];

type CommonArgs = {
  label: string | null;
  outDir: string | null;
};

export type CleanArgs = CommonArgs & {
  command: "clean";
  /** Local track to clean directly, bypassing fetch and cache. */
  input: string | null;
  url: string | null;
  /** Local track served for `url`. Without it only the cache can answer. */
  vtt: string | null;
  kind: TrackKind;
  lang: string;
  langMode: string | null;
  preferManual: boolean | null;
  useCache: boolean;
  maxChars: number | null;
};

export type CoreArgs = CommonArgs & {
  command: "core";
  input: string;
};

export type StoryArgs = CommonArgs & {
  command: "story";
  core: string;
  target: number;
};

export type MultipassArgs = CommonArgs & {
  command: "multipass";
  input: string;
  target: number | null;
  slides: number | null;
};

export type AnalyzeArgs = CommonArgs & {
  command: "analyze";
  original: string;
  story: string;
  improve: boolean;
};

export type CliArgs = CleanArgs | CoreArgs | StoryArgs | MultipassArgs | AnalyzeArgs;

export const USAGE = `Usage: story <command> [options]

Commands:
  clean      --input <track.vtt> | --url <video-url> [--vtt <track.vtt>] [--kind manual|auto] [--lang <code>]
             [--lang-mode <mode>] [--prefer-auto] [--no-cache] [--max-chars <n>]
  core       --input <clean.txt>
  story      --core <story_core.txt> --target <chars>
  multipass  --input <clean.txt> [--target <chars>] [--slides <n>]
  analyze    --original <clean.txt> --story <story.txt> [--improve]

Common options:
  --label <name>   run label under data/runs/
  --out <dir>      write outputs to <dir> instead`;

type Flags = Map<string, string | true>;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function collectFlags(argv: string[]): Flags {
  const flags: Flags = new Map();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      throw new InputError(`Unexpected argument '${arg}'`);
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(arg.slice(2), next);
      i += 1;
    } else {
      flags.set(arg.slice(2), true);
    }
  }
  return flags;
}

function optString(flags: Flags, name: string): string | null {
  const value = flags.get(name);
  if (value === undefined) return null;
  if (value === true) throw new InputError(`--${name} needs a value`);
  return value;
}

function requireString(flags: Flags, name: string): string {
  const value = optString(flags, name);
  if (value === null) throw new InputError(`Missing required argument: --${name}`);
  return value;
}

function optPositiveInt(flags: Flags, name: string): number | null {
  const value = optString(flags, name);
  if (value === null) return null;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InputError(`--${name} must be a positive integer, got '${value}'`);
  }
  return n;
}

function parseKind(flags: Flags): TrackKind {
  const value = optString(flags, "kind") ?? "manual";
  if (value === "manual" || value === "auto") return value;
  throw new InputError(`Invalid --kind '${value}'. Expected manual|auto.`);
}

export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new InputError(command ? `Unknown command '${command}'\n\n${USAGE}` : USAGE);
  }

  const flags = collectFlags(rest);
  const common: CommonArgs = {
    label: optString(flags, "label"),
    outDir: optString(flags, "out"),
  };

  switch (command) {
    case "clean": {
      const input = optString(flags, "input");
      const url = optString(flags, "url");
      if (!input && !url) {
        throw new InputError("clean needs --input <track.vtt> or --url <video-url>");
      }
      return {
        ...common,
        command,
        input,
        url,
        vtt: optString(flags, "vtt"),
        kind: parseKind(flags),
        lang: optString(flags, "lang") ?? "en",
        langMode: optString(flags, "lang-mode"),
        preferManual: flags.has("prefer-auto") ? false : null,
        useCache: !flags.has("no-cache"),
        maxChars: optPositiveInt(flags, "max-chars"),
      };
    }
    case "core":
      return { ...common, command, input: requireString(flags, "input") };
    case "story": {
      const target = optPositiveInt(flags, "target");
      if (target === null) throw new InputError("Missing required argument: --target");
      return { ...common, command, core: requireString(flags, "core"), target };
    }
    case "multipass":
      return {
        ...common,
        command,
        input: requireString(flags, "input"),
        target: optPositiveInt(flags, "target"),
        slides: optPositiveInt(flags, "slides"),
      };
    case "analyze":
      return {
        ...common,
        command,
        original: requireString(flags, "original"),
        story: requireString(flags, "story"),
        improve: flags.has("improve"),
      };
  }
}
