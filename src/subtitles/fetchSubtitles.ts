import fs from "node:fs";
import { InputError, NotAvailableError } from "../errors.js";
import { extractVideoId } from "./videoId.js";

export type TrackKind = "manual" | "auto";

/** Raw caption tracks per language, split by how they were produced. */
export type AvailableTracks = {
  manual: Record<string, string>;
  auto: Record<string, string>;
};

export type SelectedTrack = {
  kind: TrackKind;
  lang: string;
};

export type FetchedSubtitles = {
  videoId: string;
  source: TrackKind;
  lang: string;
  rawVtt: string;
  requestedLangs: string[];
  availableManualLangs: string[];
  availableAutoLangs: string[];
};

export interface SubtitleFetcher {
  fetchSubtitles(url: string, langs: string[], preferManual: boolean): Promise<FetchedSubtitles>;
}

/**
 * Preferred kind across every language in order, then the other kind across
 * every language in order.
 */
export function selectSubtitleTrack(
  available: { manual: readonly string[]; auto: readonly string[] },
  langs: readonly string[],
  preferManual: boolean,
): SelectedTrack {
  const order: TrackKind[] = preferManual ? ["manual", "auto"] : ["auto", "manual"];

  for (const kind of order) {
    const lang = langs.find((candidate) => available[kind].includes(candidate));
    if (lang) return { kind, lang };
  }

  throw new NotAvailableError(
    `No subtitles available for languages: ${langs.join(", ") || "(none)"}`,
    langs,
  );
}

/**
 * Serves tracks that are already on hand (in memory or local .vtt files).
 * Downloading from the video host is outside this project.
 */
export class StaticSubtitleFetcher implements SubtitleFetcher {
  private readonly catalog = new Map<string, AvailableTracks>();

  addTrack(videoId: string, kind: TrackKind, lang: string, rawVtt: string): this {
    const tracks = this.catalog.get(videoId) ?? { manual: {}, auto: {} };
    tracks[kind][lang] = rawVtt;
    this.catalog.set(videoId, tracks);
    return this;
  }

  addTrackFile(videoId: string, kind: TrackKind, lang: string, filePath: string): this {
    return this.addTrack(videoId, kind, lang, fs.readFileSync(filePath, "utf-8"));
  }

  async fetchSubtitles(url: string, langs: string[], preferManual: boolean): Promise<FetchedSubtitles> {
    const videoId = extractVideoId(url);
    if (!videoId) {
      throw new InputError(`Not a valid YouTube video URL: ${url}`);
    }

    const tracks = this.catalog.get(videoId) ?? { manual: {}, auto: {} };
    const availableManualLangs = Object.keys(tracks.manual);
    const availableAutoLangs = Object.keys(tracks.auto);

    const selected = selectSubtitleTrack(
      { manual: availableManualLangs, auto: availableAutoLangs },
      langs,
      preferManual,
    );

    return {
      videoId,
      source: selected.kind,
      lang: selected.lang,
      rawVtt: tracks[selected.kind][selected.lang] ?? "",
      requestedLangs: [...langs],
      availableManualLangs,
      availableAutoLangs,
    };
  }
}
