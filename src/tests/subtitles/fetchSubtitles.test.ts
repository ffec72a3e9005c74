import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { InputError, NotAvailableError } from "../../errors.js";
import { StaticSubtitleFetcher, selectSubtitleTrack } from "../../subtitles/fetchSubtitles.js";
import { extractVideoId } from "../../subtitles/videoId.js";

const VIDEO_ID = "abcDEF12345";

test("extractVideoId understands the common URL shapes", () => {
  expect(extractVideoId(`https://www.youtube.com/watch?v=${VIDEO_ID}`)).toBe(VIDEO_ID);
  expect(extractVideoId(`https://youtu.be/${VIDEO_ID}?t=10`)).toBe(VIDEO_ID);
  expect(extractVideoId(`https://www.youtube.com/embed/${VIDEO_ID}`)).toBe(VIDEO_ID);
  expect(extractVideoId(`https://youtube.com/shorts/${VIDEO_ID}`)).toBe(VIDEO_ID);
  expect(extractVideoId(`https://www.youtube.com/watch?feature=share&v=${VIDEO_ID}`)).toBe(VIDEO_ID);
  expect(extractVideoId("https://example.com/video")).toBeNull();
});

test("preferred kind is tried across every language before the other kind", () => {
  const available = { manual: ["uk"], auto: ["en", "uk"] };
  expect(selectSubtitleTrack(available, ["en", "uk"], true)).toEqual({ kind: "manual", lang: "uk" });
  expect(selectSubtitleTrack(available, ["en", "uk"], false)).toEqual({ kind: "auto", lang: "en" });
  expect(selectSubtitleTrack({ manual: [], auto: ["ru"] }, ["en", "ru"], true)).toEqual({
    kind: "auto",
    lang: "ru",
  });
});

test("no matching track is a not-available error carrying the requested languages", () => {
  let caught: unknown;
  try {
    selectSubtitleTrack({ manual: ["de"], auto: [] }, ["en", "uk"], true);
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(NotAvailableError);
  if (caught instanceof NotAvailableError) {
    expect(caught.kind).toBe("not_available");
    expect(caught.requestedLangs).toEqual(["en", "uk"]);
  }
});

test("static fetcher serves the selected track with availability metadata", async () => {
  const fetcher = new StaticSubtitleFetcher()
    .addTrack(VIDEO_ID, "auto", "en", "WEBVTT\n\nauto en")
    .addTrack(VIDEO_ID, "manual", "uk", "WEBVTT\n\nmanual uk");

  const fetched = await fetcher.fetchSubtitles(`https://youtu.be/${VIDEO_ID}`, ["en", "uk"], true);
  expect(fetched).toEqual({
    videoId: VIDEO_ID,
    source: "manual",
    lang: "uk",
    rawVtt: "WEBVTT\n\nmanual uk",
    requestedLangs: ["en", "uk"],
    availableManualLangs: ["uk"],
    availableAutoLangs: ["en"],
  });
});

test("static fetcher reads tracks from local files", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "subtitle-story-fetch-"));
  const trackPath = path.join(dir, "track.vtt");
  fs.writeFileSync(trackPath, "WEBVTT\n\nfrom disk", "utf-8");

  const fetcher = new StaticSubtitleFetcher().addTrackFile(VIDEO_ID, "manual", "en", trackPath);
  const fetched = await fetcher.fetchSubtitles(`https://www.youtube.com/watch?v=${VIDEO_ID}`, ["en"], true);
  expect(fetched.rawVtt).toBe("WEBVTT\n\nfrom disk");
});

test("an unparseable URL is an input error", async () => {
  await expect(new StaticSubtitleFetcher().fetchSubtitles("not a url", ["en"], true)).rejects.toBeInstanceOf(
    InputError,
  );
});

test("an unknown video has no tracks", async () => {
  await expect(
    new StaticSubtitleFetcher().fetchSubtitles(`https://youtu.be/${VIDEO_ID}`, ["en"], true),
  ).rejects.toBeInstanceOf(NotAvailableError);
});
