import type { QualityReport, Slide } from "./types.js";

/**
 * Overwrite slides named by a failing quality report. Positions are 1-based;
 * positions outside the list are skipped. Returns a new list and the
 * positions that were applied.
 */
export function applySlideRepairs(
  slides: readonly Slide[],
  report: Pick<QualityReport, "status" | "repairedSlides">,
): { slides: Slide[]; applied: number[] } {
  const next = slides.map((slide) => ({ ...slide }));
  const applied: number[] = [];

  if (report.status !== "fail") {
    return { slides: next, applied };
  }

  for (const repaired of report.repairedSlides) {
    if (repaired.position < 1 || repaired.position > next.length) continue;
    next[repaired.position - 1] = {
      narration: repaired.narration,
      voiceDirection: repaired.voiceDirection,
    };
    applied.push(repaired.position);
  }

  return { slides: next, applied };
}
