import type { Slide } from "./multipass/types.js";

function ensureBraces(value: string): string {
  let out = value.trim();
  if (!out.startsWith("{")) out = `{${out}`;
  if (!out.endsWith("}")) out = `${out}}`;
  return out;
}

export function formatSlide(text: string, prompt: string): string {
  return `Text:\n${ensureBraces(text)}\n\nPrompt:\n${ensureBraces(prompt)}`;
}

/** Slides in order, separated by a blank line. */
export function formatSlides(slides: readonly Slide[]): string {
  return slides.map((slide) => formatSlide(slide.narration, slide.voiceDirection)).join("\n\n");
}
