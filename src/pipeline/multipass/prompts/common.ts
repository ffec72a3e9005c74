export const SOURCE_TEXT_LIMIT = 10000;

export const JSON_ONLY_FOOTER = "DO NOT include anything outside JSON. No markdown.";

export function clipSource(text: string): string {
  return text.slice(0, SOURCE_TEXT_LIMIT);
}

export function jsonBlock(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
