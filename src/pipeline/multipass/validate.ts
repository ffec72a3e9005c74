import { ContractViolationError } from "../../errors.js";
import type { JsonObject, QualityReport, RepairedSlide, Slide, StageName } from "./types.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function expectObject(value: unknown, stage: StageName): JsonObject {
  if (!isJsonObject(value)) {
    throw new ContractViolationError(`${stage}: expected a JSON object, got ${describe(value)}`, stage);
  }
  return value;
}

export function expectArray(value: unknown, stage: StageName): unknown[] {
  if (!Array.isArray(value)) {
    throw new ContractViolationError(`${stage}: expected a JSON array, got ${describe(value)}`, stage);
  }
  return value;
}

/** Every element must be an object holding string `Text` and `Prompt`. */
export function expectSlides(value: unknown, stage: StageName): Slide[] {
  return expectArray(value, stage).map((item, index) => {
    if (!isJsonObject(item)) {
      throw new ContractViolationError(`${stage}: slide ${index + 1} must be an object, got ${describe(item)}`, stage);
    }
    const { Text, Prompt } = item;
    if (typeof Text !== "string" || typeof Prompt !== "string") {
      throw new ContractViolationError(`${stage}: slide ${index + 1} missing Text or Prompt`, stage);
    }
    return { narration: Text, voiceDirection: Prompt };
  });
}

function toRepairedSlide(item: unknown): RepairedSlide | null {
  if (!isJsonObject(item)) return null;
  const position = item.slide;
  if (typeof position !== "number" || !Number.isInteger(position)) return null;
  return {
    position,
    narration: typeof item.Text === "string" ? item.Text : "",
    voiceDirection: typeof item.Prompt === "string" ? item.Prompt : "",
  };
}

/** Only the top-level object is mandatory; malformed repair entries are dropped. */
export function expectQualityReport(value: unknown, stage: StageName): QualityReport {
  const raw = expectObject(value, stage);
  const repaired = Array.isArray(raw.repaired_slides) ? raw.repaired_slides : [];

  return {
    status: typeof raw.status === "string" ? raw.status.trim().toLowerCase() : "",
    issues: Array.isArray(raw.issues) ? raw.issues : [],
    repairedSlides: repaired
      .map(toRepairedSlide)
      .filter((slide): slide is RepairedSlide => slide !== null),
    raw,
  };
}
