export type PipelineErrorKind =
  | "input"
  | "not_available"
  | "contract"
  | "template"
  | "config"
  | "generation";

/**
 * Base class for every error the pipeline surfaces to its caller.
 * Callers branch on `kind` (or `instanceof`), never on message text.
 */
export abstract class StoryPipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input: unparseable video URL, empty required text. */
export class InputError extends StoryPipelineError {
  readonly kind = "input" as const;
}

/** No subtitle track matched the requested languages. */
export class NotAvailableError extends StoryPipelineError {
  readonly kind = "not_available" as const;

  constructor(
    message: string,
    public readonly requestedLangs: readonly string[] = [],
  ) {
    super(message);
  }
}

/** A generation stage returned output of the wrong shape, or JSON that could not be repaired. */
export class ContractViolationError extends StoryPipelineError {
  readonly kind = "contract" as const;

  constructor(
    message: string,
    public readonly stage: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type TemplateMissingPart = "label" | "terminator" | "block";

/** The strict story-core template is missing part of its fixed contract. */
export class TemplateContractError extends StoryPipelineError {
  readonly kind = "template" as const;

  constructor(
    message: string,
    public readonly missing: TemplateMissingPart,
  ) {
    super(message);
  }
}

export class ConfigurationError extends StoryPipelineError {
  readonly kind = "config" as const;
}

/** Transport or provider failure from a text generation backend. */
export class GenerationError extends StoryPipelineError {
  readonly kind = "generation" as const;

  constructor(
    message: string,
    public readonly backend: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isStoryPipelineError(err: unknown): err is StoryPipelineError {
  return err instanceof StoryPipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 1 for problems the caller can fix by changing the request, 2 for everything else. */
export function exitCodeForError(err: unknown): number {
  if (isStoryPipelineError(err) && (err.kind === "input" || err.kind === "not_available")) {
    return 1;
  }
  return 2;
}
