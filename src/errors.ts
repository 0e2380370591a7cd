/**
 * Stage-labelled error taxonomy. Every failure that reaches the HTTP layer or
 * the CLI is a PipelineError, so callers can report the stage and code without
 * string matching.
 */

export type PipelineStage = 'generation' | 'synthesis' | 'render' | 'publish';

export type GenerationErrorCode =
  | 'UpstreamUnavailable'
  | 'UnparsableModelOutput'
  | 'IncompleteModelOutput'
  | 'MalformedQuiz';

export type PublishErrorCode = 'UploadFailed' | 'UrlUnavailable';

export type PipelineErrorCode =
  | GenerationErrorCode
  | PublishErrorCode
  | 'SynthesisFailed'
  | 'RenderFailed'
  | 'Unexpected';

export class PipelineError extends Error {
  constructor(
    public readonly stage: PipelineStage,
    public readonly code: PipelineErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
  }
}

export class GenerationError extends PipelineError {
  constructor(public readonly kind: GenerationErrorCode, message: string, cause?: unknown) {
    super('generation', kind, message, cause);
    this.name = 'GenerationError';
  }
}

export class SynthesisError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('synthesis', 'SynthesisFailed', message, cause);
    this.name = 'SynthesisError';
  }
}

/** Raised only after both the title-card render and the plain fallback failed. */
export class RenderError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('render', 'RenderFailed', message, cause);
    this.name = 'RenderError';
  }
}

export class PublishError extends PipelineError {
  constructor(public readonly kind: PublishErrorCode, message: string, cause?: unknown) {
    super('publish', kind, message, cause);
    this.name = 'PublishError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
