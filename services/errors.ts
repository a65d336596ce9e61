/**
 * Error types for the answer pipeline and its startup.
 *
 * Per-request failures carry the pipeline stage they came from so the
 * orchestrator can log it; callers only ever see the fallback answer.
 */

export type PipelineStage = 'embedding' | 'search' | 'formatting' | 'generation';

export class AnswerPipelineError extends Error {
  public readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'AnswerPipelineError';
    this.stage = stage;
  }
}

export class EmbeddingError extends AnswerPipelineError {
  constructor(message: string, cause?: unknown) {
    super('embedding', `Embedding failed: ${message}`, cause);
    this.name = 'EmbeddingError';
  }
}

export class SearchError extends AnswerPipelineError {
  constructor(message: string, cause?: unknown) {
    super('search', `Vector search failed: ${message}`, cause);
    this.name = 'SearchError';
  }
}

/**
 * Thrown while turning retrieved documents into prompt text, e.g. for a
 * `score` that is not a finite number.
 */
export class FormattingError extends AnswerPipelineError {
  constructor(message: string, cause?: unknown) {
    super('formatting', `Formatting failed: ${message}`, cause);
    this.name = 'FormattingError';
  }
}

export class GenerationError extends AnswerPipelineError {
  constructor(message: string, cause?: unknown) {
    super('generation', `Generation failed: ${message}`, cause);
    this.name = 'GenerationError';
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Invalid or missing configuration. `issues` lists one entry per bad
 * variable and never contains secret values.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** A provider could not be reached or is not set up at startup. */
export class InitializationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'InitializationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
