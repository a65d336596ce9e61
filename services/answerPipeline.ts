import { formatDocuments } from './contextFormatter.js';
import {
  AnswerPipelineError,
  EmbeddingError,
  FormattingError,
  GenerationError,
  SearchError,
  describeError,
} from './errors.js';
import { renderPrompt } from './promptRenderer.js';
import type { Embedder, GenerationSettings, Generator, Logger, VectorIndex } from './providers.js';
import { withTimeout } from './timeout.js';
import { applyUserContext, type UserContext } from './userContext.js';

export const TOP_K = 6;

// Every line but the last keeps a trailing space before the break.
export const FALLBACK_ANSWER = [
  "I apologize, but I'm currently experiencing technical difficulties. ",
  'Please try your question again later. For immediate assistance, ',
  'contact the CISNR directorate at cisnr@uetpeshawar.edu.pk.',
].join('\n');

export interface AnswerPipelineOptions {
  generation: GenerationSettings;
  /** Upper bound for each external call, in milliseconds. */
  timeoutMs: number;
}

export const DEFAULT_PIPELINE_OPTIONS: AnswerPipelineOptions = {
  generation: { temperature: 0.3, maxOutputTokens: 1000 },
  timeoutMs: 30_000,
};

export interface AnswerPipelineDeps {
  embedder: Embedder;
  vectorIndex: VectorIndex;
  generator: Generator;
  logger: Logger;
  options?: Partial<AnswerPipelineOptions>;
}

type StageErrorClass = new (message: string, cause?: unknown) => AnswerPipelineError;

/**
 * Question in, grounded answer out: embed, search, format, render, generate.
 *
 * `answer()` never rejects. Every failure is logged here, with its stage,
 * and turned into {@link FALLBACK_ANSWER}.
 */
export class AnswerPipeline {
  private readonly embedder: Embedder;
  private readonly vectorIndex: VectorIndex;
  private readonly generator: Generator;
  private readonly logger: Logger;
  private readonly options: AnswerPipelineOptions;

  constructor(deps: AnswerPipelineDeps) {
    this.embedder = deps.embedder;
    this.vectorIndex = deps.vectorIndex;
    this.generator = deps.generator;
    this.logger = deps.logger;
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...deps.options };
  }

  async answer(question: string, userContext?: UserContext): Promise<string> {
    try {
      return await this.run(applyUserContext(question, userContext));
    } catch (error) {
      const stage = error instanceof AnswerPipelineError ? error.stage : undefined;
      this.logger.error({ err: error, stage, question }, `Error processing query '${question}': ${describeError(error)}`);
      return FALLBACK_ANSWER;
    }
  }

  private async run(enhancedQuestion: string): Promise<string> {
    const { generation, timeoutMs } = this.options;

    const vector = await this.stage(EmbeddingError, () =>
      withTimeout(this.embedder.embed(enhancedQuestion), timeoutMs, 'embedding'),
    );

    const documents = await this.stage(SearchError, async () => {
      const results = await withTimeout(this.vectorIndex.search(vector, TOP_K, true), timeoutMs, 'vector search');
      return results.slice(0, TOP_K);
    });
    this.logger.debug({ documents: documents.length }, 'Retrieved context documents');

    const prompt = await this.stage(FormattingError, () => renderPrompt(formatDocuments(documents), enhancedQuestion));

    return this.stage(GenerationError, () =>
      withTimeout(this.generator.generate(prompt, generation), timeoutMs, 'generation'),
    );
  }

  /** Run one step, tagging anything it throws with the step's error type. */
  private async stage<T>(ErrorClass: StageErrorClass, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      if (error instanceof AnswerPipelineError) throw error;
      throw new ErrorClass(describeError(error), error);
    }
  }
}
