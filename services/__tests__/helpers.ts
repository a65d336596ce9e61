import { vi } from 'vitest';
import { AnswerPipeline, type AnswerPipelineOptions } from '../answerPipeline.js';
import type { Embedder, Generator, Logger, RetrievedDocument, VectorIndex } from '../providers.js';

export const QUERY_VECTOR = [0.12, -0.4, 0.33];

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

/**
 * Stub providers: the embedder returns {@link QUERY_VECTOR}, the index
 * returns `documents` and the generator echoes its prompt.
 */
export function createStubProviders(documents: RetrievedDocument[] = []) {
  const embedder = { embed: vi.fn(async (_text: string) => QUERY_VECTOR) } satisfies Embedder;
  const vectorIndex = {
    search: vi.fn(async (_vector: number[], _k: number, _includeMetadata: boolean) => documents),
  } satisfies VectorIndex;
  const generator = {
    generate: vi.fn(async (prompt: string, _settings: { temperature: number; maxOutputTokens: number }) => prompt),
  } satisfies Generator;
  return { embedder, vectorIndex, generator };
}

export function createTestPipeline(
  providers: ReturnType<typeof createStubProviders>,
  logger: Logger = createMockLogger(),
  options?: Partial<AnswerPipelineOptions>,
): AnswerPipeline {
  return new AnswerPipeline({ ...providers, logger, options });
}
