// ragProviders.ts: Gemini + Qdrant behind the pipeline's provider interfaces
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { BaseLanguageModelInput } from '@langchain/core/language_models/base';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { Runnable } from '@langchain/core/runnables';
import type { VectorStoreInterface } from '@langchain/core/vectorstores';
import { QdrantVectorStore } from '@langchain/community/vectorstores/qdrant';
import { ChatGoogleGenerativeAI, GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import { OpenAIEmbeddings } from '@langchain/openai';
import { QdrantClient } from '@qdrant/js-client-rest';

import { loadPipelineConfig, type Env, type PipelineConfig } from './config.js';
import { AnswerPipeline } from './services/answerPipeline.js';
import { InitializationError, describeError } from './services/errors.js';
import type {
  Embedder,
  GenerationSettings,
  Generator,
  Logger,
  RetrievedDocument,
  VectorIndex,
} from './services/providers.js';

export class LangChainEmbedder implements Embedder {
  constructor(private readonly embeddings: EmbeddingsInterface) {}

  embed(text: string): Promise<number[]> {
    return this.embeddings.embedQuery(text);
  }
}

export type VectorSearchStore = Pick<VectorStoreInterface, 'similaritySearchVectorWithScore'>;

export class LangChainVectorIndex implements VectorIndex {
  constructor(private readonly store: VectorSearchStore) {}

  async search(vector: number[], k: number, includeMetadata: boolean): Promise<RetrievedDocument[]> {
    const results = await this.store.similaritySearchVectorWithScore(vector, k);
    return results.map(([doc, score]) =>
      includeMetadata
        ? { content: doc.pageContent, metadata: { ...doc.metadata, score } }
        : { content: doc.pageContent },
    );
  }
}

export type ChatModelFactory = (settings: GenerationSettings) => BaseChatModel;

/** One `model | StringOutputParser` chain per distinct sampling setting. */
export class LangChainGenerator implements Generator {
  private readonly chains = new Map<string, Runnable<BaseLanguageModelInput, string>>();

  constructor(private readonly createModel: ChatModelFactory) {}

  generate(prompt: string, settings: GenerationSettings): Promise<string> {
    return this.chainFor(settings).invoke(prompt);
  }

  private chainFor(settings: GenerationSettings): Runnable<BaseLanguageModelInput, string> {
    const key = `${settings.temperature}:${settings.maxOutputTokens}`;
    let chain = this.chains.get(key);
    if (!chain) {
      chain = this.createModel(settings).pipe(new StringOutputParser());
      this.chains.set(key, chain);
    }
    return chain;
  }
}

export interface RagProviders {
  embedder: Embedder;
  vectorIndex: VectorIndex;
  generator: Generator;
}

export type ProviderFactory = (config: PipelineConfig) => Promise<RagProviders>;

function createEmbeddings(config: PipelineConfig): EmbeddingsInterface {
  const { provider, model, apiKey } = config.embedding;
  if (provider === 'openai') {
    return new OpenAIEmbeddings({ model, apiKey, maxRetries: config.maxRetries });
  }
  return new GoogleGenerativeAIEmbeddings({ model, apiKey, maxRetries: config.maxRetries });
}

async function checkCollectionExists(client: QdrantClient, name: string): Promise<boolean> {
  try {
    const collections = await client.getCollections();
    return collections.collections.some((c) => c.name === name);
  } catch (err) {
    throw new InitializationError(`Could not reach the vector index: ${describeError(err)}`, err);
  }
}

/** Wire the production providers and make sure the index is there to search. */
export const createLangChainProviders: ProviderFactory = async (config) => {
  const embeddings = createEmbeddings(config);

  const client = new QdrantClient({ url: config.qdrant.url, apiKey: config.qdrant.apiKey });
  const collectionName = config.qdrant.collection;
  if (!(await checkCollectionExists(client, collectionName))) {
    throw new InitializationError(`Vector index collection '${collectionName}' does not exist`);
  }
  const vectorStore = new QdrantVectorStore(embeddings, { client, collectionName });

  const generator = new LangChainGenerator(
    (settings) =>
      new ChatGoogleGenerativeAI({
        model: config.generation.model,
        apiKey: config.googleApiKey,
        temperature: settings.temperature,
        maxOutputTokens: settings.maxOutputTokens,
        maxRetries: config.maxRetries,
      }),
  );

  return {
    embedder: new LangChainEmbedder(embeddings),
    vectorIndex: new LangChainVectorIndex(vectorStore),
    generator,
  };
};

/**
 * Validate configuration, build the providers and return a ready pipeline.
 * Throws ConfigError before any provider is created when credentials are
 * missing, and InitializationError when the index cannot be used.
 */
export async function initAnswerPipeline(
  env: Env,
  logger: Logger,
  createProviders: ProviderFactory = createLangChainProviders,
): Promise<AnswerPipeline> {
  const config = loadPipelineConfig(env);
  const providers = await createProviders(config);

  const pipeline = new AnswerPipeline({
    ...providers,
    logger,
    options: {
      generation: {
        temperature: config.generation.temperature,
        maxOutputTokens: config.generation.maxOutputTokens,
      },
      timeoutMs: config.timeoutMs,
    },
  });

  logger.info(
    { collection: config.qdrant.collection, embedding: config.embedding.provider, model: config.generation.model },
    'CISNR RAG System initialized successfully',
  );
  return pipeline;
}
