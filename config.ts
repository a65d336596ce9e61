import { z } from 'zod';
import { ConfigError } from './services/errors.js';

export type Env = Record<string, string | undefined>;

// Empty strings in .env files count as unset, so defaults still apply.
const blankAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const emptyAsUnset = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema);

const optionalString = emptyAsUnset(z.string().optional());
const requiredString = (name: string) =>
  emptyAsUnset(z.string({ required_error: `${name} environment variable is not set` }));

export const ServerEnvSchema = z.object({
  PORT: emptyAsUnset(z.coerce.number().int().min(0).max(65535).default(5000)),
  HOST: emptyAsUnset(z.string().default('0.0.0.0')),
  LOG_LEVEL: emptyAsUnset(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')),
});

export const PipelineEnvSchema = z
  .object({
    GOOGLE_API_KEY: requiredString('GOOGLE_API_KEY'),
    EMBEDDING_PROVIDER: emptyAsUnset(z.enum(['google', 'openai']).default('google')),
    EMBEDDING_MODEL: optionalString,
    OPENAI_API_KEY: optionalString,
    QDRANT_URL: requiredString('QDRANT_URL').pipe(z.string().url('QDRANT_URL must be a valid URL')),
    QDRANT_API_KEY: requiredString('QDRANT_API_KEY'),
    QDRANT_COLLECTION: emptyAsUnset(z.string().min(1).default('ncai')),
    GENERATION_MODEL: emptyAsUnset(z.string().min(1).default('gemini-1.5-flash')),
    GENERATION_TEMPERATURE: emptyAsUnset(z.coerce.number().min(0).max(2).default(0.3)),
    GENERATION_MAX_TOKENS: emptyAsUnset(z.coerce.number().int().positive().default(1000)),
    PROVIDER_TIMEOUT_MS: emptyAsUnset(z.coerce.number().int().positive().default(30_000)),
    PROVIDER_MAX_RETRIES: emptyAsUnset(z.coerce.number().int().min(0).max(10).default(0)),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY environment variable is not set',
      });
    }
  });

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof ServerEnvSchema>['LOG_LEVEL'];
}

export type EmbeddingProviderName = 'google' | 'openai';

export interface PipelineConfig {
  googleApiKey: string;
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    apiKey: string;
  };
  qdrant: {
    url: string;
    apiKey: string;
    collection: string;
  };
  generation: {
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };
  timeoutMs: number;
  maxRetries: number;
}

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  google: 'embedding-001',
  openai: 'text-embedding-3-small',
};

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join('.');
    return key && !issue.message.includes(key) ? `${key}: ${issue.message}` : issue.message;
  });
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const result = ServerEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('Invalid server configuration', issuesOf(result.error));
  }
  return { port: result.data.PORT, host: result.data.HOST, logLevel: result.data.LOG_LEVEL };
}

/**
 * Read provider credentials and sampling settings.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const result = PipelineEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('Invalid RAG configuration', issuesOf(result.error));
  }
  const data = result.data;
  const provider = data.EMBEDDING_PROVIDER;

  return {
    googleApiKey: data.GOOGLE_API_KEY,
    embedding: {
      provider,
      model: data.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS[provider],
      apiKey: provider === 'openai' ? data.OPENAI_API_KEY ?? '' : data.GOOGLE_API_KEY,
    },
    qdrant: {
      url: data.QDRANT_URL,
      apiKey: data.QDRANT_API_KEY,
      collection: data.QDRANT_COLLECTION,
    },
    generation: {
      model: data.GENERATION_MODEL,
      temperature: data.GENERATION_TEMPERATURE,
      maxOutputTokens: data.GENERATION_MAX_TOKENS,
    },
    timeoutMs: data.PROVIDER_TIMEOUT_MS,
    maxRetries: data.PROVIDER_MAX_RETRIES,
  };
}
