/**
 * Capabilities the answer pipeline is built from. Each one is backed by an
 * external service in production and by a stub in tests.
 */

export type DocumentMetadata = Record<string, unknown>;

export interface RetrievedDocument {
  content: string;
  /** Conventionally carries `source` and a similarity `score`. */
  metadata?: DocumentMetadata;
}

export interface GenerationSettings {
  temperature: number;
  maxOutputTokens: number;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface VectorIndex {
  /** Results are ordered by similarity, most similar first. */
  search(vector: number[], k: number, includeMetadata: boolean): Promise<RetrievedDocument[]>;
}

export interface Generator {
  generate(prompt: string, settings: GenerationSettings): Promise<string>;
}

/** The subset of pino's API used outside the HTTP layer; `app.log` satisfies it. */
export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}
