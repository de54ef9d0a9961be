import OpenAI from "openai";

/**
 * Anything that turns text into fixed-length vectors. The same provider (and
 * model) must be used to build an index and to query it.
 */
export interface EmbeddingProvider {
  /** Identifier persisted with the index so stale indexes can be detected. */
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
  /** Optional batched variant; results are in input order. */
  embedBatch?(texts: readonly string[]): Promise<Float32Array[]>;
}

/** The slice of the OpenAI client that {@link OpenAIEmbeddings} calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): PromiseLike<{
      data: ReadonlyArray<{ index: number; embedding: number[] }>;
    }>;
  };
}

export interface OpenAIEmbeddingsOptions {
  apiKey: string;
  model: string;
  /** Inject a preconfigured client (shared with the completion side). */
  client?: EmbeddingsClient;
}

/**
 * Embeddings backed by the OpenAI embeddings endpoint. SDK-level retries are
 * disabled; callers wrap requests in `withRetry`.
 */
export class OpenAIEmbeddings implements EmbeddingProvider {
  private readonly client: EmbeddingsClient;
  private readonly model: string;

  public constructor(opts: OpenAIEmbeddingsOptions) {
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });
    this.model = opts.model;
  }

  public getModelName(): string {
    return this.model;
  }

  public async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (!texts.length) return [];
    // The endpoint rejects empty strings; a single space embeds as "no content".
    const input = texts.map((t) => (t.trim() ? t : " "));
    const response = await this.client.embeddings.create({ model: this.model, input });
    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== texts.length) {
      throw new Error(
        `Embedding response size mismatch: sent ${texts.length}, received ${ordered.length}`,
      );
    }
    return ordered.map((item) => Float32Array.from(item.embedding));
  }
}

/**
 * Cosine similarity between two vectors of equal length, in [-1, 1].
 * A zero vector scores 0 against everything.
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
