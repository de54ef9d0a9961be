import { cosine, type EmbeddingProvider } from "./embeddings";
import { EmbeddingProviderError } from "./errors";
import { RetryExhaustedError, describeError, isTransientStatus, withRetry } from "./retry";
import type { Doc, IndexEntry } from "./types";
import type { VectorIndex } from "./vector-index";

export interface RetrieverOptions {
  /** Must be the provider (and model) the index was built with. */
  embeddings: EmbeddingProvider;
  /** `mmr` re-ranks the nearest `fetchK` candidates for diversity. */
  mode?: "similarity" | "mmr";
  fetchK?: number;
  /** 1 = pure relevance, 0 = pure diversity. */
  lambda?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  verbose?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Embeds a question and looks up the most similar documents in an index.
 */
export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly mode: "similarity" | "mmr";
  private readonly fetchK: number;
  private readonly lambda: number;
  private readonly opts: RetrieverOptions;

  public constructor(opts: RetrieverOptions) {
    this.embeddings = opts.embeddings;
    this.mode = opts.mode ?? "similarity";
    this.fetchK = opts.fetchK ?? 20;
    this.lambda = opts.lambda ?? 0.5;
    this.opts = opts;
  }

  /**
   * Top-`k` documents for `question`, best first. An empty question is embedded
   * like any other text.
   *
   * @throws {EmbeddingDimensionMismatch} if the index was built with a different embedding size.
   * @throws {EmbeddingProviderError} if the question cannot be embedded.
   */
  public async retrieve(question: string, index: VectorIndex, k: number): Promise<Doc[]> {
    if (k <= 0 || index.size === 0) return [];
    if (index.modelName && index.modelName !== this.embeddings.getModelName()) {
      console.error(
        `[jira-qa] Index was built with ${index.modelName}, querying with ${this.embeddings.getModelName()}.`,
      );
    }
    const vector = await this.embedQuestion(question);
    index.assertDimension(vector);

    if (this.mode === "mmr") {
      const candidates = index.search(vector, Math.max(k, this.fetchK));
      return Retriever.mmr(candidates, k, this.lambda).map((c) => c.doc);
    }
    return index.query(vector, k).map((r) => r.doc);
  }

  /**
   * Maximal marginal relevance: repeatedly pick the candidate maximising
   * `lambda * relevance - (1 - lambda) * max similarity to already picked`.
   * Candidates must carry their relevance `score`; ties keep candidate order.
   */
  public static mmr<T extends IndexEntry & { score: number }>(
    candidates: readonly T[],
    k: number,
    lambda: number,
  ): T[] {
    const remaining = [...candidates];
    const picked: T[] = [];
    while (picked.length < k && remaining.length) {
      let bestIdx = 0;
      let bestScore = -Infinity;
      remaining.forEach((c, i) => {
        const redundancy = picked.length
          ? Math.max(...picked.map((p) => cosine(c.emb, p.emb)))
          : 0;
        const score = lambda * c.score - (1 - lambda) * redundancy;
        if (score > bestScore) {
          bestScore = score;
          bestIdx = i;
        }
      });
      picked.push(...remaining.splice(bestIdx, 1));
    }
    return picked;
  }

  private async embedQuestion(question: string): Promise<Float32Array> {
    try {
      return await withRetry(() => this.embeddings.embed(question), {
        attempts: this.opts.retryAttempts ?? 3,
        baseDelayMs: this.opts.retryBaseDelayMs ?? 500,
        maxDelayMs: this.opts.retryMaxDelayMs ?? 8000,
        label: "Question embedding",
        retryable: isTransientStatus,
        verbose: this.opts.verbose,
        sleep: this.opts.sleep,
      });
    } catch (e) {
      const cause = e instanceof RetryExhaustedError ? e.cause : e;
      throw new EmbeddingProviderError(`Could not embed the question: ${describeError(cause)}`, {
        cause: e,
      });
    }
  }
}
