import PQueue from "p-queue";
import type { EmbeddingProvider } from "./embeddings";
import { EmbeddingProviderError } from "./errors";
import type { Persistence } from "./persistence";
import { RetryExhaustedError, describeError, isTransientStatus, withRetry } from "./retry";
import type { Doc, IndexEntry } from "./types";
import { VectorIndex } from "./vector-index";

/**
 * Options required to construct an {@link Indexer}.
 */
export interface IndexerOptions {
  embeddings: EmbeddingProvider;
  persistence: Persistence;
  /** Documents per embedding request (default 64). */
  batchSize?: number;
  /** Embedding requests in flight at once (default 2). */
  concurrency?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  verbose?: boolean;
  /** Called after each batch with the running total of embedded documents. */
  onProgress?: (embedded: number, total: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds a {@link VectorIndex} from documents: embeds them in batches (with
 * bounded concurrency and retries) and persists the result. Every build is a
 * full rebuild; nothing is merged with a previous index.
 */
export class Indexer {
  private readonly embeddings: EmbeddingProvider;
  private readonly persistence: Persistence;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly verbose: boolean;
  private readonly onProgress?: (embedded: number, total: number) => void;
  private readonly sleep?: (ms: number) => Promise<void>;

  public constructor(opts: IndexerOptions) {
    this.embeddings = opts.embeddings;
    this.persistence = opts.persistence;
    this.batchSize = Math.max(1, opts.batchSize ?? 64);
    this.concurrency = Math.max(1, opts.concurrency ?? 2);
    this.retryAttempts = opts.retryAttempts ?? 3;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.retryMaxDelayMs = opts.retryMaxDelayMs ?? 8000;
    this.verbose = !!opts.verbose;
    this.onProgress = opts.onProgress;
    this.sleep = opts.sleep;
  }

  /** Split `items` into consecutive slices of at most `size`. */
  public static batches<T>(items: readonly T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
    return out;
  }

  /**
   * Embed every document and persist the resulting index, replacing whatever
   * was stored before. Nothing is written unless every embedding succeeded.
   *
   * @throws {EmbeddingProviderError} if a batch keeps failing or vectors disagree on dimension.
   */
  public async build(docs: readonly Doc[]): Promise<VectorIndex> {
    const vectors = await this.embedAll(docs);
    const entries: IndexEntry[] = docs.map((doc, i) => ({ doc, emb: vectors[i] }));

    const dimension = entries[0]?.emb.length ?? 0;
    const bad = entries.find((e) => e.emb.length !== dimension || e.emb.length === 0);
    if (bad) {
      throw new EmbeddingProviderError(
        `Embedding for ${bad.doc.id} has dimension ${bad.emb.length}, expected ${dimension}`,
      );
    }

    const index = new VectorIndex(entries, this.embeddings.getModelName());
    await this.persistence.save(index);
    console.error(
      `[jira-qa] Index persisted: ${index.size} documents (dimension ${index.dimension}).`,
    );
    return index;
  }

  /** Embed all texts; output order always matches `docs`. */
  private async embedAll(docs: readonly Doc[]): Promise<Float32Array[]> {
    if (!docs.length) return [];
    const batches = Indexer.batches(docs, this.batchSize);
    console.error(
      `[jira-qa] Embedding ${docs.length} documents in ${batches.length} batch(es) with ${this.embeddings.getModelName()}...`,
    );
    const queue = new PQueue({ concurrency: this.concurrency });
    let embedded = 0;
    const pending = Promise.all(
      batches.map((batch, b) =>
        queue.add(
          async () => {
            const vectors = await this.embedBatch(batch, b);
            embedded += batch.length;
            this.onProgress?.(embedded, docs.length);
            if (this.verbose) {
              const pct = ((embedded / docs.length) * 100).toFixed(1);
              console.error(`[jira-qa][verbose] Embedding progress: ${embedded}/${docs.length} (${pct}%)`);
            }
            return vectors;
          },
          { throwOnTimeout: true },
        ),
      ),
    );
    try {
      return (await pending).flat();
    } catch (e) {
      // Abort: drop batches that have not started yet.
      queue.clear();
      throw e;
    }
  }

  private async embedBatch(batch: readonly Doc[], b: number): Promise<Float32Array[]> {
    const texts = batch.map((d) => d.text);
    try {
      const vectors = await withRetry(
        async () => {
          const provider = this.embeddings;
          return provider.embedBatch
            ? provider.embedBatch(texts)
            : Promise.all(texts.map((t) => provider.embed(t)));
        },
        {
          attempts: this.retryAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          maxDelayMs: this.retryMaxDelayMs,
          label: `Embedding batch ${b + 1}`,
          retryable: isTransientStatus,
          verbose: this.verbose,
          sleep: this.sleep,
        },
      );
      if (vectors.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Embedding batch ${b + 1} returned ${vectors.length} vectors for ${batch.length} documents`,
        );
      }
      return vectors;
    } catch (e) {
      if (e instanceof EmbeddingProviderError) throw e;
      const cause = e instanceof RetryExhaustedError ? e.cause : e;
      throw new EmbeddingProviderError(
        `Embedding provider failed for batch ${b + 1}: ${describeError(cause)}`,
        { cause: e },
      );
    }
  }
}
