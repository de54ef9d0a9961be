import { cosine } from "./embeddings";
import { EmbeddingDimensionMismatch } from "./errors";
import type { Doc, IndexEntry, ScoredDoc } from "./types";

/**
 * In-memory collection of (embedding, document) pairs with brute-force cosine
 * search. Entries keep their insertion order, which also breaks score ties.
 * Instances are immutable once constructed.
 */
export class VectorIndex {
  private readonly entries: readonly IndexEntry[];
  /** Embedding model the vectors came from. */
  public readonly modelName: string;
  /** Vector length shared by every entry (0 for an empty index). */
  public readonly dimension: number;

  public constructor(entries: readonly IndexEntry[], modelName: string) {
    const dimension = entries[0]?.emb.length ?? 0;
    const ids = new Set<string>();
    for (const { doc, emb } of entries) {
      if (emb.length !== dimension) {
        throw new Error(
          `Index entry ${doc.id} has dimension ${emb.length}, expected ${dimension}`,
        );
      }
      if (ids.has(doc.id)) throw new Error(`Duplicate document id in index: ${doc.id}`);
      ids.add(doc.id);
    }
    this.entries = [...entries];
    this.modelName = modelName;
    this.dimension = dimension;
  }

  public get size(): number {
    return this.entries.length;
  }

  public getEntries(): readonly IndexEntry[] {
    return this.entries;
  }

  public getDocs(): Doc[] {
    return this.entries.map((e) => e.doc);
  }

  /**
   * Return up to `k` documents ordered by descending cosine similarity to
   * `vector`. `k <= 0` yields nothing; `k` above the size yields everything.
   *
   * @throws {EmbeddingDimensionMismatch} if `vector` does not match the index dimension.
   */
  public query(vector: Float32Array, k: number): ScoredDoc[] {
    return this.search(vector, k).map(({ doc, score }) => ({ doc, score }));
  }

  /** Same ranking as {@link query}, but keeps the stored embeddings (for re-ranking). */
  public search(vector: Float32Array, k: number): Array<IndexEntry & { score: number }> {
    const limit = Number.isFinite(k) ? Math.floor(k) : 0;
    if (limit <= 0 || !this.entries.length) return [];
    this.assertDimension(vector);
    return this.entries
      .map((e, i) => ({ doc: e.doc, emb: e.emb, score: cosine(e.emb, vector), i }))
      .sort((a, b) => b.score - a.score || a.i - b.i)
      .slice(0, limit)
      .map(({ doc, emb, score }) => ({ doc, emb, score }));
  }

  /** Fail fast when a query vector cannot be compared with the stored ones. */
  public assertDimension(vector: Float32Array): void {
    if (this.entries.length && vector.length !== this.dimension) {
      throw new EmbeddingDimensionMismatch(this.dimension, vector.length);
    }
  }
}
