/** A comment attached to an issue, flattened to plain text. */
export interface IssueComment {
  readonly author: string;
  readonly body: string;
}

/**
 * Snapshot of a single tracker issue as fetched during `init`.
 * Text fields are plain strings (rich-text bodies are flattened on fetch).
 */
export interface Issue {
  readonly key: string;
  readonly summary: string;
  readonly description: string;
  readonly status: string;
  /** Display name, or null when unassigned. */
  readonly assignee: string | null;
  readonly creator?: string;
  /** ISO timestamps as returned by the tracker. */
  readonly created?: string;
  readonly updated?: string;
  /** Keys of outward-linked issues. */
  readonly relatedIssues?: readonly string[];
  readonly comments?: readonly IssueComment[];
}

/**
 * Unit of indexing, derived 1:1 from an {@link Issue}.
 */
export interface Doc {
  /** Issue key; unique within one index build. */
  readonly id: string;
  /** Normalized text that gets embedded. */
  readonly text: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/** A stored document with its embedding. */
export interface IndexEntry {
  readonly doc: Doc;
  readonly emb: Float32Array;
}

export interface ScoredDoc {
  readonly doc: Doc;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}
