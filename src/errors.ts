/**
 * Error taxonomy surfaced at the CLI boundary. Every kind carries a stable
 * `code` and the process exit code the CLI reports for it.
 */
export abstract class JiraQaError extends Error {
  public abstract readonly code: string;
  public abstract readonly exitCode: number;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid setup. Fatal, never retried. */
export class ConfigurationError extends JiraQaError {
  public readonly code = "CONFIGURATION";
  public readonly exitCode = 78;
}

/** The issue tracker rejected the credentials or stayed unreachable. */
export class SourceUnavailable extends JiraQaError {
  public readonly code = "SOURCE_UNAVAILABLE";
  public readonly exitCode = 69;
}

/** A fetched issue record lacks a required field. */
export class InvalidIssue extends JiraQaError {
  public readonly code = "INVALID_ISSUE";
  public readonly exitCode = 65;

  public constructor(
    public readonly issueKey: string,
    reason: string,
  ) {
    super(`Invalid issue ${issueKey || "<no key>"}: ${reason}`);
  }
}

/** Embedding calls kept failing; the build was aborted before persisting. */
export class EmbeddingProviderError extends JiraQaError {
  public readonly code = "EMBEDDING_PROVIDER";
  public readonly exitCode = 69;
}

/** No persisted index at the configured location. */
export class IndexNotFound extends JiraQaError {
  public readonly code = "INDEX_NOT_FOUND";
  public readonly exitCode = 66;

  public constructor(
    public readonly storePath: string,
    options?: { cause?: unknown; detail?: string },
  ) {
    super(
      options?.detail
        ? `Index at ${storePath} could not be read: ${options.detail}`
        : `No index found at ${storePath}`,
      options,
    );
  }
}

/** Query vector and stored vectors disagree on dimension (stale index). */
export class EmbeddingDimensionMismatch extends JiraQaError {
  public readonly code = "EMBEDDING_DIMENSION_MISMATCH";
  public readonly exitCode = 65;

  public constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Embedding dimension mismatch: index has ${expected}, query has ${actual}`);
  }
}

/** Completion request kept failing after retries. */
export class GenerationError extends JiraQaError {
  public readonly code = "GENERATION";
  public readonly exitCode = 69;
}

/** Completion provider refused the prompt on content-policy grounds. */
export class GenerationRefused extends JiraQaError {
  public readonly code = "GENERATION_REFUSED";
  public readonly exitCode = 65;
}
