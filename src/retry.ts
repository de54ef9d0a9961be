export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Label used in log lines. */
  label: string;
  /** Return false to rethrow immediately (auth failures, content refusals, ...). */
  retryable?: (error: unknown) => boolean;
  verbose?: boolean;
  /** Overridable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/** Error thrown once every attempt has failed; `cause` is the last failure. */
export class RetryExhaustedError extends Error {
  public constructor(
    public readonly label: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(`${label} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.name = "RetryExhaustedError";
  }
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before attempt `attempt + 1` (0-based), doubling each time up to `maxDelayMs`. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
}

/**
 * Run `fn` with bounded exponential backoff. Non-retryable errors are rethrown
 * as-is; exhausting the budget throws {@link RetryExhaustedError}.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts.attempts));
  const sleep = opts.sleep ?? defaultSleep;
  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (opts.retryable && !opts.retryable(error)) throw error;
      lastError = error;
      if (attempt + 1 >= attempts) break;
      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      console.error(
        `[jira-qa] ${opts.label} failed (attempt ${attempt + 1}/${attempts}), retrying in ${delay}ms`,
      );
      if (opts.verbose) console.error(`[jira-qa][verbose] ${describeError(error)}`);
      await sleep(delay);
    }
  }
  throw new RetryExhaustedError(opts.label, attempts, lastError);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Retry policy for HTTP-backed SDK errors that expose a numeric `status`:
 * timeouts, conflicts, rate limits and 5xx are transient; other statuses
 * (bad request, auth) are not. Errors without a status (network) are retried.
 */
export function isTransientStatus(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return true;
  const status = "status" in error && typeof error.status === "number" ? error.status : undefined;
  if (status === undefined) return true;
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
