import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from "axios";
import PQueue from "p-queue";
import { adfToText } from "./adf";
import { ConfigurationError, SourceUnavailable } from "./errors";
import { RetryExhaustedError, describeError, withRetry } from "./retry";
import type { Issue, IssueComment } from "./types";

/** Fields requested from the search endpoint; everything else is ignored. */
export const ISSUE_FIELDS = [
  "summary",
  "description",
  "status",
  "assignee",
  "creator",
  "created",
  "updated",
  "issuelinks",
] as const;

export interface JiraSourceOptions {
  /** Bare host, e.g. `team.atlassian.net`. */
  domain: string;
  email: string;
  apiToken: string;
  pageSize?: number;
  /** Stop after this many issues (0 = unlimited). */
  maxIssues?: number;
  includeComments?: boolean;
  /** Parallel comment requests. */
  concurrency?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  verbose?: boolean;
  /** Replace the HTTP transport (tests use an in-process adapter). */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

function displayName(v: unknown): string {
  return isRecord(v) ? str(v.displayName) : "";
}

/** 429 and 5xx responses and transport failures (no response) are worth retrying. */
function isTransient(error: unknown): boolean {
  if (!isAxiosError(error)) return false;
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

/** Pull JIRA's `errorMessages` / `errors` out of a failed response body. */
function jiraErrorDetail(data: unknown): string {
  if (!isRecord(data)) return "";
  const messages = Array.isArray(data.errorMessages)
    ? data.errorMessages.filter((m): m is string => typeof m === "string")
    : [];
  if (isRecord(data.errors)) {
    for (const [field, msg] of Object.entries(data.errors)) {
      if (typeof msg === "string") messages.push(`${field}: ${msg}`);
    }
  }
  return messages.join("; ");
}

/**
 * Read-only JIRA Cloud REST v3 client. Authenticates with HTTP basic auth
 * (account email + API token) and pages through `/rest/api/3/search/jql`.
 */
export class JiraSource {
  private readonly client: AxiosInstance;
  private readonly domain: string;
  private readonly pageSize: number;
  private readonly maxIssues: number;
  private readonly includeComments: boolean;
  private readonly concurrency: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly verbose: boolean;
  private readonly sleep?: (ms: number) => Promise<void>;

  public constructor(opts: JiraSourceOptions) {
    this.domain = opts.domain;
    this.pageSize = opts.pageSize ?? 100;
    this.maxIssues = opts.maxIssues ?? 0;
    this.includeComments = opts.includeComments ?? true;
    this.concurrency = Math.max(1, opts.concurrency ?? 3);
    this.retryAttempts = opts.retryAttempts ?? 3;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.retryMaxDelayMs = opts.retryMaxDelayMs ?? 8000;
    this.verbose = !!opts.verbose;
    this.sleep = opts.sleep;
    this.client = axios.create({
      baseURL: `https://${opts.domain}`,
      auth: { username: opts.email, password: opts.apiToken },
      headers: { Accept: "application/json" },
      timeout: 30_000,
      adapter: opts.adapter,
    });
  }

  /**
   * Fetch every issue matching `jql`, following `nextPageToken` until the last
   * page, or the issue limit when one is set (0, the default, means none).
   * Order is the API's order.
   *
   * @throws {SourceUnavailable} on rejected credentials or persistent network/server failure.
   * @throws {ConfigurationError} when JIRA rejects the query itself (HTTP 400).
   */
  public async fetchAllIssues(jql: string): Promise<Issue[]> {
    const raws: unknown[] = [];
    let nextPageToken: string | undefined;
    for (;;) {
      const page = await this.fetchPage(jql, nextPageToken);
      if (!page.issues.length) break;
      raws.push(...page.issues);
      const more = !page.isLast && !!page.nextPageToken;
      const capped = this.maxIssues > 0 && raws.length >= this.maxIssues;
      if (capped) {
        if (more || raws.length > this.maxIssues) {
          console.error(
            `[jira-qa] Issue limit of ${this.maxIssues} reached; remaining matching issues are not indexed.`,
          );
        }
        raws.length = this.maxIssues;
      }
      console.error(`[jira-qa] Fetched ${raws.length} issues from ${this.domain}...`);
      if (capped || !more) break;
      nextPageToken = page.nextPageToken;
    }

    if (!this.includeComments) return raws.map((raw) => JiraSource.mapIssue(raw));

    // Positions are fixed up front, so concurrency never changes the result order.
    const queue = new PQueue({ concurrency: this.concurrency });
    const issues = await Promise.all(
      raws.map((raw) =>
        queue.add(
          async () => {
            const key = isRecord(raw) ? str(raw.key) : "";
            const comments = key ? await this.fetchComments(key) : [];
            if (this.verbose) console.error(`[jira-qa][verbose] Downloaded ${key} from JIRA`);
            return JiraSource.mapIssue(raw, comments);
          },
          { throwOnTimeout: true },
        ),
      ),
    );
    return issues;
  }

  /** One page of the enhanced JQL search endpoint. */
  public async fetchPage(
    jql: string,
    nextPageToken?: string,
  ): Promise<{ issues: unknown[]; nextPageToken?: string; isLast: boolean }> {
    const data = await this.request({
      url: "/rest/api/3/search/jql",
      method: "GET",
      params: {
        jql,
        maxResults: this.pageSize,
        fields: ISSUE_FIELDS.join(","),
        ...(nextPageToken ? { nextPageToken } : {}),
      },
    });
    if (!isRecord(data) || !Array.isArray(data.issues)) {
      throw new SourceUnavailable(`Unexpected search response from ${this.domain}`);
    }
    const token = str(data.nextPageToken);
    return {
      issues: data.issues,
      nextPageToken: token || undefined,
      isLast: data.isLast === true,
    };
  }

  /** All comments of one issue, oldest first, bodies flattened to text. */
  public async fetchComments(key: string): Promise<IssueComment[]> {
    const out: IssueComment[] = [];
    let startAt = 0;
    for (;;) {
      const data = await this.request({
        url: `/rest/api/3/issue/${encodeURIComponent(key)}/comment`,
        method: "GET",
        params: { startAt, maxResults: 100 },
      });
      const comments = isRecord(data) && Array.isArray(data.comments) ? data.comments : [];
      for (const c of comments) {
        if (!isRecord(c)) continue;
        const body = adfToText(c.body);
        if (body) out.push({ author: displayName(c.author), body });
      }
      startAt += comments.length;
      const total = isRecord(data) && typeof data.total === "number" ? data.total : startAt;
      if (!comments.length || startAt >= total) break;
    }
    return out;
  }

  /**
   * Map a raw REST issue onto {@link Issue}. Missing pieces become empty
   * strings; validation is left to the document builder.
   */
  public static mapIssue(raw: unknown, comments: readonly IssueComment[] = []): Issue {
    const obj: Json = isRecord(raw) ? raw : {};
    const fields: Json = isRecord(obj.fields) ? obj.fields : {};
    const status = isRecord(fields.status) ? str(fields.status.name) : "";
    const assignee = displayName(fields.assignee);
    const links = Array.isArray(fields.issuelinks) ? fields.issuelinks : [];
    const relatedIssues = links
      .map((link) => (isRecord(link) && isRecord(link.outwardIssue) ? str(link.outwardIssue.key) : ""))
      .filter(Boolean);
    return {
      key: str(obj.key),
      summary: str(fields.summary),
      description: adfToText(fields.description),
      status,
      assignee: assignee || null,
      creator: displayName(fields.creator),
      created: str(fields.created),
      updated: str(fields.updated),
      relatedIssues,
      comments,
    };
  }

  private async request(config: AxiosRequestConfig): Promise<unknown> {
    try {
      return await withRetry(
        async () => {
          const res = await this.client.request<unknown>(config);
          return res.data;
        },
        {
          attempts: this.retryAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          maxDelayMs: this.retryMaxDelayMs,
          label: `JIRA ${config.method ?? "GET"} ${config.url}`,
          retryable: isTransient,
          verbose: this.verbose,
          sleep: this.sleep,
        },
      );
    } catch (error) {
      throw this.toSourceError(error);
    }
  }

  private toSourceError(error: unknown): Error {
    if (error instanceof RetryExhaustedError) {
      return new SourceUnavailable(`JIRA at ${this.domain} is unavailable: ${describeError(error.cause)}`, {
        cause: error,
      });
    }
    if (isAxiosError(error) && error.response) {
      const { status, data } = error.response;
      const detail = jiraErrorDetail(data);
      if (status === 401 || status === 403) {
        return new SourceUnavailable(
          `JIRA rejected the credentials for ${this.domain} (HTTP ${status}). Check JIRA_EMAIL and JIRA_API_TOKEN.`,
          { cause: error },
        );
      }
      if (status === 400) {
        return new ConfigurationError(`JIRA rejected the query: ${detail || "HTTP 400"}`, {
          cause: error,
        });
      }
      return new SourceUnavailable(
        `JIRA request failed (HTTP ${status})${detail ? `: ${detail}` : ""}`,
        { cause: error },
      );
    }
    if (error instanceof Error) return error;
    return new SourceUnavailable(describeError(error));
  }
}
