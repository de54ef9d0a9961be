import OpenAI from "openai";
import { truncateText } from "./documents";
import { GenerationError, GenerationRefused } from "./errors";
import { RetryExhaustedError, describeError, isTransientStatus, withRetry } from "./retry";
import type { Doc } from "./types";

/** Text-completion capability: one prompt in, the model's text out. */
export interface Completer {
  getModelName(): string;
  /**
   * @throws {GenerationRefused} when the provider declines the prompt on policy grounds.
   */
  complete(prompt: string): Promise<string>;
}

/** Returned without calling the model when retrieval found nothing. */
export const NO_CONTEXT_ANSWER =
  "I couldn't find any relevant information in the indexed JIRA issues to answer that question.";

const INSTRUCTIONS = [
  "You answer questions about a team's JIRA issues using only the context below.",
  "Mention the issue keys (for example ABC-123) you rely on.",
  "If the context does not contain the answer, say that you don't know.",
].join("\n");

/** Error codes the OpenAI API uses for content-policy rejections. */
const POLICY_CODES = new Set(["content_policy_violation", "content_filter"]);

/** True when `error` is a provider-side content-policy rejection (never retried). */
export function isContentPolicyRejection(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && typeof error.code === "string" && POLICY_CODES.has(error.code)) return true;
  const status = "status" in error ? error.status : undefined;
  const message = error instanceof Error ? error.message : "";
  return status === 400 && /content (management )?policy|safety system/i.test(message);
}

/** The fields of a chat completion response that {@link OpenAICompleter} reads. */
export interface ChatCompletionResult {
  choices: ReadonlyArray<{
    finish_reason: string | null;
    message: { content: string | null; refusal?: string | null };
  }>;
}

/** The slice of the OpenAI client that {@link OpenAICompleter} calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: "user"; content: string }>;
        temperature: number;
      }): PromiseLike<ChatCompletionResult>;
    };
  };
}

export interface OpenAICompleterOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  client?: ChatClient;
}

/**
 * Chat-completions backed {@link Completer}. SDK retries are disabled; the
 * answer generator owns the retry policy.
 */
export class OpenAICompleter implements Completer {
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly temperature: number;

  public constructor(opts: OpenAICompleterOptions) {
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });
    this.model = opts.model;
    this.temperature = opts.temperature ?? 0;
  }

  public getModelName(): string {
    return this.model;
  }

  public async complete(prompt: string): Promise<string> {
    let response: ChatCompletionResult;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
      });
    } catch (e) {
      if (isContentPolicyRejection(e)) {
        throw new GenerationRefused(`The model refused the request: ${describeError(e)}`, {
          cause: e,
        });
      }
      throw e;
    }
    const choice = response.choices[0];
    if (!choice) throw new Error("Completion response contained no choices");
    if (choice.message.refusal) {
      throw new GenerationRefused(`The model refused the request: ${choice.message.refusal}`);
    }
    if (choice.finish_reason === "content_filter") {
      throw new GenerationRefused("The model output was blocked by the content filter");
    }
    return choice.message.content?.trim() ?? "";
  }
}

/** One context block: header line with key, summary, assignee and status, then the text. */
export function serializeDoc(doc: Doc, n: number): string {
  const meta = doc.metadata;
  const details = [`assignee: ${meta.assignee ?? "Unassigned"}`];
  if (meta.status) details.push(`status: ${meta.status}`);
  const header = `[${n}] ${doc.id}: ${meta.summary ?? ""} (${details.join(", ")})`;
  return `${header}\n${doc.text}`;
}

/**
 * Serialize documents (best first) until `budget` characters are used. Lower
 * ranked documents are dropped first; the top document is always included,
 * cut to the budget if it alone exceeds it.
 */
export function buildContext(
  docs: readonly Doc[],
  budget: number,
): { context: string; included: number } {
  const blocks: string[] = [];
  let used = 0;
  for (const [i, doc] of docs.entries()) {
    const block = serializeDoc(doc, i + 1);
    const cost = block.length + (blocks.length ? 2 : 0);
    if (used + cost > budget) {
      if (!blocks.length) blocks.push(truncateText(block, budget));
      break;
    }
    blocks.push(block);
    used += cost;
  }
  return { context: blocks.join("\n\n"), included: blocks.length };
}

export function buildPrompt(question: string, context: string): string {
  return `${INSTRUCTIONS}\n\nContext:\n${context}\n\nQuestion: ${question}\nAnswer:`;
}

export interface AnswerGeneratorOptions {
  completer: Completer;
  /** Character budget for the serialized context (default 12000). */
  contextCharBudget?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  verbose?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Turns a question plus retrieved documents into a single completion request.
 */
export class AnswerGenerator {
  private readonly completer: Completer;
  private readonly budget: number;
  private readonly opts: AnswerGeneratorOptions;

  public constructor(opts: AnswerGeneratorOptions) {
    this.completer = opts.completer;
    this.budget = opts.contextCharBudget ?? 12_000;
    this.opts = opts;
  }

  /**
   * @throws {GenerationRefused} on a content-policy rejection (not retried).
   * @throws {GenerationError} when the completion keeps failing.
   */
  public async generate(question: string, docs: readonly Doc[]): Promise<string> {
    if (!docs.length) return NO_CONTEXT_ANSWER;
    const { context, included } = buildContext(docs, this.budget);
    if (included < docs.length) {
      console.error(
        `[jira-qa] Context budget reached: using ${included} of ${docs.length} retrieved issues.`,
      );
    }
    const prompt = buildPrompt(question, context);
    if (this.opts.verbose) console.error(`[jira-qa][verbose] Prompt:\n${prompt}`);

    try {
      return await withRetry(() => this.completer.complete(prompt), {
        attempts: this.opts.retryAttempts ?? 3,
        baseDelayMs: this.opts.retryBaseDelayMs ?? 500,
        maxDelayMs: this.opts.retryMaxDelayMs ?? 8000,
        label: `Completion (${this.completer.getModelName()})`,
        retryable: (e) => !(e instanceof GenerationRefused) && isTransientStatus(e),
        verbose: this.opts.verbose,
        sleep: this.opts.sleep,
      });
    } catch (e) {
      if (e instanceof GenerationRefused) throw e;
      const cause = e instanceof RetryExhaustedError ? e.cause : e;
      throw new GenerationError(`Answer generation failed: ${describeError(cause)}`, { cause: e });
    }
  }
}
