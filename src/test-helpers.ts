import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Completer } from "./answer";
import type { EmbeddingProvider } from "./embeddings";
import type { Issue } from "./types";

export const noSleep = async (_ms: number): Promise<void> => undefined;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Deterministic embeddings: one dimension per vocabulary word, holding its
 * count in the text. Words outside the vocabulary are ignored.
 */
export class FakeEmbeddings implements EmbeddingProvider {
  public readonly calls: string[][] = [];
  private failuresLeft: number;

  public constructor(
    private readonly vocabulary: readonly string[],
    opts: { failTimes?: number; modelName?: string; batching?: boolean } = {},
  ) {
    this.failuresLeft = opts.failTimes ?? 0;
    this.modelName = opts.modelName ?? "fake-embedding";
    if (opts.batching === false) this.embedBatch = undefined;
  }

  private readonly modelName: string;

  public getModelName(): string {
    return this.modelName;
  }

  public vector(text: string): Float32Array {
    const v = new Float32Array(this.vocabulary.length);
    for (const token of tokenize(text)) {
      const i = this.vocabulary.indexOf(token);
      if (i >= 0) v[i] += 1;
    }
    return v;
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push([text]);
    this.maybeFail();
    return this.vector(text);
  }

  public embedBatch?: (texts: readonly string[]) => Promise<Float32Array[]> = async (texts) => {
    this.calls.push([...texts]);
    this.maybeFail();
    return texts.map((t) => this.vector(t));
  };

  private maybeFail(): void {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw Object.assign(new Error("embedding service unavailable"), { status: 503 });
    }
  }
}

/**
 * Completer that answers with the header line of the first context document,
 * or a fixed reply when the prompt has no context.
 */
export class FakeCompleter implements Completer {
  public readonly prompts: string[] = [];

  public constructor(private readonly reply?: (prompt: string) => Promise<string>) {}

  public getModelName(): string {
    return "fake-completion";
  }

  public async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply) return this.reply(prompt);
    const top = prompt.match(/^\[1\] (.*)$/m);
    return top ? top[1] : "nothing to go on";
  }
}

export function makeIssue(partial: Partial<Issue> & { key: string }): Issue {
  return {
    summary: "",
    description: "",
    status: "",
    assignee: null,
    ...partial,
  };
}

/** Fresh temporary directory, removed by the returned cleanup function. */
export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "jira-qa-"));
  return { dir, cleanup: () => fs.rm(dir, { recursive: true, force: true }) };
}
