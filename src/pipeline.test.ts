import path from "node:path";
import { AnswerGenerator, NO_CONTEXT_ANSWER } from "./answer";
import type { EmbeddingProvider } from "./embeddings";
import { EmbeddingProviderError, IndexNotFound, SourceUnavailable } from "./errors";
import { Indexer } from "./indexer";
import { Persistence, loadIssueSnapshot } from "./persistence";
import { type IssueSource, SnapshotSource, runAsk, runInit } from "./pipeline";
import { Retriever } from "./retriever";
import { PipelineStatus } from "./status";
import { FakeCompleter, FakeEmbeddings, makeIssue, makeTempDir, noSleep } from "./test-helpers";
import type { Issue } from "./types";

const VOCAB = ["kix", "sam", "login", "docs", "fix", "write", "bug"];

const ISSUES: Issue[] = [
  makeIssue({ key: "A-1", summary: "Fix login bug", assignee: "Kix" }),
  makeIssue({ key: "A-2", summary: "Write docs", assignee: "Sam" }),
];

function staticSource(issues: Issue[]): IssueSource & { queries: string[] } {
  const queries: string[] = [];
  return {
    queries,
    fetchAllIssues: async (query) => {
      queries.push(query);
      return issues;
    },
  };
}

let dir: string;
let cleanup: () => Promise<void>;
let persistence: Persistence;

beforeEach(async () => {
  ({ dir, cleanup } = await makeTempDir());
  persistence = new Persistence(path.join(dir, "index.json"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  await cleanup();
});

function indexer(): Indexer {
  return new Indexer({ embeddings: new FakeEmbeddings(VOCAB), persistence, sleep: noSleep });
}

function askDeps(completer = new FakeCompleter(), status?: PipelineStatus) {
  return {
    persistence,
    retriever: new Retriever({ embeddings: new FakeEmbeddings(VOCAB) }),
    generator: new AnswerGenerator({ completer, sleep: noSleep }),
    topK: 5,
    status,
  };
}

describe("runInit", () => {
  test("fetches, builds, embeds and persists", async () => {
    const source = staticSource(ISSUES);
    const status = new PipelineStatus();

    const result = await runInit({ source, query: 'project = "A"', indexer: indexer(), status });

    expect(source.queries).toEqual(['project = "A"']);
    expect(result.issuesFetched).toBe(2);
    expect(result.docsSkipped).toBe(0);
    expect(result.index.getDocs().map((d) => d.id)).toEqual(["A-1", "A-2"]);
    expect(status.stage).toBe("PERSISTED");
    expect(status.getStatus().counters).toEqual({
      issuesFetched: 2,
      docsBuilt: 2,
      docsSkipped: 0,
      docsEmbedded: 2,
      docsRetrieved: 0,
    });
    expect((await persistence.load()).size).toBe(2);
  });

  test("skips malformed issues and indexes the rest", async () => {
    const source = staticSource([...ISSUES, makeIssue({ key: "A-3", summary: "" })]);
    const result = await runInit({ source, query: "q", indexer: indexer() });

    expect(result.issuesFetched).toBe(3);
    expect(result.docsSkipped).toBe(1);
    expect(result.index.size).toBe(2);
  });

  test("saves a snapshot that an offline rebuild can replay", async () => {
    const snapshotPath = path.join(dir, "issues.json");
    const online = await runInit({
      source: staticSource(ISSUES),
      query: "q",
      indexer: indexer(),
      snapshotPath,
    });

    expect((await loadIssueSnapshot(snapshotPath)).map((i) => i.key)).toEqual(["A-1", "A-2"]);

    const offline = await runInit({
      source: new SnapshotSource(snapshotPath),
      query: "",
      indexer: indexer(),
    });
    expect(offline.index.getDocs()).toEqual(online.index.getDocs());
  });

  test("a very long issue is shortened instead of failing the build", async () => {
    const fake = new FakeEmbeddings(VOCAB);
    // Rejects over-long input the way the provider does: a non-retryable 400.
    const strict: EmbeddingProvider = {
      getModelName: () => fake.getModelName(),
      embed: async (text) => {
        if (text.length > 500) {
          throw Object.assign(new Error("maximum context length exceeded"), { status: 400 });
        }
        return fake.vector(text);
      },
    };
    const comments = Array.from({ length: 50 }, (_, i) => ({
      author: "Sam",
      body: `Still failing on Safari, attempt ${i}`,
    }));
    const source = staticSource([{ ...ISSUES[0], comments }, ISSUES[1]]);
    const build = (maxDocChars?: number) =>
      runInit({
        source,
        query: "q",
        indexer: new Indexer({ embeddings: strict, persistence, sleep: noSleep }),
        maxDocChars,
      });

    await expect(build()).rejects.toBeInstanceOf(EmbeddingProviderError);

    const result = await build(500);
    expect(result.index.size).toBe(2);
    expect(result.index.getDocs()[0].text.length).toBeLessThanOrEqual(500);
  });

  test("a rebuild replaces the previous index", async () => {
    await runInit({ source: staticSource(ISSUES), query: "q", indexer: indexer() });
    await runInit({ source: staticSource(ISSUES.slice(1)), query: "q", indexer: indexer() });

    expect((await persistence.load()).getDocs().map((d) => d.id)).toEqual(["A-2"]);
  });

  test("a failed fetch keeps the previous index and marks the run failed", async () => {
    await runInit({ source: staticSource(ISSUES), query: "q", indexer: indexer() });
    const status = new PipelineStatus();
    const source: IssueSource = {
      fetchAllIssues: async () => {
        throw new SourceUnavailable("JIRA at team.atlassian.net is unavailable: timeout");
      },
    };

    await expect(runInit({ source, query: "q", indexer: indexer(), status })).rejects.toBeInstanceOf(
      SourceUnavailable,
    );
    expect(status.getStatus()).toMatchObject({ stage: "FAILED", failedAt: "FETCHING" });
    expect((await persistence.load()).size).toBe(2);
  });
});

describe("runAsk", () => {
  test("answers from the most relevant issue", async () => {
    await runInit({ source: staticSource(ISSUES), query: "q", indexer: indexer() });
    const completer = new FakeCompleter();

    const { answer, docs } = await runAsk("What is Kix working on?", askDeps(completer));

    expect(answer).toBe("A-1: Fix login bug (assignee: Kix)");
    expect(docs.map((d) => d.id)).toEqual(["A-1", "A-2"]);
    expect(completer.prompts).toHaveLength(1);
    expect(completer.prompts[0]).toContain("[2] A-2: Write docs (assignee: Sam)");
  });

  test("an empty index answers without calling the model", async () => {
    await runInit({ source: staticSource([]), query: "q", indexer: indexer() });
    const completer = new FakeCompleter();

    const result = await runAsk("Anything?", askDeps(completer));

    expect(result).toEqual({ answer: NO_CONTEXT_ANSWER, docs: [] });
    expect(completer.prompts).toEqual([]);
  });

  test("asking before init fails with IndexNotFound", async () => {
    const status = new PipelineStatus();

    await expect(runAsk("Anything?", askDeps(new FakeCompleter(), status))).rejects.toBeInstanceOf(
      IndexNotFound,
    );
    expect(status.getStatus()).toMatchObject({ stage: "FAILED", failedAt: "LOADING" });
  });
});
