import OpenAI from "openai";
import { AnswerGenerator, OpenAICompleter } from "./answer";
import type { Config } from "./config";
import { buildDocuments } from "./documents";
import { OpenAIEmbeddings } from "./embeddings";
import { Indexer } from "./indexer";
import { JiraSource } from "./jira";
import { Persistence, loadIssueSnapshot, saveIssueSnapshot } from "./persistence";
import { Retriever } from "./retriever";
import { PipelineStatus } from "./status";
import type { Doc, Issue } from "./types";
import type { VectorIndex } from "./vector-index";

/** Where issues come from: the live tracker or a saved snapshot. */
export interface IssueSource {
  fetchAllIssues(query: string): Promise<Issue[]>;
}

/** Replays the issue snapshot written by a previous online init. */
export class SnapshotSource implements IssueSource {
  public constructor(private readonly filePath: string) {}

  public async fetchAllIssues(): Promise<Issue[]> {
    const issues = await loadIssueSnapshot(this.filePath);
    console.error(`[jira-qa] Loaded ${issues.length} issues from snapshot ${this.filePath}`);
    return issues;
  }
}

export interface InitDeps {
  source: IssueSource;
  /** JQL handed to the source. */
  query: string;
  indexer: Indexer;
  /** When set, the fetched issues are saved here before indexing. */
  snapshotPath?: string;
  /** Cap on each document's text length; see {@link buildDocuments}. */
  maxDocChars?: number;
  status?: PipelineStatus;
}

export interface InitResult {
  index: VectorIndex;
  issuesFetched: number;
  docsSkipped: number;
}

/**
 * `init` flow: FETCHING -> BUILDING_DOCS -> EMBEDDING -> PERSISTED.
 * Any failure aborts the run; the previously persisted index stays in place.
 */
export async function runInit(deps: InitDeps): Promise<InitResult> {
  const status = deps.status ?? new PipelineStatus();
  try {
    status.enter("FETCHING");
    const issues = await deps.source.fetchAllIssues(deps.query);
    status.count("issuesFetched", issues.length);
    if (deps.snapshotPath) await saveIssueSnapshot(deps.snapshotPath, issues);

    status.enter("BUILDING_DOCS");
    const { docs, skipped } = buildDocuments(issues, { maxChars: deps.maxDocChars });
    status.count("docsBuilt", docs.length);
    status.count("docsSkipped", skipped.length);
    console.error(
      `[jira-qa] Built ${docs.length} documents from ${issues.length} issues (${skipped.length} skipped).`,
    );

    status.enter("EMBEDDING");
    const index = await deps.indexer.build(docs);
    status.count("docsEmbedded", index.size);

    status.enter("PERSISTED");
    return { index, issuesFetched: issues.length, docsSkipped: skipped.length };
  } catch (e) {
    status.fail(e);
    throw e;
  }
}

export interface AskDeps {
  persistence: Persistence;
  retriever: Retriever;
  generator: AnswerGenerator;
  /** Documents retrieved per question. */
  topK: number;
  status?: PipelineStatus;
}

export interface AskResult {
  answer: string;
  /** Retrieved documents, best first. */
  docs: Doc[];
}

/**
 * `ask` flow: LOADING -> RETRIEVING -> GENERATING -> ANSWERED.
 * A missing index surfaces as {@link IndexNotFound} and is never retried.
 */
export async function runAsk(question: string, deps: AskDeps): Promise<AskResult> {
  const status = deps.status ?? new PipelineStatus();
  try {
    status.enter("LOADING");
    const index = await deps.persistence.load();

    status.enter("RETRIEVING");
    const docs = await deps.retriever.retrieve(question, index, deps.topK);
    status.count("docsRetrieved", docs.length);

    status.enter("GENERATING");
    const answer = await deps.generator.generate(question, docs);

    status.enter("ANSWERED");
    return { answer, docs };
  } catch (e) {
    status.fail(e);
    throw e;
  }
}

function retryOptions(config: Config) {
  return {
    retryAttempts: config.RETRY_ATTEMPTS,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: config.RETRY_MAX_DELAY_MS,
    verbose: config.VERBOSE,
  };
}

function openAIClient(config: Config): OpenAI {
  return new OpenAI({ apiKey: config.OPENAI_API_KEY, maxRetries: 0 });
}

/** Wire the production `init` dependencies from configuration. */
export function createInitDeps(config: Config, opts: { offline?: boolean } = {}): InitDeps {
  const source: IssueSource = opts.offline
    ? new SnapshotSource(config.ISSUES_CACHE_PATH)
    : new JiraSource({
        domain: config.JIRA_DOMAIN,
        email: config.JIRA_EMAIL,
        apiToken: config.JIRA_API_TOKEN,
        pageSize: config.JIRA_PAGE_SIZE,
        maxIssues: config.JIRA_MAX_ISSUES,
        includeComments: config.JIRA_INCLUDE_COMMENTS,
        concurrency: config.JIRA_CONCURRENCY,
        ...retryOptions(config),
      });
  const status = new PipelineStatus(config.VERBOSE);
  const indexer = new Indexer({
    embeddings: new OpenAIEmbeddings({
      apiKey: config.OPENAI_API_KEY,
      model: config.EMBEDDING_MODEL,
      client: openAIClient(config),
    }),
    persistence: new Persistence(config.INDEX_STORE_PATH, config.VERBOSE),
    batchSize: config.EMBEDDING_BATCH_SIZE,
    concurrency: config.EMBEDDING_CONCURRENCY,
    onProgress: (embedded) => status.count("docsEmbedded", embedded),
    ...retryOptions(config),
  });
  return {
    source,
    query: config.JIRA_JQL,
    indexer,
    snapshotPath: opts.offline ? undefined : config.ISSUES_CACHE_PATH,
    maxDocChars: config.EMBEDDING_MAX_CHARS,
    status,
  };
}

/** Wire the production `ask` dependencies from configuration. */
export function createAskDeps(config: Config): AskDeps {
  const client = openAIClient(config);
  return {
    persistence: new Persistence(config.INDEX_STORE_PATH, config.VERBOSE),
    retriever: new Retriever({
      embeddings: new OpenAIEmbeddings({
        apiKey: config.OPENAI_API_KEY,
        model: config.EMBEDDING_MODEL,
        client,
      }),
      mode: config.RETRIEVAL_MODE,
      fetchK: config.MMR_FETCH_K,
      lambda: config.MMR_LAMBDA,
      ...retryOptions(config),
    }),
    generator: new AnswerGenerator({
      completer: new OpenAICompleter({
        apiKey: config.OPENAI_API_KEY,
        model: config.COMPLETION_MODEL,
        temperature: config.COMPLETION_TEMPERATURE,
        client,
      }),
      contextCharBudget: config.CONTEXT_CHAR_BUDGET,
      ...retryOptions(config),
    }),
    topK: config.TOP_K,
    status: new PipelineStatus(config.VERBOSE),
  };
}
