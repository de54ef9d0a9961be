import { APP_VERSION } from "./config";

export type InitStage = "UNINITIALIZED" | "FETCHING" | "BUILDING_DOCS" | "EMBEDDING" | "PERSISTED";
export type AskStage = "LOADING" | "RETRIEVING" | "GENERATING" | "ANSWERED";
export type Stage = InitStage | AskStage | "FAILED";

/** Allowed forward transitions for each flow. Every flow ends after one pass. */
const NEXT: Readonly<Record<Stage, readonly Stage[]>> = {
  UNINITIALIZED: ["FETCHING", "LOADING"],
  FETCHING: ["BUILDING_DOCS"],
  BUILDING_DOCS: ["EMBEDDING"],
  EMBEDDING: ["PERSISTED"],
  PERSISTED: [],
  LOADING: ["RETRIEVING"],
  RETRIEVING: ["GENERATING"],
  GENERATING: ["ANSWERED"],
  ANSWERED: [],
  FAILED: [],
};

/**
 * Counters for one run. All values are monotonic, non-negative integers updated in-place.
 */
export interface RunCounters {
  issuesFetched: number;
  docsBuilt: number;
  docsSkipped: number;
  docsEmbedded: number;
  docsRetrieved: number;
}

export interface RunStatus {
  version: string;
  command: "init" | "ask" | "unknown";
  stage: Stage;
  /** Stage that was active when the run failed. */
  failedAt?: Stage;
  error?: string;
  startedAt: string;
  counters: RunCounters;
}

/**
 * Tracks the stage of a single init/ask run and rejects out-of-order
 * transitions. One instance per run; nothing is shared between runs.
 */
export class PipelineStatus {
  private readonly data: RunStatus;

  public constructor(private readonly verbose = false) {
    this.data = {
      version: APP_VERSION,
      command: "unknown",
      stage: "UNINITIALIZED",
      startedAt: new Date().toISOString(),
      counters: {
        issuesFetched: 0,
        docsBuilt: 0,
        docsSkipped: 0,
        docsEmbedded: 0,
        docsRetrieved: 0,
      },
    };
  }

  /** Move to `next`; throws if the transition is not allowed from the current stage. */
  public enter(next: Stage): void {
    const current = this.data.stage;
    if (!NEXT[current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${current} -> ${next}`);
    }
    if (next === "FETCHING") this.data.command = "init";
    if (next === "LOADING") this.data.command = "ask";
    this.data.stage = next;
    if (this.verbose) console.error(`[jira-qa][verbose] Stage: ${current} -> ${next}`);
  }

  /** Record a failure; the run is over after this. */
  public fail(error: unknown): void {
    this.data.failedAt = this.data.stage;
    this.data.error = error instanceof Error ? error.message : String(error);
    this.data.stage = "FAILED";
  }

  public count(counter: keyof RunCounters, value: number): void {
    this.data.counters[counter] = value;
  }

  public get stage(): Stage {
    return this.data.stage;
  }

  /** Live reference to the current status (treat as read-only). */
  public getStatus(): RunStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}
