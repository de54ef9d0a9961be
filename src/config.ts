import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_MAX_DOC_CHARS } from "./documents";
import { ConfigurationError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env (resolved next to src/); otherwise use the working directory.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[jira-qa] Could not resolve project-root .env, using working directory:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type Command = "init" | "ask";
export type RetrievalMode = "similarity" | "mmr";

export interface Config {
  OPENAI_API_KEY: string;
  JIRA_EMAIL: string;
  JIRA_API_TOKEN: string;
  JIRA_DOMAIN: string;
  JIRA_JQL: string;
  JIRA_PAGE_SIZE: number;
  /** 0 = unlimited. */
  JIRA_MAX_ISSUES: number;
  JIRA_INCLUDE_COMMENTS: boolean;
  JIRA_CONCURRENCY: number;
  INDEX_STORE_PATH: string;
  ISSUES_CACHE_PATH: string;
  EMBEDDING_MODEL: string;
  EMBEDDING_BATCH_SIZE: number;
  EMBEDDING_CONCURRENCY: number;
  /** Longest document text sent to the embedding model. */
  EMBEDDING_MAX_CHARS: number;
  COMPLETION_MODEL: string;
  COMPLETION_TEMPERATURE: number;
  TOP_K: number;
  CONTEXT_CHAR_BUDGET: number;
  RETRIEVAL_MODE: RetrievalMode;
  MMR_FETCH_K: number;
  MMR_LAMBDA: number;
  RETRY_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
  VERBOSE: boolean;
}

export interface ConfigOptions {
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Offline init rebuilds from the issue snapshot and needs no tracker credentials. */
  offline?: boolean;
}

/**
 * Parse and validate all runtime configuration for `command`. Every problem is
 * collected first so a single {@link ConfigurationError} lists them all.
 */
export function getConfig(command: Command, options: ConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const problems: string[] = [];
  const str = (name: string) => env[name]?.trim() ?? "";

  const required = (name: string) => {
    const v = str(name);
    if (!v) problems.push(`${name} is required`);
    return v;
  };

  // Integers are clamped into [min, max]; non-numeric input is a configuration error.
  const int = (name: string, def: number, min: number, max: number) => {
    const raw = str(name);
    if (!raw) return def;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
      problems.push(`${name} must be a number (got "${raw}")`);
      return def;
    }
    return Math.min(max, Math.max(min, Math.floor(n)));
  };

  const float = (name: string, def: number, min: number, max: number) => {
    const raw = str(name);
    if (!raw) return def;
    const n = Number(raw);
    if (!Number.isFinite(n) || n < min || n > max) {
      problems.push(`${name} must be a number between ${min} and ${max} (got "${raw}")`);
      return def;
    }
    return n;
  };

  // Tolerant truthy parsing (supports several common forms).
  const bool = (name: string, def: boolean) => {
    const v = str(name).toLowerCase();
    if (!v) return def;
    return v === "1" || v === "true" || v === "yes" || v === "on";
  };

  const OPENAI_API_KEY = required("OPENAI_API_KEY");

  // Tracker credentials are only needed when init actually talks to JIRA.
  const needsTracker = command === "init" && !options.offline;
  const JIRA_EMAIL = needsTracker ? required("JIRA_EMAIL") : str("JIRA_EMAIL");
  const JIRA_API_TOKEN = needsTracker ? required("JIRA_API_TOKEN") : str("JIRA_API_TOKEN");
  const JIRA_DOMAIN = normalizeDomain(
    needsTracker ? required("JIRA_DOMAIN") : str("JIRA_DOMAIN"),
  );

  const JIRA_JQL = (() => {
    const jql = str("JIRA_JQL");
    if (jql) return jql;
    const project = str("JIRA_PROJECT");
    if (project) return `project = "${project}"`;
    if (needsTracker) problems.push("JIRA_PROJECT (or JIRA_JQL) is required");
    return "";
  })();

  const RETRIEVAL_MODE = ((): RetrievalMode => {
    const v = str("RETRIEVAL_MODE").toLowerCase();
    if (!v || v === "similarity") return "similarity";
    if (v === "mmr") return "mmr";
    problems.push(`RETRIEVAL_MODE must be "similarity" or "mmr" (got "${v}")`);
    return "similarity";
  })();

  const RETRY_BASE_DELAY_MS = int("RETRY_BASE_DELAY_MS", 500, 0, 60_000);

  const config: Config = {
    OPENAI_API_KEY,
    JIRA_EMAIL,
    JIRA_API_TOKEN,
    JIRA_DOMAIN,
    JIRA_JQL,
    JIRA_PAGE_SIZE: int("JIRA_PAGE_SIZE", 100, 1, 1000),
    JIRA_MAX_ISSUES: int("JIRA_MAX_ISSUES", 0, 0, Number.MAX_SAFE_INTEGER),
    JIRA_INCLUDE_COMMENTS: bool("JIRA_INCLUDE_COMMENTS", true),
    JIRA_CONCURRENCY: int("JIRA_CONCURRENCY", 3, 1, 32),
    INDEX_STORE_PATH: path.resolve(str("INDEX_STORE_PATH") || "jira-index.json"),
    ISSUES_CACHE_PATH: path.resolve(str("ISSUES_CACHE_PATH") || "jira-issues.json"),
    EMBEDDING_MODEL: str("EMBEDDING_MODEL") || "text-embedding-3-small",
    EMBEDDING_BATCH_SIZE: int("EMBEDDING_BATCH_SIZE", 64, 1, 2048),
    EMBEDDING_CONCURRENCY: int("EMBEDDING_CONCURRENCY", 2, 1, 16),
    EMBEDDING_MAX_CHARS: int("EMBEDDING_MAX_CHARS", DEFAULT_MAX_DOC_CHARS, 1000, 1_000_000),
    COMPLETION_MODEL: str("COMPLETION_MODEL") || "gpt-4o-mini",
    COMPLETION_TEMPERATURE: float("COMPLETION_TEMPERATURE", 0, 0, 2),
    TOP_K: int("TOP_K", 5, 1, 100),
    CONTEXT_CHAR_BUDGET: int("CONTEXT_CHAR_BUDGET", 12_000, 500, 500_000),
    RETRIEVAL_MODE,
    MMR_FETCH_K: int("MMR_FETCH_K", 20, 1, 500),
    MMR_LAMBDA: float("MMR_LAMBDA", 0.5, 0, 1),
    RETRY_ATTEMPTS: int("RETRY_ATTEMPTS", 3, 1, 10),
    RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS: int("RETRY_MAX_DELAY_MS", 8000, RETRY_BASE_DELAY_MS, 300_000),
    VERBOSE: bool("VERBOSE", false),
  };

  if (problems.length) {
    throw new ConfigurationError(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }
  return config;
}

/** Accept `team.atlassian.net`, `https://team.atlassian.net/` and similar; return the bare host. */
export function normalizeDomain(raw: string): string {
  return raw
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/+$/, "");
}
