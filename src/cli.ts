import { parseArgs } from "node:util";
import { APP_VERSION, getConfig } from "./config";
import { EmbeddingDimensionMismatch, IndexNotFound, JiraQaError } from "./errors";
import { createAskDeps, createInitDeps, runAsk, runInit } from "./pipeline";

export const USAGE = `jira-qa ${APP_VERSION}

Usage:
  jira-qa init [--offline]     Fetch JIRA issues and build the search index
  jira-qa ask "<question>"     Answer a question from the indexed issues

Options:
  --offline    Rebuild the index from the saved issue snapshot (no JIRA calls)
  -h, --help   Show this help
  -v, --version

Configuration is read from environment variables (or a .env file); see .env.example.`;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  createInitDeps?: typeof createInitDeps;
  createAskDeps?: typeof createAskDeps;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

/** Exit code for bad invocations (unknown command, missing argument). */
export const EXIT_USAGE = 2;

/**
 * Run one CLI invocation and return the process exit code. Every error is
 * rendered here; nothing escapes as an unhandled rejection.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIO;

  const parse = () =>
    parseArgs({
      args: [...argv],
      options: {
        offline: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "v", default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse();
  } catch (e) {
    io.err(`error: ${e instanceof Error ? e.message : String(e)}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.out(USAGE);
    return 0;
  }
  if (values.version) {
    io.out(APP_VERSION);
    return 0;
  }

  const [command, ...rest] = positionals;
  try {
    if (command === "init") {
      const config = getConfig("init", { env: deps.env, offline: values.offline });
      const init = deps.createInitDeps ?? createInitDeps;
      const result = await runInit(init(config, { offline: values.offline }));
      io.err(
        `[jira-qa] Indexed ${result.index.size} issues into ${config.INDEX_STORE_PATH}` +
          (result.docsSkipped ? ` (${result.docsSkipped} malformed issue(s) skipped)` : ""),
      );
      return 0;
    }

    if (command === "ask") {
      if (!rest.length) {
        io.err('error: ask needs a question, e.g. jira-qa ask "What is blocking the release?"');
        return EXIT_USAGE;
      }
      const config = getConfig("ask", { env: deps.env });
      const ask = deps.createAskDeps ?? createAskDeps;
      const { answer } = await runAsk(rest.join(" "), ask(config));
      io.out(answer);
      return 0;
    }
  } catch (e) {
    return reportError(e, io);
  }

  io.err(command ? `error: unknown command "${command}"` : "error: missing command");
  io.err(USAGE);
  return EXIT_USAGE;
}

function reportError(e: unknown, io: CliIO): number {
  if (e instanceof JiraQaError) {
    io.err(`error: ${e.message}`);
    if (e instanceof IndexNotFound) {
      io.err('hint: run "jira-qa init" to build the index first.');
    } else if (e instanceof EmbeddingDimensionMismatch) {
      io.err('hint: the index was built with a different embedding model; run "jira-qa init" again.');
    }
    return e.exitCode;
  }
  io.err(`error: unexpected failure: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}`);
  return 1;
}
