#!/usr/bin/env tsx
/**
 * Command-line entry point.
 *
 *   jira-qa init [--offline]   fetch issues -> build documents -> embed -> persist
 *   jira-qa ask "<question>"   load index -> retrieve -> generate answer
 *
 * The answer goes to stdout; progress and errors go to stderr.
 */
import { runCli } from "./cli";

process.exitCode = await runCli(process.argv.slice(2));
