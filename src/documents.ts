import { InvalidIssue } from "./errors";
import type { Doc, Issue } from "./types";

/** Separator between `Label: value` lines in a document's text. */
export const FIELD_DELIMITER = "\n";

/** Written in place of a null assignee so "who owns nothing" questions still match. */
export const UNASSIGNED = "Unassigned";

/** Collapse runs of blank lines and trim; returns "" for whitespace-only input. */
function clean(value: string | null | undefined): string {
  return (value ?? "").replace(/\r\n?/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
}

/** Default cap on a document's text, comfortably under the embedding model's input limit. */
export const DEFAULT_MAX_DOC_CHARS = 20_000;

/** Cut `text` to at most `max` UTF-16 units without splitting a surrogate pair. */
export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  let end = Math.max(0, max);
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) end--;
  return text.slice(0, end);
}

export interface BuildDocumentOptions {
  /** Upper bound on `Doc.text` length (default {@link DEFAULT_MAX_DOC_CHARS}). */
  maxChars?: number;
}

function render(issue: Issue, maxChars: number): { doc: Doc; truncated: boolean } {
  const key = clean(issue.key);
  const summary = clean(issue.summary);
  if (!key) throw new InvalidIssue("", "missing key");
  if (!summary) throw new InvalidIssue(key, "missing summary");

  const description = clean(issue.description);
  const status = clean(issue.status);
  const assignee = clean(issue.assignee) || UNASSIGNED;

  const lines: string[] = [`Summary: ${summary}`];
  if (description) lines.push(`Description: ${description}`);
  if (status) lines.push(`Status: ${status}`);
  lines.push(`Assignee: ${assignee}`);

  // Comments go in oldest first and stop at the first one that no longer fits.
  let length = lines.join(FIELD_DELIMITER).length;
  let truncated = false;
  for (const comment of issue.comments ?? []) {
    const body = clean(comment.body);
    if (!body) continue;
    const author = clean(comment.author);
    const line = author ? `Comment (${author}): ${body}` : `Comment: ${body}`;
    if (length + FIELD_DELIMITER.length + line.length > maxChars) {
      truncated = true;
      break;
    }
    lines.push(line);
    length += FIELD_DELIMITER.length + line.length;
  }

  let text = lines.join(FIELD_DELIMITER);
  if (text.length > maxChars) {
    text = truncateText(text, maxChars);
    truncated = true;
  }

  const metadata: Record<string, string> = { key, summary, assignee };
  if (status) metadata.status = status;
  const creator = clean(issue.creator);
  if (creator) metadata.creator = creator;
  const created = clean(issue.created);
  if (created) metadata.created = created;
  const updated = clean(issue.updated);
  if (updated) metadata.updated = updated;
  const related = (issue.relatedIssues ?? []).map(clean).filter(Boolean);
  if (related.length) metadata.relatedIssues = related.join(", ");

  return { doc: { id: key, text, metadata }, truncated };
}

/**
 * Convert one issue into its indexable document.
 *
 * Fields are emitted in a fixed order (summary, description, status, assignee,
 * comments), each as `Label: value`; empty fields are dropped. Text longer than
 * `maxChars` loses its trailing comments first, then is cut at the limit.
 *
 * @throws {InvalidIssue} when the key or summary is missing.
 */
export function buildDocument(issue: Issue, opts: BuildDocumentOptions = {}): Doc {
  return render(issue, opts.maxChars ?? DEFAULT_MAX_DOC_CHARS).doc;
}

export interface BuildDocumentsResult {
  docs: Doc[];
  skipped: InvalidIssue[];
}

/**
 * Build documents for a whole fetch. Malformed issues are logged and skipped;
 * a repeated key keeps its first occurrence. Shortened documents are logged.
 */
export function buildDocuments(
  issues: readonly Issue[],
  opts: BuildDocumentOptions = {},
): BuildDocumentsResult {
  const maxChars = opts.maxChars ?? DEFAULT_MAX_DOC_CHARS;
  const docs: Doc[] = [];
  const skipped: InvalidIssue[] = [];
  const seen = new Set<string>();
  for (const issue of issues) {
    let rendered: { doc: Doc; truncated: boolean };
    try {
      rendered = render(issue, maxChars);
    } catch (e) {
      if (!(e instanceof InvalidIssue)) throw e;
      console.error(`[jira-qa] Skipping issue: ${e.message}`);
      skipped.push(e);
      continue;
    }
    const { doc, truncated } = rendered;
    if (seen.has(doc.id)) {
      console.error(`[jira-qa] Skipping duplicate issue ${doc.id}`);
      continue;
    }
    seen.add(doc.id);
    if (truncated) console.error(`[jira-qa] Shortened ${doc.id} to fit ${maxChars} characters.`);
    docs.push(doc);
  }
  return { docs, skipped };
}
