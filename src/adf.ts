/**
 * Flatten Atlassian Document Format (the rich-text JSON used by JIRA REST v3
 * for descriptions and comments) into plain text.
 *
 * Block nodes (paragraphs, headings, list items, ...) end with a newline; hard
 * breaks become newlines; mentions, emoji and inline cards contribute their
 * display text. Unknown nodes are walked for their children. Plain strings are
 * returned unchanged so v2-style payloads also work.
 */
export function adfToText(node: unknown): string {
  if (node == null) return "";
  if (typeof node === "string") return node;
  const out: string[] = [];
  walk(node, out);
  return out
    .join("")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

const BLOCK_TYPES = new Set([
  "paragraph",
  "heading",
  "blockquote",
  "codeBlock",
  "tableRow",
  "panel",
  "rule",
  "mediaSingle",
]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function walk(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const child of node) walk(child, out);
    return;
  }
  if (!isRecord(node)) return;
  const type = typeof node.type === "string" ? node.type : "";
  const attrs = isRecord(node.attrs) ? node.attrs : {};

  switch (type) {
    case "text":
      if (typeof node.text === "string") out.push(node.text);
      return;
    case "hardBreak":
      out.push("\n");
      return;
    case "mention":
    case "emoji":
    case "status":
      if (typeof attrs.text === "string") out.push(attrs.text);
      else if (typeof attrs.shortName === "string") out.push(attrs.shortName);
      return;
    case "inlineCard":
      if (typeof attrs.url === "string") out.push(attrs.url);
      return;
    case "tableCell":
    case "tableHeader":
      walk(node.content, out);
      out.push(" | ");
      return;
  }

  if (type === "listItem") out.push("- ");
  walk(node.content, out);
  if (BLOCK_TYPES.has(type)) out.push("\n");
}
