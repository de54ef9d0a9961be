import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, IndexNotFound } from "./errors";
import type { Doc, IndexEntry, Issue, IssueComment } from "./types";
import { VectorIndex } from "./vector-index";

/** On-disk format version; bump when the layout changes. */
export const STORE_VERSION = 2;

/**
 * Replace `target` with `data` atomically: the bytes go to a staging file in the
 * same directory, which is then renamed over the target. Readers see either the
 * old file or the new one, never a partial write.
 */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  const dir = path.dirname(target);
  await fs.mkdir(dir, { recursive: true });
  const staging = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`,
  );
  try {
    await fs.writeFile(staging, data, "utf8");
    await fs.rename(staging, target);
  } catch (e) {
    await fs.rm(staging, { force: true });
    throw e;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isStringRecord(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every((x) => typeof x === "string");
}

/** Float32 vectors are stored as base64 of their raw (little-endian) bytes. */
export function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

export function decodeVector(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // Copy into a fresh, aligned buffer: pooled Buffers can sit at odd offsets.
  const bytes = new Uint8Array(buf);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / 4);
}

/**
 * Load/save of the vector index as a single JSON file. The store path is fixed
 * per instance so several indexes can coexist (tests, multiple projects).
 */
export class Persistence {
  public constructor(
    /** Filesystem path of the JSON index file. */
    public readonly storePath: string,
    private readonly verbose = false,
  ) {}

  /** Persist `index`, atomically replacing any previous file. */
  public async save(index: VectorIndex): Promise<void> {
    const out = {
      version: STORE_VERSION,
      meta: {
        modelName: index.modelName,
        dimension: index.dimension,
        count: index.size,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      docs: index.getEntries().map(({ doc, emb }) => ({
        id: doc.id,
        text: doc.text,
        metadata: doc.metadata,
        emb: encodeVector(emb),
      })),
    };
    await writeFileAtomic(this.storePath, JSON.stringify(out));
    if (this.verbose) console.error(`[jira-qa][verbose] Persisted index to ${this.storePath}`);
  }

  /**
   * Read the persisted index.
   *
   * @throws {IndexNotFound} if nothing was ever built here, or the file is unreadable.
   */
  public async load(): Promise<VectorIndex> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isRecord(e) && e.code === "ENOENT") throw new IndexNotFound(this.storePath);
      throw new IndexNotFound(this.storePath, { cause: e, detail: String(e) });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new IndexNotFound(this.storePath, { cause: e, detail: "file is not valid JSON" });
    }
    const corrupt = (detail: string) => new IndexNotFound(this.storePath, { detail });

    if (!isRecord(parsed) || !Array.isArray(parsed.docs) || !isRecord(parsed.meta)) {
      throw corrupt("unrecognized layout");
    }
    if (parsed.version !== STORE_VERSION) {
      throw corrupt(`unsupported version ${String(parsed.version)}`);
    }
    const modelName = typeof parsed.meta.modelName === "string" ? parsed.meta.modelName : "";

    const rawDocs: unknown[] = parsed.docs;
    const entries: IndexEntry[] = [];
    for (const d of rawDocs) {
      if (
        !isRecord(d) ||
        typeof d.id !== "string" ||
        typeof d.text !== "string" ||
        !isStringRecord(d.metadata) ||
        typeof d.emb !== "string"
      ) {
        throw corrupt(`malformed entry #${entries.length}`);
      }
      const emb = decodeVector(d.emb);
      if (!emb) throw corrupt(`bad embedding for ${d.id}`);
      const doc: Doc = { id: d.id, text: d.text, metadata: { ...d.metadata } };
      entries.push({ doc, emb });
    }

    let index: VectorIndex;
    try {
      index = new VectorIndex(entries, modelName);
    } catch (e) {
      throw new IndexNotFound(this.storePath, { cause: e, detail: String(e) });
    }
    console.error(`[jira-qa] Loaded index: ${index.size} documents.`);
    if (this.verbose) console.error(`[jira-qa][verbose] Loaded from ${this.storePath}`);
    return index;
  }
}

/** Save the raw issue list fetched during init so the index can be rebuilt offline. */
export async function saveIssueSnapshot(filePath: string, issues: readonly Issue[]): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify({ version: 1, issues }, null, 2));
}

/**
 * Read an issue snapshot written by {@link saveIssueSnapshot}. Records are
 * coerced field by field; unusable ones surface later as invalid issues.
 *
 * @throws {ConfigurationError} if there is no readable snapshot.
 */
export async function loadIssueSnapshot(filePath: string): Promise<Issue[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (e) {
    throw new ConfigurationError(
      `No readable issue snapshot at ${filePath}; run "init" without --offline first.`,
      { cause: e },
    );
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.issues)) {
    throw new ConfigurationError(`Issue snapshot at ${filePath} has an unrecognized layout.`);
  }
  const s = (v: unknown) => (typeof v === "string" ? v : "");
  return parsed.issues.map((r: unknown): Issue => {
    const o: Record<string, unknown> = isRecord(r) ? r : {};
    const comments: IssueComment[] = Array.isArray(o.comments)
      ? o.comments.filter(isRecord).map((c) => ({ author: s(c.author), body: s(c.body) }))
      : [];
    return {
      key: s(o.key),
      summary: s(o.summary),
      description: s(o.description),
      status: s(o.status),
      assignee: typeof o.assignee === "string" ? o.assignee : null,
      creator: s(o.creator),
      created: s(o.created),
      updated: s(o.updated),
      relatedIssues: Array.isArray(o.relatedIssues)
        ? o.relatedIssues.filter((k): k is string => typeof k === "string")
        : [],
      comments,
    };
  });
}
