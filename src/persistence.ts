import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { DocumentStoreSnapshot } from "./document-store";
import type { IndexEntry, IndexEntryInput } from "./types";

/**
 * Parameters a persisted snapshot must match to be reused. Any difference
 * means the stored vectors or chunk boundaries are stale, so the load is
 * rejected and callers rebuild from the stored uploads.
 */
export interface SnapshotMeta {
  chunkSize: number;
  chunkOverlap: number;
  modelName: string;
}

/** Everything needed to bring the store and the vector index back. */
export interface IndexSnapshot extends DocumentStoreSnapshot {
  vectors: IndexEntryInput[];
}

const documentSchema = z.object({
  documentId: z.string().min(1),
  ownerId: z.string().min(1),
  filename: z.string().min(1),
  status: z.enum(["pending", "ready", "failed"]),
  contentHash: z.string().optional(),
  pendingHash: z.string().optional(),
  chunkCount: z.number().int().nonnegative(),
  ingestedAt: z.string().optional(),
  reason: z.string().optional(),
});

const chunkSchema = z.object({
  id: z.string().min(1),
  documentId: z.string().min(1),
  sequence: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
  text: z.string(),
  tokenEstimate: z.number().int().nonnegative(),
});

const vectorSchema = z.object({
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  ownerId: z.string().min(1),
  sequence: z.number().int().nonnegative(),
  emb: z.string(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    chunkSize: z.number(),
    chunkOverlap: z.number(),
    modelName: z.string(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  generation: z.number().int().nonnegative(),
  documents: z.array(documentSchema),
  chunks: z.array(chunkSchema),
  vectors: z.array(vectorSchema),
});

type SnapshotFile = z.infer<typeof snapshotSchema>;

/** Base64 of the vector's little-endian f32 bytes. */
export function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

/** Inverse of {@link encodeVector}; null when the payload is not whole f32s. */
export function decodeVector(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy into a fresh, aligned buffer; pooled Buffers may start at any offset.
  return new Float32Array(new Uint8Array(buf).buffer);
}

/**
 * Load/save of the document store + vector index as one JSON file. Saves are
 * serialised and written through a temp file, so readers never see a torn
 * snapshot.
 */
export class Persistence {
  private readonly storePath?: string;
  private readonly verbose: boolean;
  private writes: Promise<void> = Promise.resolve();

  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Read the snapshot. Returns null when persistence is off, the file is
   * missing or unreadable, or it was written with different parameters.
   */
  public async load(expected: SnapshotMeta): Promise<IndexSnapshot | null> {
    const storePath = this.storePath;
    if (!storePath || !fsSync.existsSync(storePath)) return null;
    let file: SnapshotFile;
    try {
      const raw: unknown = JSON.parse(await fs.readFile(storePath, "utf8"));
      const parsed = snapshotSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0]?.message;
        console.error(`[RAG] Stored index at ${storePath} is malformed: ${issue}`);
        return null;
      }
      file = parsed.data;
    } catch (e) {
      console.error(`[RAG] Failed to load store at ${storePath}:`, e);
      return null;
    }

    const { meta } = file;
    if (
      meta.chunkSize !== expected.chunkSize ||
      meta.chunkOverlap !== expected.chunkOverlap ||
      meta.modelName !== expected.modelName
    ) {
      console.error(
        `[RAG] Stored index incompatible (model/chunk params differ). Performing cold rebuild.`,
      );
      return null;
    }

    const vectors: IndexEntryInput[] = [];
    for (const v of file.vectors) {
      const vector = decodeVector(v.emb);
      if (!vector) {
        console.error(`[RAG] Dropping undecodable vector ${v.chunkId}`);
        continue;
      }
      const { chunkId, documentId, ownerId, sequence } = v;
      vectors.push({ chunkId, documentId, ownerId, sequence, vector });
    }
    console.error(
      `[RAG] Loaded persisted index: ${file.documents.length} documents, ${vectors.length} vectors.`,
    );
    if (this.verbose) {
      console.error(`[RAG][verbose] Loaded from ${storePath} (saved ${meta.savedAt})`);
    }
    return { generation: file.generation, documents: file.documents, chunks: file.chunks, vectors };
  }

  /**
   * Queue a save of the given state. Resolves once this write (and every
   * earlier one) has finished; write errors are logged, not thrown.
   */
  public save(
    meta: SnapshotMeta,
    state: DocumentStoreSnapshot,
    entries: Iterable<IndexEntry>,
  ): Promise<void> {
    const storePath = this.storePath;
    if (!storePath) return Promise.resolve();
    // Serialise now so the file reflects the state at call time.
    const out: SnapshotFile = {
      version: 1,
      meta: { ...meta, savedAt: new Date().toISOString(), embEncoding: "f32-base64" },
      generation: state.generation,
      documents: state.documents.map((d) => ({
        documentId: d.documentId,
        ownerId: d.ownerId,
        filename: d.filename,
        status: d.status === "deleted" ? "failed" : d.status,
        contentHash: d.contentHash,
        pendingHash: d.pendingHash,
        chunkCount: d.chunkCount,
        ingestedAt: d.ingestedAt,
        reason: d.reason,
      })),
      chunks: state.chunks.map((c) => ({ ...c })),
      vectors: [...entries].map((e) => ({
        chunkId: e.chunkId,
        documentId: e.documentId,
        ownerId: e.ownerId,
        sequence: e.sequence,
        emb: encodeVector(e.vector),
      })),
    };
    const body = JSON.stringify(out);
    const run = async (): Promise<void> => {
      try {
        await fs.mkdir(path.dirname(storePath), { recursive: true });
        const tmp = `${storePath}.tmp`;
        await fs.writeFile(tmp, body);
        await fs.rename(tmp, storePath);
        if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${storePath}`);
      } catch (e) {
        console.error(`[RAG] Failed to save index store:`, e);
      }
    };
    this.writes = this.writes.then(run);
    return this.writes;
  }

  /** Wait for queued saves. */
  public async flush(): Promise<void> {
    await this.writes;
  }
}
