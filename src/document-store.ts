import { InvariantViolation } from "./errors";
import type { Chunk, DocumentRecord, DocumentStatus } from "./types";

/**
 * Allowed status transitions. `deleted` is reachable from anywhere and is
 * handled separately in {@link DocumentStore.delete}.
 */
const TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  pending: ["ready", "failed"],
  ready: ["pending"],
  failed: [],
  deleted: [],
};

export interface NewDocument {
  documentId: string;
  ownerId: string;
  filename: string;
  pendingHash: string;
}

/** Serializable form used by persistence. */
export interface DocumentStoreSnapshot {
  generation: number;
  documents: DocumentRecord[];
  chunks: Chunk[];
}

/**
 * Tracks documents (hash, status, owner) and the chunk table of each
 * document's committed version. All mutation is synchronous; callers
 * serialize per document with a {@link KeyedLock}.
 */
export class DocumentStore {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, Chunk>();
  private readonly chunkIdsByDocument = new Map<string, string[]>();
  private generation = 0;

  /** Fresh, store-wide ingestion generation used to mint chunk ids. */
  public nextGeneration(): number {
    return ++this.generation;
  }

  public get(documentId: string): Readonly<DocumentRecord> | undefined {
    return this.documents.get(documentId);
  }

  public listByOwner(ownerId: string): Readonly<DocumentRecord>[] {
    const out: DocumentRecord[] = [];
    for (const d of this.documents.values()) if (d.ownerId === ownerId) out.push(d);
    return out;
  }

  public all(): Readonly<DocumentRecord>[] {
    return [...this.documents.values()];
  }

  /** Register a brand-new document in `pending`. */
  public create(doc: NewDocument): Readonly<DocumentRecord> {
    if (this.documents.has(doc.documentId)) {
      throw new InvariantViolation(`Document already exists: ${doc.documentId}`, {
        documentId: doc.documentId,
      });
    }
    const rec: DocumentRecord = {
      documentId: doc.documentId,
      ownerId: doc.ownerId,
      filename: doc.filename,
      status: "pending",
      pendingHash: doc.pendingHash,
      chunkCount: 0,
    };
    this.documents.set(doc.documentId, rec);
    return rec;
  }

  /** Hash of the committed version, if any. */
  public getHash(documentId: string): string | undefined {
    return this.documents.get(documentId)?.contentHash;
  }

  /**
   * `ready → pending` for a re-upload with new content. On a document that is
   * already pending only the in-flight hash is replaced.
   */
  public markPending(documentId: string, pendingHash: string): void {
    const rec = this.require(documentId);
    if (rec.status !== "pending") this.transition(rec, "pending");
    rec.pendingHash = pendingHash;
    rec.reason = undefined;
  }

  /**
   * Re-upload of a failed document: `failed → deleted → pending`. The old
   * record is destroyed, but its committed version (hash, chunk set) moves to
   * the new record and stays queryable until a commit replaces it.
   */
  public reopen(documentId: string, pendingHash: string): Readonly<DocumentRecord> {
    const old = this.require(documentId);
    if (old.status !== "failed") {
      throw new InvariantViolation(`Cannot reopen ${documentId} in status ${old.status}`, {
        documentId,
      });
    }
    old.status = "deleted";
    const rec: DocumentRecord = {
      documentId,
      ownerId: old.ownerId,
      filename: old.filename,
      status: "pending",
      contentHash: old.contentHash,
      pendingHash,
      chunkCount: old.chunkCount,
      ingestedAt: old.ingestedAt,
    };
    this.documents.set(documentId, rec);
    return rec;
  }

  /**
   * Commit a new version: `pending → ready`, replacing the chunk set
   * wholesale. Returns the ids of the chunks that were replaced so the caller
   * can drop their vectors.
   */
  public recordIngested(
    documentId: string,
    contentHash: string,
    chunks: readonly Chunk[],
    at: Date = new Date(),
  ): string[] {
    const rec = this.require(documentId);
    chunks.forEach((c, i) => {
      if (c.documentId !== documentId || c.sequence !== i) {
        throw new InvariantViolation(`Chunk ${c.id} out of sequence for ${documentId}`, {
          documentId,
        });
      }
      const existing = this.chunks.get(c.id);
      if (existing && existing.documentId !== documentId) {
        throw new InvariantViolation(`Duplicate chunk id ${c.id}`, { documentId });
      }
    });
    this.transition(rec, "ready");
    const replaced = this.dropChunks(documentId);
    for (const c of chunks) this.chunks.set(c.id, c);
    this.chunkIdsByDocument.set(
      documentId,
      chunks.map((c) => c.id),
    );
    rec.contentHash = contentHash;
    rec.pendingHash = undefined;
    rec.chunkCount = chunks.length;
    rec.ingestedAt = at.toISOString();
    rec.reason = undefined;
    return replaced;
  }

  /**
   * `pending → ready` without a new chunk set: the in-flight replacement was
   * abandoned in favour of content identical to the committed version.
   */
  public markReady(documentId: string): void {
    const rec = this.require(documentId);
    if (rec.contentHash === undefined) {
      throw new InvariantViolation(`No committed version to restore for ${documentId}`, {
        documentId,
      });
    }
    this.transition(rec, "ready");
    rec.pendingHash = undefined;
  }

  /** `pending → failed`. A previously committed version stays in place. */
  public markFailed(documentId: string, reason: string): void {
    const rec = this.require(documentId);
    this.transition(rec, "failed");
    rec.pendingHash = undefined;
    rec.reason = reason;
  }

  /**
   * Quarantine a committed version whose chunk and vector sets disagree:
   * `ready → pending → failed`, dropping its chunks and forgetting its hash so
   * that re-uploading identical bytes ingests again.
   */
  public markCorrupted(documentId: string, reason: string): string[] {
    const rec = this.require(documentId);
    if (rec.status === "ready") this.transition(rec, "pending");
    if (rec.status === "pending") this.transition(rec, "failed");
    const dropped = this.dropChunks(documentId);
    rec.contentHash = undefined;
    rec.pendingHash = undefined;
    rec.chunkCount = 0;
    rec.reason = reason;
    return dropped;
  }

  /**
   * Any state → `deleted`; the record and its chunks are destroyed. Returns
   * the removed chunk ids, or undefined when the document was unknown.
   */
  public delete(documentId: string): string[] | undefined {
    const rec = this.documents.get(documentId);
    if (!rec) return undefined;
    rec.status = "deleted";
    const dropped = this.dropChunks(documentId);
    this.documents.delete(documentId);
    return dropped;
  }

  public getChunk(chunkId: string): Chunk | undefined {
    return this.chunks.get(chunkId);
  }

  /** Committed chunks of a document in sequence order. */
  public getChunks(documentId: string): Chunk[] {
    const ids = this.chunkIdsByDocument.get(documentId) ?? [];
    const out: Chunk[] = [];
    for (const id of ids) {
      const c = this.chunks.get(id);
      if (c) out.push(c);
    }
    return out;
  }

  public chunkCount(documentId: string): number {
    return this.chunkIdsByDocument.get(documentId)?.length ?? 0;
  }

  public snapshot(): DocumentStoreSnapshot {
    return {
      generation: this.generation,
      documents: [...this.documents.values()].map((d) => ({ ...d })),
      chunks: [...this.chunks.values()],
    };
  }

  /** Replace all state with a snapshot. Chunks of unknown documents are dropped. */
  public restore(snapshot: DocumentStoreSnapshot): void {
    this.documents.clear();
    this.chunks.clear();
    this.chunkIdsByDocument.clear();
    this.generation = snapshot.generation;
    for (const d of snapshot.documents) this.documents.set(d.documentId, { ...d });
    const grouped = new Map<string, Chunk[]>();
    for (const c of snapshot.chunks) {
      if (!this.documents.has(c.documentId)) continue;
      let arr = grouped.get(c.documentId);
      if (!arr) {
        arr = [];
        grouped.set(c.documentId, arr);
      }
      arr.push(c);
    }
    for (const [documentId, arr] of grouped) {
      arr.sort((a, b) => a.sequence - b.sequence);
      for (const c of arr) this.chunks.set(c.id, c);
      this.chunkIdsByDocument.set(
        documentId,
        arr.map((c) => c.id),
      );
    }
  }

  private require(documentId: string): DocumentRecord {
    const rec = this.documents.get(documentId);
    if (!rec) throw new InvariantViolation(`Unknown document ${documentId}`, { documentId });
    return rec;
  }

  private transition(rec: DocumentRecord, to: DocumentStatus): void {
    if (!TRANSITIONS[rec.status].includes(to)) {
      throw new InvariantViolation(
        `Invalid status transition ${rec.status} → ${to} for ${rec.documentId}`,
        { documentId: rec.documentId },
      );
    }
    rec.status = to;
  }

  private dropChunks(documentId: string): string[] {
    const ids = this.chunkIdsByDocument.get(documentId) ?? [];
    for (const id of ids) this.chunks.delete(id);
    this.chunkIdsByDocument.delete(documentId);
    return ids;
  }
}
