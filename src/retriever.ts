import { DocumentStore } from "./document-store";
import type { Embedder } from "./embeddings";
import { IndexCorruption, InputError } from "./errors";
import { DEFAULT_RETRY_POLICY, withEmbeddingRetry, type RetryPolicy } from "./retry";
import type { Passage, SearchHit } from "./types";
import type { VectorIndex } from "./vector-index";

export interface RetrieverOptions {
  store: DocumentStore;
  index: VectorIndex;
  embedder: Embedder;
  retry?: RetryPolicy;
  /** Upper bound applied to every `k`. */
  maxK?: number;
  /** Called for each document found inconsistent during a read. */
  onCorruption?: (error: IndexCorruption) => void | Promise<void>;
}

/**
 * Query side of the pipeline: embed the question once, search the owner's
 * vectors, map hits back to chunk text with source attribution.
 */
export class Retriever {
  private readonly store: DocumentStore;
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly retry: RetryPolicy;
  private readonly maxK: number;
  private readonly onCorruption?: (error: IndexCorruption) => void | Promise<void>;

  public constructor(opts: RetrieverOptions) {
    this.store = opts.store;
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.retry = opts.retry ?? DEFAULT_RETRY_POLICY;
    this.maxK = opts.maxK ?? 50;
    this.onCorruption = opts.onCorruption;
  }

  /**
   * Best-first passages for `query` among `ownerId`'s documents. Returns []
   * when the owner has nothing indexed; the embedder is not called then.
   */
  public async retrieve(query: string, ownerId: string, k: number): Promise<Passage[]> {
    const q = query.trim();
    if (!q) throw new InputError("Query must not be empty");
    const limit = Math.max(1, Math.min(this.maxK, Math.floor(k) || 1));
    if (this.index.countByOwner(ownerId) === 0) return [];

    const vector = await withEmbeddingRetry(() => this.embedder.embed(q), this.retry, {
      label: "query embedding",
    });
    const hits = this.index.search(vector, limit, ownerId);

    const passages: Passage[] = [];
    const verdicts = new Map<string, IndexCorruption | null>();
    for (const hit of hits) {
      let verdict = verdicts.get(hit.documentId);
      if (verdict === undefined) {
        verdict = this.verify(hit.documentId, ownerId);
        verdicts.set(hit.documentId, verdict);
        if (verdict) await this.report(verdict);
      }
      if (verdict) continue;
      const passage = this.toPassage(hit);
      if (passage) passages.push(passage);
    }
    return passages;
  }

  /**
   * Check that a document's committed chunk set and vector set agree.
   * Returns the corruption found, or null.
   */
  public verify(documentId: string, ownerId?: string): IndexCorruption | null {
    const rec = this.store.get(documentId);
    if (!rec) return new IndexCorruption(documentId, `Vectors reference unknown document ${documentId}`);
    if (ownerId !== undefined && rec.ownerId !== ownerId) {
      return new IndexCorruption(documentId, `Vectors of ${documentId} filed under the wrong owner`);
    }
    const chunks = this.store.getChunks(documentId);
    const vectors = this.index.countByDocument(documentId);
    if (chunks.length !== vectors || chunks.length !== rec.chunkCount) {
      return new IndexCorruption(
        documentId,
        `Index corruption: ${chunks.length} chunks, ${vectors} vectors, ${rec.chunkCount} recorded`,
      );
    }
    const orphan = chunks.find((c) => !this.index.has(c.id));
    if (orphan) {
      return new IndexCorruption(documentId, `Index corruption: chunk ${orphan.id} has no vector`);
    }
    return null;
  }

  private toPassage(hit: SearchHit): Passage | null {
    const chunk = this.store.getChunk(hit.chunkId);
    const rec = this.store.get(hit.documentId);
    if (!chunk || !rec) return null;
    return {
      documentId: hit.documentId,
      filename: rec.filename,
      sequence: chunk.sequence,
      text: chunk.text,
      score: hit.score,
      offset: chunk.offset,
      length: chunk.length,
    };
  }

  private async report(error: IndexCorruption): Promise<void> {
    console.error(`[RAG] ${error.message} (${error.documentId ?? "unknown document"})`);
    await this.onCorruption?.(error);
  }
}
