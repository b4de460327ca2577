import { chunkText } from "./chunker";
import { DocumentStore } from "./document-store";
import type { Embedder } from "./embeddings";
import { EmbeddingUnavailable, InputError, InvariantViolation, describeError } from "./errors";
import { KeyedLock } from "./keyed-lock";
import { DEFAULT_RETRY_POLICY, withEmbeddingRetry, type RetryPolicy } from "./retry";
import type { StatusManager } from "./status";
import type { Chunk, ChunkCandidate, DocumentRecord } from "./types";
import type { VectorIndex } from "./vector-index";
import { mapPool } from "./worker-pool";

/** Stages of one ingestion attempt. `ready` and `failed` are terminal. */
export type IngestionStage =
  | "received"
  | "chunking"
  | "embedding"
  | "committing"
  | "ready"
  | "failed";

const NEXT_STAGE: Record<IngestionStage, IngestionStage | undefined> = {
  received: "chunking",
  chunking: "embedding",
  embedding: "committing",
  committing: "ready",
  ready: undefined,
  failed: undefined,
};

/**
 * State machine for a single attempt:
 * received → chunking → embedding → committing → ready, with failed
 * reachable from every non-terminal stage.
 */
export class IngestionAttempt {
  private current: IngestionStage = "received";
  public readonly controller = new AbortController();

  public constructor(
    public readonly documentId: string,
    public readonly contentHash: string,
    public readonly generation: number,
    private readonly onStage?: (documentId: string, stage: IngestionStage) => void,
  ) {
    onStage?.(documentId, "received");
  }

  public get stage(): IngestionStage {
    return this.current;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public advance(to: IngestionStage): void {
    const terminal = NEXT_STAGE[this.current] === undefined;
    const allowed = to === "failed" ? !terminal : NEXT_STAGE[this.current] === to;
    if (!allowed) {
      throw new InvariantViolation(`Invalid ingestion stage ${this.current} → ${to}`, {
        documentId: this.documentId,
      });
    }
    this.current = to;
    this.onStage?.(this.documentId, to);
  }
}

export interface IngestRequest {
  documentId: string;
  ownerId: string;
  filename: string;
  /** Extracted document text. */
  text: string;
  /** Hash of the raw uploaded bytes. */
  contentHash: string;
}

export type IngestionOutcome =
  | { kind: "unchanged"; documentId: string; chunkCount: number }
  | { kind: "ingested"; documentId: string; chunkCount: number }
  | { kind: "failed"; documentId: string; reason: string }
  | { kind: "superseded"; documentId: string };

export interface IngestionPipelineOptions {
  store: DocumentStore;
  index: VectorIndex;
  embedder: Embedder;
  /** Shared with anything else that mutates the same documents. */
  locks?: KeyedLock;
  chunkSize: number;
  chunkOverlap: number;
  retry?: RetryPolicy;
  /** Texts per embedBatch call. */
  batchSize?: number;
  /** Concurrent embedBatch calls per document. */
  concurrency?: number;
  status?: StatusManager;
  verbose?: boolean;
  onStageChange?: (documentId: string, stage: IngestionStage) => void;
  now?: () => Date;
}

interface InFlight {
  attempt: IngestionAttempt;
  promise: Promise<IngestionOutcome>;
}

type Prepared =
  | { kind: "done"; outcome: IngestionOutcome }
  | { kind: "run"; promise: Promise<IngestionOutcome> };

/** Thrown inside an attempt once a newer upload or a delete has taken over. */
class Superseded extends Error {
  public constructor() {
    super("Ingestion superseded");
    this.name = "Superseded";
  }
}

/**
 * Drives documents from extracted text to committed chunks + vectors.
 *
 * Locking: store/index mutation happens only inside `locks.run(documentId)`
 * and only in synchronous sections, so a concurrent search observes either
 * the old or the new version of a document, never both. Embedding runs
 * outside the lock.
 */
export class IngestionPipeline {
  private readonly store: DocumentStore;
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly locks: KeyedLock;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly retry: RetryPolicy;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private readonly onStageChange?: (documentId: string, stage: IngestionStage) => void;
  private readonly now: () => Date;
  private readonly inflight = new Map<string, InFlight>();

  public constructor(opts: IngestionPipelineOptions) {
    this.store = opts.store;
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.locks = opts.locks ?? new KeyedLock();
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.retry = opts.retry ?? DEFAULT_RETRY_POLICY;
    this.batchSize = Math.max(1, opts.batchSize ?? 16);
    this.concurrency = Math.max(1, opts.concurrency ?? 4);
    this.status = opts.status;
    this.verbose = !!opts.verbose;
    this.onStageChange = opts.onStageChange;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Ingest one document version. Unchanged content is a no-op; changed
   * content replaces the previous version atomically; an identical upload
   * racing an in-flight attempt joins it.
   */
  public async ingest(req: IngestRequest): Promise<IngestionOutcome> {
    const prepared = await this.locks.run(req.documentId, () => this.prepare(req));
    return prepared.kind === "done" ? prepared.outcome : prepared.promise;
  }

  /**
   * Remove a document: abort in-flight work, delete its vectors, then its
   * record and chunks. Returns the removed record, or undefined when the
   * document is unknown or, with `ownerId`, owned by someone else.
   */
  public async remove(
    documentId: string,
    ownerId?: string,
  ): Promise<Readonly<DocumentRecord> | undefined> {
    return this.locks.run(documentId, () => {
      const rec = this.store.get(documentId);
      if (!rec || (ownerId !== undefined && rec.ownerId !== ownerId)) return undefined;
      this.abortInFlight(documentId);
      this.index.deleteByDocument(documentId);
      this.store.delete(documentId);
      this.refreshStatus();
      return rec;
    });
  }

  /** Quarantine a document whose chunk and vector sets disagree. */
  public async quarantine(documentId: string, reason: string): Promise<void> {
    await this.locks.run(documentId, () => {
      const rec = this.store.get(documentId);
      if (!rec || rec.status === "deleted") return;
      this.abortInFlight(documentId);
      this.index.deleteByDocument(documentId);
      this.store.markCorrupted(documentId, reason);
      console.error(`[RAG] Quarantined ${documentId}: ${reason}`);
      this.refreshStatus();
    });
  }

  /** Wait for every in-flight attempt to settle. */
  public async drain(): Promise<void> {
    await Promise.allSettled([...this.inflight.values()].map((f) => f.promise));
  }

  public isInFlight(documentId: string): boolean {
    return this.inflight.has(documentId);
  }

  // Runs under the document lock.
  private prepare(req: IngestRequest): Prepared {
    const { documentId, contentHash } = req;
    const running = this.inflight.get(documentId);
    if (running) {
      if (running.attempt.contentHash === contentHash) {
        return { kind: "run", promise: running.promise };
      }
      if (this.verbose) {
        console.error(`[RAG][verbose] Superseding in-flight ingestion of ${documentId}`);
      }
      this.abortInFlight(documentId);
    }

    let rec = this.store.get(documentId);
    // A failed document starts over; its committed version stays indexed.
    if (rec?.status === "failed") rec = this.store.reopen(documentId, contentHash);

    if (rec && this.store.getHash(documentId) === contentHash) {
      if (rec.status === "pending") this.store.markReady(documentId);
      this.status?.count("unchanged");
      this.refreshStatus();
      return {
        kind: "done",
        outcome: { kind: "unchanged", documentId, chunkCount: rec.chunkCount },
      };
    }

    if (rec) {
      this.store.markPending(documentId, contentHash);
    } else {
      this.store.create({
        documentId,
        ownerId: req.ownerId,
        filename: req.filename,
        pendingHash: contentHash,
      });
    }
    this.refreshStatus();

    const attempt = new IngestionAttempt(
      documentId,
      contentHash,
      this.store.nextGeneration(),
      this.onStageChange,
    );
    const promise = this.execute(attempt, req);
    this.inflight.set(documentId, { attempt, promise });
    return { kind: "run", promise };
  }

  private async execute(attempt: IngestionAttempt, req: IngestRequest): Promise<IngestionOutcome> {
    // Let prepare() register this attempt before any work starts.
    await Promise.resolve();
    const { documentId } = attempt;
    try {
      attempt.advance("chunking");
      const candidates = chunkText(req.text, this.chunkSize, this.chunkOverlap);
      if (candidates.length === 0) {
        throw new InputError(`No text to index in ${req.filename}`, { documentId });
      }

      attempt.advance("embedding");
      const vectors = await this.embedAll(attempt, candidates);

      attempt.advance("committing");
      return await this.locks.run(documentId, () => this.commit(attempt, req, candidates, vectors));
    } catch (e) {
      return await this.locks.run(documentId, () => this.fail(attempt, e));
    } finally {
      if (this.inflight.get(documentId)?.attempt === attempt) this.inflight.delete(documentId);
    }
  }

  private async embedAll(
    attempt: IngestionAttempt,
    candidates: readonly ChunkCandidate[],
  ): Promise<Float32Array[]> {
    const { documentId } = attempt;
    const batches: string[][] = [];
    for (let i = 0; i < candidates.length; i += this.batchSize) {
      batches.push(candidates.slice(i, i + this.batchSize).map((c) => c.text));
    }
    if (this.verbose) {
      console.error(
        `[RAG][verbose] Embedding ${candidates.length} chunks of ${documentId}` +
          ` in ${batches.length} batches`,
      );
    }
    const results = await mapPool(
      batches,
      this.concurrency,
      async (texts, _i, signal) => {
        const embed = () => this.embedder.embedBatch(texts, signal);
        const vectors = await withEmbeddingRetry(embed, this.retry, {
          signal,
          label: `embedding ${documentId}`,
          onRetry: (n, err) => {
            this.status?.count("embedRetries");
            console.error(
              `[RAG] Embedding attempt ${n} for ${documentId} failed, retrying: ${err.message}`,
            );
          },
        });
        if (vectors.length !== texts.length) {
          throw new EmbeddingUnavailable(
            `Embedder returned ${vectors.length} vectors for ${texts.length} texts`,
          );
        }
        this.status?.count("chunksEmbedded", texts.length);
        return vectors;
      },
      attempt.signal,
    );
    return results.flat();
  }

  // Runs under the document lock; synchronous so readers never see a mix.
  private commit(
    attempt: IngestionAttempt,
    req: IngestRequest,
    candidates: readonly ChunkCandidate[],
    vectors: readonly Float32Array[],
  ): IngestionOutcome {
    const { documentId } = attempt;
    const rec = this.store.get(documentId);
    if (attempt.signal.aborted || !rec || rec.pendingHash !== attempt.contentHash) {
      throw new Superseded();
    }

    const chunks: Chunk[] = candidates.map((c) => ({
      ...c,
      id: `${documentId}:${attempt.generation}:${c.sequence}`,
      documentId,
    }));

    const inserted: string[] = [];
    try {
      chunks.forEach((chunk, i) => {
        this.index.insert({
          chunkId: chunk.id,
          documentId,
          ownerId: rec.ownerId,
          sequence: chunk.sequence,
          vector: vectors[i],
        });
        inserted.push(chunk.id);
      });
    } catch (e) {
      this.index.deleteChunks(inserted);
      throw e;
    }

    const replaced = this.store.recordIngested(documentId, attempt.contentHash, chunks, this.now());
    this.index.deleteChunks(replaced);
    attempt.advance("ready");

    this.status?.count("ingested");
    this.refreshStatus();
    console.error(`[RAG] Indexed ${req.filename} (${documentId}): ${chunks.length} chunks`);
    return { kind: "ingested", documentId, chunkCount: chunks.length };
  }

  // Runs under the document lock.
  private fail(attempt: IngestionAttempt, error: unknown): IngestionOutcome {
    const { documentId } = attempt;
    const rec = this.store.get(documentId);
    const superseded =
      error instanceof Superseded ||
      attempt.signal.aborted ||
      !rec ||
      rec.status !== "pending" ||
      rec.pendingHash !== attempt.contentHash;
    if (superseded) {
      this.status?.count("superseded");
      if (this.verbose) {
        console.error(`[RAG][verbose] Dropped superseded attempt for ${documentId}`);
      }
      return { kind: "superseded", documentId };
    }

    const reason =
      error instanceof EmbeddingUnavailable
        ? `Embedding service unavailable after ${this.retry.maxAttempts} attempts: ${error.message}`
        : describeError(error);
    attempt.advance("failed");
    this.store.markFailed(documentId, reason);
    this.status?.count("failed");
    this.refreshStatus();
    console.error(`[RAG] Ingestion of ${rec.filename} (${documentId}) failed: ${reason}`);

    if (error instanceof EmbeddingUnavailable || error instanceof InputError) {
      return { kind: "failed", documentId, reason };
    }
    // Programming errors still fail the document but must surface.
    throw error;
  }

  private abortInFlight(documentId: string): void {
    const running = this.inflight.get(documentId);
    if (!running) return;
    running.attempt.controller.abort(new Superseded());
    this.inflight.delete(documentId);
  }

  private refreshStatus(): void {
    this.status?.setCorpus(this.store.all(), this.index.size);
  }
}
