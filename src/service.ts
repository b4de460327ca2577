import fg from "fast-glob";
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Config } from "./config";
import { DocumentStore } from "./document-store";
import type { Embedder } from "./embeddings";
import { IndexCorruption, InputError, NotFound, describeError, isRagError } from "./errors";
import { IngestionPipeline, type IngestionOutcome } from "./ingestion";
import { Persistence, type IndexSnapshot, type SnapshotMeta } from "./persistence";
import { Retriever } from "./retriever";
import type { RetryPolicy } from "./retry";
import type { StatusManager } from "./status";
import { TextExtractor } from "./text-extractor";
import type { DocumentSummary, Passage } from "./types";
import { UploadStore, ensureWithinRoot, sanitizeFilename } from "./uploads";
import { BruteForceVectorIndex, type VectorIndex } from "./vector-index";

/** Stable id for an owner's file: re-uploading the same name addresses the same document. */
export function documentIdFor(ownerId: string, filename: string): string {
  const digest = createHash("sha256").update(`${ownerId}\u0000${filename}`).digest("hex");
  return "doc_" + digest.slice(0, 16);
}

export function contentHashOf(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export interface UploadResult {
  documentId: string;
  filename: string;
  outcome: IngestionOutcome;
}

export interface ImportFileResult {
  /** Path relative to the imported directory. */
  path: string;
  documentId?: string;
  outcome?: IngestionOutcome["kind"];
  chunkCount?: number;
  error?: string;
}

export interface RestoreReport {
  source: "snapshot" | "rebuild";
  documents: number;
  vectors: number;
  quarantined: number;
}

export interface NotesServiceOptions {
  embedder: Embedder;
  uploadDir: string;
  storePath?: string;
  /** Directory import is only offered when this is set. */
  importRoot?: string;
  allowedExt: readonly string[];
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  maxTopK: number;
  retry?: RetryPolicy;
  batchSize?: number;
  concurrency?: number;
  status?: StatusManager;
  verbose?: boolean;
  index?: VectorIndex;
}

/**
 * The inbound surface: upload, delete, ask, list, bulk import and startup
 * restore. Owns the store, index and pipeline and persists after every
 * mutation.
 */
export class NotesService {
  public readonly store = new DocumentStore();
  public readonly index: VectorIndex;
  public readonly pipeline: IngestionPipeline;
  public readonly retriever: Retriever;
  public readonly importRoot?: string;

  private readonly embedder: Embedder;
  private readonly uploads: UploadStore;
  private readonly extractor: TextExtractor;
  private readonly persistence: Persistence;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly topK: number;
  private readonly maxTopK: number;
  private readonly allowedExt: readonly string[];
  private readonly status?: StatusManager;
  private readonly verbose: boolean;

  public constructor(opts: NotesServiceOptions) {
    this.embedder = opts.embedder;
    this.index = opts.index ?? new BruteForceVectorIndex();
    this.uploads = new UploadStore(opts.uploadDir);
    this.extractor = new TextExtractor(opts.allowedExt, opts.verbose);
    this.persistence = new Persistence(opts.storePath, opts.verbose);
    this.importRoot = opts.importRoot ? path.resolve(opts.importRoot) : undefined;
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.topK = opts.topK;
    this.maxTopK = opts.maxTopK;
    this.allowedExt = opts.allowedExt;
    this.status = opts.status;
    this.verbose = !!opts.verbose;

    this.pipeline = new IngestionPipeline({
      store: this.store,
      index: this.index,
      embedder: this.embedder,
      chunkSize: opts.chunkSize,
      chunkOverlap: opts.chunkOverlap,
      retry: opts.retry,
      batchSize: opts.batchSize,
      concurrency: opts.concurrency,
      status: opts.status,
      verbose: opts.verbose,
    });
    this.retriever = new Retriever({
      store: this.store,
      index: this.index,
      embedder: this.embedder,
      retry: opts.retry,
      maxK: opts.maxTopK,
      onCorruption: (e) => this.handleCorruption(e),
    });
  }

  public static fromConfig(config: Config, embedder: Embedder, status?: StatusManager): NotesService {
    return new NotesService({
      embedder,
      uploadDir: config.UPLOAD_DIR,
      storePath: config.INDEX_STORE_PATH,
      importRoot: config.IMPORT_ROOT,
      allowedExt: config.ALLOWED_EXT,
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      topK: config.TOP_K,
      maxTopK: config.MAX_TOP_K,
      retry: {
        maxAttempts: config.EMBED_MAX_ATTEMPTS,
        baseDelayMs: config.EMBED_RETRY_BASE_MS,
        maxDelayMs: config.EMBED_RETRY_MAX_MS,
        timeoutMs: config.EMBED_TIMEOUT_MS,
      },
      batchSize: config.EMBED_BATCH_SIZE,
      concurrency: config.EMBED_CONCURRENCY,
      status,
      verbose: config.VERBOSE,
    });
  }

  /**
   * Store the bytes and ingest them. Unreadable or empty content is rejected
   * with an InputError before anything is recorded.
   */
  public async uploadDocument(
    ownerId: string,
    filename: string,
    bytes: Uint8Array,
  ): Promise<UploadResult> {
    const owner = requireOwner(ownerId);
    const name = sanitizeFilename(filename);
    const { text } = await this.extractor.extract(name, bytes);
    await this.uploads.save(owner, name, bytes);
    return this.ingestText(owner, name, text, contentHashOf(bytes));
  }

  /** @throws NotFound when the document does not exist or belongs to someone else. */
  public async deleteDocument(ownerId: string, documentId: string): Promise<void> {
    const owner = requireOwner(ownerId);
    const removed = await this.pipeline.remove(documentId, owner);
    if (!removed) throw new NotFound(documentId);
    const { filename } = removed;
    await this.uploads.remove(owner, filename);
    console.error(`[RAG] Deleted ${filename} (${documentId})`);
    await this.persist();
  }

  public async ask(ownerId: string, query: string, k?: number): Promise<Passage[]> {
    const owner = requireOwner(ownerId);
    const limit = Math.max(1, Math.min(this.maxTopK, Math.floor(k ?? this.topK)));
    return this.retriever.retrieve(query, owner, limit);
  }

  public listDocuments(ownerId: string): DocumentSummary[] {
    return this.store
      .listByOwner(ownerId)
      .map((d) => ({
        documentId: d.documentId,
        filename: d.filename,
        status: d.status,
        chunkCount: d.chunkCount,
        ingestedAt: d.ingestedAt,
        reason: d.reason,
      }))
      .sort((a, b) => a.filename.localeCompare(b.filename) || a.documentId.localeCompare(b.documentId));
  }

  /**
   * Upload every allowed file under `dir` (relative to the import root).
   * Files are processed one by one; a failing file is reported and skipped.
   * Files with the same name in different subdirectories address the same
   * document, so the last one in path order wins.
   */
  public async importDirectory(ownerId: string, dir: string): Promise<ImportFileResult[]> {
    if (!this.importRoot) throw new InputError("Directory import is disabled (IMPORT_ROOT not set)");
    const owner = requireOwner(ownerId);
    const base = ensureWithinRoot(this.importRoot, dir || ".");
    let isDir = false;
    try {
      isDir = (await fs.stat(base)).isDirectory();
    } catch (e) {
      throw new InputError(`Directory does not exist: ${dir}`, { cause: e });
    }
    if (!isDir) throw new InputError(`Path is not a directory: ${dir}`);

    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = (
      await fg(patterns, { cwd: base, onlyFiles: true, dot: false, caseSensitiveMatch: false })
    ).sort();
    if (this.verbose) {
      console.error(`[RAG][verbose] Importing ${files.length} files from ${base}`);
    }

    const results: ImportFileResult[] = [];
    for (const rel of files) {
      try {
        const bytes = await fs.readFile(path.join(base, rel));
        const { documentId, outcome } = await this.uploadDocument(owner, path.basename(rel), bytes);
        results.push({
          path: rel,
          documentId,
          outcome: outcome.kind,
          chunkCount: "chunkCount" in outcome ? outcome.chunkCount : undefined,
          error: outcome.kind === "failed" ? outcome.reason : undefined,
        });
      } catch (e) {
        if (!isRagError(e) || e.kind !== "input") throw e;
        console.error(`[RAG] Skipping ${rel}: ${e.message}`);
        results.push({ path: rel, error: e.message });
      }
    }
    return results;
  }

  /**
   * Startup: reuse the persisted snapshot when it matches the current chunking
   * and model, otherwise re-ingest every stored upload.
   */
  public async restore(): Promise<RestoreReport> {
    const snap = await this.persistence.load(this.meta());
    const report = snap ? await this.restoreSnapshot(snap) : await this.rebuild();
    await this.persist();
    this.status?.setCorpus(this.store.all(), this.index.size);
    this.status?.markReady();
    console.error(
      `[RAG] Restored from ${report.source}: ${report.documents} documents, ${report.vectors} vectors` +
        (report.quarantined ? `, ${report.quarantined} quarantined` : ""),
    );
    return report;
  }

  /** Let in-flight ingestion settle and flush pending writes. */
  public async close(): Promise<void> {
    await this.pipeline.drain();
    await this.persistence.flush();
  }

  private async ingestText(
    ownerId: string,
    filename: string,
    text: string,
    contentHash: string,
  ): Promise<UploadResult> {
    const documentId = documentIdFor(ownerId, filename);
    const outcome = await this.pipeline.ingest({
      documentId,
      ownerId,
      filename,
      text,
      contentHash,
    });
    if (outcome.kind !== "unchanged") await this.persist();
    return { documentId, filename, outcome };
  }

  private async restoreSnapshot(snap: IndexSnapshot): Promise<RestoreReport> {
    this.store.restore(snap);
    for (const v of snap.vectors) {
      const chunk = this.store.getChunk(v.chunkId);
      if (!chunk || chunk.documentId !== v.documentId) {
        if (this.verbose) console.error(`[RAG][verbose] Dropping orphan vector ${v.chunkId}`);
        continue;
      }
      try {
        this.index.insert(v);
      } catch (e) {
        console.error(`[RAG] Could not restore vector ${v.chunkId}: ${describeError(e)}`);
      }
    }

    let quarantined = 0;
    for (const rec of this.store.all()) {
      if (rec.status === "pending") {
        if (rec.contentHash !== undefined) this.store.markReady(rec.documentId);
        else this.store.markFailed(rec.documentId, "Ingestion interrupted by restart");
      }
      const corruption = this.retriever.verify(rec.documentId);
      if (corruption) {
        await this.pipeline.quarantine(rec.documentId, corruption.message);
        quarantined++;
      }
    }
    return this.report("snapshot", quarantined);
  }

  private async rebuild(): Promise<RestoreReport> {
    const stored = await this.uploads.list();
    if (stored.length) {
      console.error(`[RAG] Rebuilding index from ${stored.length} stored uploads...`);
    }
    for (const u of stored) {
      try {
        const bytes = await this.uploads.read(u.ownerId, u.filename);
        const { text } = await this.extractor.extract(u.filename, bytes);
        await this.ingestText(u.ownerId, u.filename, text, contentHashOf(bytes));
      } catch (e) {
        if (!isRagError(e) || e.kind !== "input") throw e;
        console.error(`[RAG] Skipping stored upload ${u.filename}: ${e.message}`);
      }
    }
    return this.report("rebuild", 0);
  }

  private async handleCorruption(e: IndexCorruption): Promise<void> {
    if (!e.documentId) return;
    await this.pipeline.quarantine(e.documentId, e.message);
    await this.persist();
  }

  private report(source: RestoreReport["source"], quarantined: number): RestoreReport {
    return { source, documents: this.store.all().length, vectors: this.index.size, quarantined };
  }

  private meta(): SnapshotMeta {
    return {
      chunkSize: this.chunkSize,
      chunkOverlap: this.chunkOverlap,
      modelName: this.embedder.modelName,
    };
  }

  private persist(): Promise<void> {
    return this.persistence.save(this.meta(), this.store.snapshot(), this.index.entries());
  }
}

function requireOwner(ownerId: string): string {
  const owner = typeof ownerId === "string" ? ownerId.trim() : "";
  if (!owner) throw new InputError("owner_id must not be empty");
  return owner;
}
