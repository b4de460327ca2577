/** Lifecycle of a document record. */
export type DocumentStatus = "pending" | "ready" | "failed" | "deleted";

/**
 * One uploaded document as tracked by the {@link DocumentStore}. The id is
 * stable for a given owner + filename pair, so re-uploads address the same
 * record.
 */
export interface DocumentRecord {
  readonly documentId: string;
  readonly ownerId: string;
  readonly filename: string;
  status: DocumentStatus;
  /** Hash of the committed (queryable) version; absent until the first commit. */
  contentHash?: string;
  /** Hash of the version currently being ingested. */
  pendingHash?: string;
  /** Number of chunks in the committed version. */
  chunkCount: number;
  /** ISO timestamp of the last successful commit. */
  ingestedAt?: string;
  /** Why the last attempt failed (status `failed` only). */
  reason?: string;
}

/** Output of the chunker: a span of the document text, not yet identified. */
export interface ChunkCandidate {
  /** 0-based position within the document. */
  readonly sequence: number;
  /** Character offset of the span in the extracted text. */
  readonly offset: number;
  readonly length: number;
  readonly text: string;
  /** Rough token count (1 token ≈ 4 characters). */
  readonly tokenEstimate: number;
}

/** A committed chunk. Immutable once created. */
export interface Chunk extends ChunkCandidate {
  readonly id: string;
  readonly documentId: string;
}

/** Vector plus the metadata needed for owner filtering and reverse lookup. */
export interface IndexEntry {
  readonly chunkId: string;
  readonly documentId: string;
  readonly ownerId: string;
  readonly sequence: number;
  readonly vector: Float32Array;
  /** L2 norm cached at insert time. */
  readonly norm: number;
}

export type IndexEntryInput = Omit<IndexEntry, "norm">;

export interface SearchHit {
  readonly chunkId: string;
  readonly documentId: string;
  readonly sequence: number;
  readonly score: number;
}

/** A retrieved chunk with source attribution, handed to answer generation. */
export interface Passage {
  readonly documentId: string;
  readonly filename: string;
  readonly sequence: number;
  readonly text: string;
  readonly score: number;
  readonly offset: number;
  readonly length: number;
}

/** Listing row returned to the UI layer. */
export interface DocumentSummary {
  readonly documentId: string;
  readonly filename: string;
  readonly status: DocumentStatus;
  readonly chunkCount: number;
  readonly ingestedAt?: string;
  readonly reason?: string;
}
