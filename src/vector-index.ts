import { cosine, vectorNorm } from "./embeddings";
import { InvariantViolation } from "./errors";
import type { IndexEntry, IndexEntryInput, SearchHit } from "./types";

/**
 * Vector storage with owner-scoped k-nearest-neighbour search. Callers depend
 * only on this interface so an approximate structure (HNSW, IVF) can replace
 * the brute-force scan below without changes elsewhere.
 */
export interface VectorIndex {
  /** Dimensionality fixed by the first insert; undefined while empty. */
  readonly dimension: number | undefined;
  readonly size: number;
  /** Add one entry. Throws {@link InvariantViolation} on a duplicate chunk id or wrong dimension. */
  insert(entry: IndexEntryInput): void;
  /** Remove every entry of a document; returns how many were removed (0 is fine). */
  deleteByDocument(documentId: string): number;
  /** Remove specific chunks; unknown ids are ignored. */
  deleteChunks(chunkIds: Iterable<string>): number;
  /** Best-first hits among `ownerId`'s entries, at most `k`. */
  search(query: Float32Array, k: number, ownerId: string): SearchHit[];
  has(chunkId: string): boolean;
  countByDocument(documentId: string): number;
  countByOwner(ownerId: string): number;
  entries(): IterableIterator<IndexEntry>;
}

function addTo(map: Map<string, Set<string>>, key: string, value: string): void {
  let set = map.get(key);
  if (!set) {
    set = new Set();
    map.set(key, set);
  }
  set.add(value);
}

function removeFrom(map: Map<string, Set<string>>, key: string, value: string): void {
  const set = map.get(key);
  if (!set) return;
  set.delete(value);
  if (set.size === 0) map.delete(key);
}

/**
 * Exact cosine search over the owner's vectors. Linear in the owner's corpus,
 * which is fine at course-note scale.
 *
 * Ordering: descending score, then ascending chunk sequence (earlier text
 * first), then chunk id.
 */
export class BruteForceVectorIndex implements VectorIndex {
  private readonly byChunk = new Map<string, IndexEntry>();
  private readonly byDocument = new Map<string, Set<string>>();
  private readonly byOwner = new Map<string, Set<string>>();
  private dim: number | undefined;

  public constructor(dimension?: number) {
    this.dim = dimension;
  }

  public get dimension(): number | undefined {
    return this.dim;
  }

  public get size(): number {
    return this.byChunk.size;
  }

  public insert(input: IndexEntryInput): void {
    const { chunkId, documentId, ownerId, vector } = input;
    if (this.byChunk.has(chunkId)) {
      throw new InvariantViolation(`Duplicate chunk id in vector index: ${chunkId}`, { documentId });
    }
    if (vector.length === 0) {
      throw new InvariantViolation(`Empty vector for chunk ${chunkId}`, { documentId });
    }
    if (this.dim === undefined) {
      this.dim = vector.length;
    } else if (vector.length !== this.dim) {
      throw new InvariantViolation(
        `Vector dimension mismatch for ${chunkId}: expected ${this.dim}, got ${vector.length}`,
        { documentId },
      );
    }
    this.byChunk.set(chunkId, { ...input, norm: vectorNorm(vector) });
    addTo(this.byDocument, documentId, chunkId);
    addTo(this.byOwner, ownerId, chunkId);
  }

  public deleteByDocument(documentId: string): number {
    const ids = this.byDocument.get(documentId);
    if (!ids) return 0;
    return this.deleteChunks([...ids]);
  }

  public deleteChunks(chunkIds: Iterable<string>): number {
    let removed = 0;
    for (const id of chunkIds) {
      const entry = this.byChunk.get(id);
      if (!entry) continue;
      this.byChunk.delete(id);
      removeFrom(this.byDocument, entry.documentId, id);
      removeFrom(this.byOwner, entry.ownerId, id);
      removed++;
    }
    return removed;
  }

  public search(query: Float32Array, k: number, ownerId: string): SearchHit[] {
    const ids = this.byOwner.get(ownerId);
    if (!ids || k <= 0) return [];
    if (this.dim !== undefined && query.length !== this.dim) {
      throw new InvariantViolation(
        `Query dimension mismatch: expected ${this.dim}, got ${query.length}`,
      );
    }
    const qNorm = vectorNorm(query);
    const hits: SearchHit[] = [];
    for (const id of ids) {
      const e = this.byChunk.get(id);
      if (!e) continue;
      hits.push({
        chunkId: e.chunkId,
        documentId: e.documentId,
        sequence: e.sequence,
        score: cosine(query, qNorm, e.vector, e.norm),
      });
    }
    hits.sort(
      (a, b) =>
        b.score - a.score ||
        a.sequence - b.sequence ||
        (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0),
    );
    return hits.slice(0, k);
  }

  public has(chunkId: string): boolean {
    return this.byChunk.has(chunkId);
  }

  public countByDocument(documentId: string): number {
    return this.byDocument.get(documentId)?.size ?? 0;
  }

  public countByOwner(ownerId: string): number {
    return this.byOwner.get(ownerId)?.size ?? 0;
  }

  public entries(): IterableIterator<IndexEntry> {
    return this.byChunk.values();
  }
}
