import { APP_VERSION } from "./config";

/** Monotonic counters for ingestion outcomes since process start. */
export interface IngestionCounters {
  /** New versions committed. */
  ingested: number;
  /** Uploads skipped because the content hash was unchanged. */
  unchanged: number;
  /** Attempts that ended in `failed`. */
  failed: number;
  /** Attempts abandoned because a newer upload replaced them. */
  superseded: number;
  /** Chunks embedded (including chunks of attempts that later failed). */
  chunksEmbedded: number;
  /** Embedding calls retried after EmbeddingUnavailable. */
  embedRetries: number;
}

/**
 * Snapshot of server lifecycle + corpus size served on `/health`.
 *
 * ready = true once the persisted index (or cold rebuild from uploads) has
 * been restored.
 */
export interface ServerStatus {
  version: string;
  modelName: string;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  startedAt: string;
  documents: { pending: number; ready: number; failed: number };
  /** Vectors currently in the index. */
  vectors: number;
  ingestion: IngestionCounters;
}

/**
 * Mutable status holder. The pipeline and service receive an instance
 * explicitly; `statusManager` below is the one the entry point wires up.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      documents: initial?.documents ?? { pending: 0, ready: 0, failed: 0 },
      vectors: initial?.vectors ?? 0,
      ingestion: initial?.ingestion ?? {
        ingested: 0,
        unchanged: 0,
        failed: 0,
        superseded: 0,
        chunksEmbedded: 0,
        embedRetries: 0,
      },
    };
  }

  public markTransport(t: string): void {
    this.data.transport = t;
  }

  public setModelName(name: string): void {
    this.data.modelName = name;
  }

  public markReady(): void {
    this.data.ready = true;
  }

  /** Bump one outcome counter. */
  public count(key: keyof IngestionCounters, by = 1): void {
    this.data.ingestion[key] += by;
  }

  /** Refresh corpus gauges from the current store/index contents. */
  public setCorpus(documents: { status: string }[], vectors: number): void {
    const counts = { pending: 0, ready: 0, failed: 0 };
    for (const d of documents) {
      if (d.status === "pending" || d.status === "ready" || d.status === "failed") counts[d.status]++;
    }
    this.data.documents = counts;
    this.data.vectors = vectors;
  }

  /** Live reference to the current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }
}

export const statusManager = new StatusManager();
