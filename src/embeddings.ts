import { pipeline } from "@huggingface/transformers";
import type { FeatureExtractionPipeline } from "@huggingface/transformers";
import fetch from "node-fetch";
import { z } from "zod";
import { EmbeddingUnavailable, describeError } from "./errors";

/**
 * Capability interface for turning text into fixed-length vectors. One
 * adapter exists per provider; the concrete adapter is chosen once at
 * construction time ({@link createEmbedder}).
 *
 * `embedBatch` must return exactly what calling `embed` per item would.
 */
export interface Embedder {
  /** Identifier of the underlying model, recorded alongside persisted vectors. */
  readonly modelName: string;
  /** Load weights / check reachability. Safe to call more than once. */
  init(): Promise<void>;
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw signal.reason ?? new Error("aborted");
}

/**
 * Local embeddings through a transformers.js feature-extraction pipeline,
 * mean pooled and L2 normalised. Runs in-process; the first init downloads
 * the model into the configured cache.
 */
export class TransformersEmbedder implements Embedder {
  public readonly modelName: string;
  private extractor: FeatureExtractionPipeline | null = null;
  private loading: Promise<void> | null = null;

  public constructor(modelName?: string) {
    this.modelName = modelName?.trim() || "Xenova/all-MiniLM-L6-v2";
  }

  public async init(): Promise<void> {
    if (this.extractor) return;
    this.loading ??= this.load();
    await this.loading;
  }

  private async load(): Promise<void> {
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    try {
      this.extractor = await pipeline("feature-extraction", this.modelName);
    } catch (e) {
      this.loading = null;
      throw new EmbeddingUnavailable(`Failed to load model ${this.modelName}: ${describeError(e)}`, {
        cause: e,
      });
    }
    console.error(`[RAG] Model ready: ${this.modelName}`);
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    if (!this.extractor) throw new EmbedderNotInitializedError();
    throwIfAborted(signal);
    try {
      const output = await this.extractor(text, { pooling: "mean", normalize: true });
      const data: ArrayLike<number | bigint> = output.data;
      return Float32Array.from(data, (v) => Number(v));
    } catch (e) {
      throw new EmbeddingUnavailable(`Embedding failed: ${describeError(e)}`, { cause: e });
    }
  }

  /** Sequential per-item calls, so results are identical to {@link embed}. */
  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (const text of texts) {
      throwIfAborted(signal);
      out.push(await this.embed(text, signal));
    }
    return out;
  }
}

const ollamaEmbedResponse = z.object({
  embeddings: z.array(z.array(z.number().finite()).nonempty()),
});

/** Embeddings from an Ollama server's `/api/embed` endpoint. */
export class OllamaEmbedder implements Embedder {
  public readonly modelName: string;
  private readonly baseUrl: string;

  public constructor(opts: { modelName?: string; baseUrl?: string } = {}) {
    this.modelName = opts.modelName?.trim() || "nomic-embed-text";
    this.baseUrl = (opts.baseUrl?.trim() || "http://localhost:11434").replace(/\/+$/, "");
  }

  /** Probe with a tiny request so misconfiguration surfaces at startup. */
  public async init(): Promise<void> {
    await this.embedBatch(["ping"]);
    console.error(`[RAG] Ollama embeddings ready: ${this.modelName} @ ${this.baseUrl}`);
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [vec] = await this.embedBatch([text], signal);
    if (!vec) throw new EmbeddingUnavailable("Ollama returned no embedding");
    return vec;
  }

  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    throwIfAborted(signal);
    let body: unknown;
    try {
      const res = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.modelName, input: texts }),
        signal,
      });
      if (!res.ok) {
        throw new EmbeddingUnavailable(`Ollama API error: ${res.status} ${res.statusText}`);
      }
      body = await res.json();
    } catch (e) {
      if (signal?.aborted) throw e;
      if (e instanceof EmbeddingUnavailable) throw e;
      throw new EmbeddingUnavailable(`Ollama unreachable at ${this.baseUrl}: ${describeError(e)}`, {
        cause: e,
      });
    }

    const parsed = ollamaEmbedResponse.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingUnavailable(`Invalid embedding response from Ollama: ${parsed.error.message}`);
    }
    const { embeddings } = parsed.data;
    if (embeddings.length !== texts.length) {
      throw new EmbeddingUnavailable(
        `Ollama returned ${embeddings.length} embeddings for ${texts.length} inputs`,
      );
    }
    return embeddings.map((values) => Float32Array.from(values));
  }
}

export type EmbeddingProvider = "transformers" | "ollama";

/** Build the adapter named by configuration. */
export function createEmbedder(opts: {
  provider: EmbeddingProvider;
  modelName?: string;
  ollamaBaseUrl?: string;
}): Embedder {
  switch (opts.provider) {
    case "ollama":
      return new OllamaEmbedder({ modelName: opts.modelName, baseUrl: opts.ollamaBaseUrl });
    case "transformers":
      return new TransformersEmbedder(opts.modelName);
  }
}

/** L2 norm of a vector. */
export function vectorNorm(v: Float32Array): number {
  let s = 0;
  for (let i = 0; i < v.length; i++) s += v[i] * v[i];
  return Math.sqrt(s);
}

/**
 * Cosine similarity given precomputed norms. Zero vectors score 0 rather than
 * NaN.
 */
export function cosine(a: Float32Array, na: number, b: Float32Array, nb: number): number {
  if (na === 0 || nb === 0) return 0;
  let dot = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) dot += a[i] * b[i];
  return dot / (na * nb);
}
