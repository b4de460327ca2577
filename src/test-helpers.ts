// Shared fixtures for the Vitest suites. Not imported by runtime code.
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Embedder } from "./embeddings";
import { EmbeddingUnavailable } from "./errors";
import type { RetryPolicy } from "./retry";

/** Retries without waiting. */
export const FAST_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 };

function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/**
 * Deterministic bag-of-words embedder: each lower-cased word bumps one
 * hashed dimension. Texts sharing words score higher; no model involved.
 */
export class HashEmbedder implements Embedder {
  public readonly modelName: string;
  public readonly dimension: number;
  /** embedBatch calls (embed counts as one). */
  public calls = 0;
  /** Fail this many upcoming calls with EmbeddingUnavailable. */
  public failuresLeft = 0;
  public failAlways = false;
  /** When set, every call waits for it before answering. */
  public gate: Promise<void> | undefined;

  public constructor(dimension = 512, modelName = "hash-test") {
    this.dimension = dimension;
    this.modelName = modelName;
  }

  public async init(): Promise<void> {}

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [v] = await this.embedBatch([text], signal);
    return v;
  }

  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    this.calls++;
    if (this.gate) await this.gate;
    signal?.throwIfAborted();
    if (this.failAlways || this.failuresLeft > 0) {
      if (this.failuresLeft > 0) this.failuresLeft--;
      throw new EmbeddingUnavailable("test embedder offline");
    }
    return texts.map((t) => this.vector(t));
  }

  public vector(text: string): Float32Array {
    const v = new Float32Array(this.dimension);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      v[fnv1a(word) % this.dimension] += 1;
    }
    return v;
  }
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function makeTempDir(prefix = "notes-rag-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const utf8 = (s: string): Uint8Array => new TextEncoder().encode(s);
