import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pkg from "../package.json" with { type: "json" };
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "./chunker";
import type { EmbeddingProvider } from "./embeddings";

// Single dotenv load. From a build directory prefer ../.env (project root).
(() => {
  try {
    const __dirname = path.dirname(fileURLToPath(import.meta.url));
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch {
    // import.meta.url not a file URL; use the cwd default below
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  UPLOAD_DIR: string;
  INDEX_STORE_PATH: string | undefined;
  IMPORT_ROOT: string | undefined;
  ALLOWED_EXT: string[];
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  MAX_TOP_K: number;
  EMBEDDING_PROVIDER: EmbeddingProvider;
  MODEL_NAME: string | undefined;
  OLLAMA_BASE_URL: string | undefined;
  TRANSFORMERS_CACHE: string | undefined;
  EMBED_BATCH_SIZE: number;
  EMBED_CONCURRENCY: number;
  EMBED_MAX_ATTEMPTS: number;
  EMBED_RETRY_BASE_MS: number;
  EMBED_RETRY_MAX_MS: number;
  EMBED_TIMEOUT_MS: number;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  return env[key]?.trim() || undefined;
}

/** Integer env var clamped to [min, max]; unparsable or out-of-domain → fallback. */
function int(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

function flag(env: Env, key: string): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function list(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined) return fallback;
  const items = raw
    .split(",")
    .map((s) => s.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean);
  return items.length ? items : fallback;
}

/**
 * Normalize raw environment values into a {@link Config}. Pure; tolerant of
 * junk (falls back to defaults) so a typo never prevents startup.
 */
export function parseConfig(env: Env): Config {
  const CHUNK_SIZE = int(env, "CHUNK_SIZE", DEFAULT_CHUNK_SIZE, 1, 8000);
  let CHUNK_OVERLAP = int(env, "CHUNK_OVERLAP", DEFAULT_CHUNK_OVERLAP, 0, 4000);
  // Overlap must stay below size for the chunker to make progress.
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[RAG] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}).` +
        ` Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  const MAX_TOP_K = 50;
  const provider = (env.EMBEDDING_PROVIDER ?? "").trim().toLowerCase();

  return {
    UPLOAD_DIR: str(env, "UPLOAD_DIR") ?? "user_uploaded_files",
    INDEX_STORE_PATH: str(env, "INDEX_STORE_PATH"),
    IMPORT_ROOT: str(env, "IMPORT_ROOT"),
    ALLOWED_EXT: list(env, "ALLOWED_EXT", ["pdf", "txt", "md"]),
    VERBOSE: flag(env, "VERBOSE"),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K: int(env, "TOP_K", 3, 1, MAX_TOP_K),
    MAX_TOP_K,
    EMBEDDING_PROVIDER: provider === "ollama" ? "ollama" : "transformers",
    MODEL_NAME: str(env, "MODEL_NAME"),
    OLLAMA_BASE_URL: str(env, "OLLAMA_BASE_URL"),
    TRANSFORMERS_CACHE: str(env, "TRANSFORMERS_CACHE"),
    EMBED_BATCH_SIZE: int(env, "EMBED_BATCH_SIZE", 16, 1, 256),
    EMBED_CONCURRENCY: int(env, "EMBED_CONCURRENCY", 4, 1, 32),
    EMBED_MAX_ATTEMPTS: int(env, "EMBED_MAX_ATTEMPTS", 3, 1, 10),
    EMBED_RETRY_BASE_MS: int(env, "EMBED_RETRY_BASE_MS", 250, 0, 60_000),
    EMBED_RETRY_MAX_MS: int(env, "EMBED_RETRY_MAX_MS", 4000, 0, 300_000),
    EMBED_TIMEOUT_MS: int(env, "EMBED_TIMEOUT_MS", 30_000, 0, 600_000),
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}

/** Configuration from the (dotenv-augmented) process environment. */
export function getConfig(): Config {
  return parseConfig(process.env);
}
