/**
 * transformers.js model cache setup. Must run before the first pipeline is
 * created, which is why it lives outside the embedder module.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@huggingface/transformers";

/**
 * Point transformers.js at a filesystem cache directory.
 *
 * @param cacheDir Explicit directory; falls back to TRANSFORMERS_CACHE, then
 *                 `.cache/transformers` under the cwd.
 * @returns The directory actually used.
 */
export async function configureModelCache(cacheDir?: string): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (e) {
    console.error(`[RAG] Could not create model cache dir ${dir}:`, e);
  }
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[RAG] Using model cache at: ${env.cacheDir}`);
  return dir;
}
