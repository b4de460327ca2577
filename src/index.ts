/**
 * Application entry point.
 *
 * 1. Load configuration (dotenv + env knobs, see config.ts).
 * 2. Point transformers.js at its on-disk model cache.
 * 3. Initialise the embedder eagerly so a broken model setup fails at startup.
 * 4. Restore documents and vectors from INDEX_STORE_PATH, or rebuild them from
 *    the stored uploads under UPLOAD_DIR.
 * 5. Serve the MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http).
 */
import { configureModelCache } from "./cache";
import { getConfig, type Config } from "./config";
import { createEmbedder } from "./embeddings";
import { NotesService } from "./service";
import { statusManager } from "./status";
import { createServer } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();

if (config.EMBEDDING_PROVIDER === "transformers") {
  await configureModelCache(config.TRANSFORMERS_CACHE).catch((e: unknown) =>
    console.error("[RAG] Failed to set TRANSFORMERS cache directory:", e),
  );
}

const embedder = createEmbedder({
  provider: config.EMBEDDING_PROVIDER,
  modelName: config.MODEL_NAME,
  ollamaBaseUrl: config.OLLAMA_BASE_URL,
});
await embedder.init();
statusManager.setModelName(embedder.modelName);

const service = NotesService.fromConfig(config, embedder, statusManager);
await service.restore();

const shutdown = (signal: string) => {
  console.error(`[RAG] ${signal} received, flushing index...`);
  service
    .close()
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      console.error("[RAG] Shutdown failed:", e);
      process.exit(1);
    });
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
const factory = () => createServer(service, config.MAX_TOP_K);

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(factory);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(factory);
}
