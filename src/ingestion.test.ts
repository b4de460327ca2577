import { describe, expect, it, vi } from "vitest";
import { chunkText } from "./chunker";
import { DocumentStore } from "./document-store";
import { IngestionPipeline, type IngestRequest, type IngestionStage } from "./ingestion";
import { Retriever } from "./retriever";
import { StatusManager } from "./status";
import { FAST_RETRY, HashEmbedder, deferred } from "./test-helpers";
import { BruteForceVectorIndex } from "./vector-index";

const NOTES_V1 = [
  "Photosynthesis converts light energy into chemical energy stored in glucose.",
  "It takes place in the chloroplasts of plant cells, which contain chlorophyll.",
  "The light-dependent reactions happen in the thylakoid membranes and release oxygen.",
  "The Calvin cycle runs in the stroma and fixes carbon dioxide into sugars.",
].join(" ");

const NOTES_V2 = [
  "Cellular respiration breaks glucose down to release energy as ATP.",
  "Glycolysis happens in the cytoplasm; the Krebs cycle happens in the mitochondria.",
].join(" ");

function setup(opts: { stages?: IngestionStage[] } = {}) {
  const store = new DocumentStore();
  const index = new BruteForceVectorIndex();
  const embedder = new HashEmbedder();
  const status = new StatusManager();
  const pipeline = new IngestionPipeline({
    store,
    index,
    embedder,
    chunkSize: 120,
    chunkOverlap: 20,
    retry: FAST_RETRY,
    batchSize: 2,
    concurrency: 2,
    status,
    onStageChange: opts.stages ? (_id, stage) => opts.stages?.push(stage) : undefined,
  });
  return { store, index, embedder, status, pipeline };
}

function request(text: string, contentHash: string): IngestRequest {
  return { documentId: "doc1", ownerId: "alice", filename: "bio.md", text, contentHash };
}

const CHLOROPLAST_NOTE = "Photosynthesis happens in the chloroplasts of leaf cells.";
const STOMATA_NOTE = "Stomata on the leaf surface let carbon dioxide reach the chloroplasts.";
const XYLEM_NOTE = "Xylem carries water from the roots up to the chloroplasts in the leaves.";

/** Queries with its own embedder, so a gated ingestion embedder never blocks it. */
function queryTexts(ctx: ReturnType<typeof setup>): Promise<string[]> {
  const retriever = new Retriever({
    store: ctx.store,
    index: ctx.index,
    embedder: new HashEmbedder(),
    retry: FAST_RETRY,
  });
  return retriever.retrieve("chloroplasts", "alice", 3).then((ps) => ps.map((p) => p.text));
}

/** Ingests CHLOROPLAST_NOTE, then fails a replacement with STOMATA_NOTE. */
async function failedReplacement() {
  const ctx = setup();
  await ctx.pipeline.ingest(request(CHLOROPLAST_NOTE, "h1"));
  const committedIds = ctx.store.getChunks("doc1").map((c) => c.id);
  ctx.embedder.failAlways = true;
  const outcome = await ctx.pipeline.ingest(request(STOMATA_NOTE, "h2"));
  ctx.embedder.failAlways = false;
  expect(outcome.kind).toBe("failed");
  return { ...ctx, committedIds };
}

describe("IngestionPipeline", () => {
  it("commits chunks and vectors together", async () => {
    const stages: IngestionStage[] = [];
    const { store, index, pipeline, status } = setup({ stages });
    const expected = chunkText(NOTES_V1, 120, 20).length;

    const outcome = await pipeline.ingest(request(NOTES_V1, "h1"));

    expect(outcome).toEqual({ kind: "ingested", documentId: "doc1", chunkCount: expected });
    expect(store.get("doc1")?.status).toBe("ready");
    expect(store.chunkCount("doc1")).toBe(expected);
    expect(index.countByDocument("doc1")).toBe(expected);
    expect(stages).toEqual(["received", "chunking", "embedding", "committing", "ready"]);
    expect(status.getStatus().documents).toEqual({ pending: 0, ready: 1, failed: 0 });
    expect(status.getStatus().ingestion.chunksEmbedded).toBe(expected);
  });

  it("treats an identical re-upload as a no-op", async () => {
    const { index, embedder, pipeline } = setup();
    await pipeline.ingest(request(NOTES_V1, "h1"));
    const calls = embedder.calls;
    const ids = [...index.entries()].map((e) => e.chunkId);

    const outcome = await pipeline.ingest(request(NOTES_V1, "h1"));

    expect(outcome.kind).toBe("unchanged");
    expect(embedder.calls).toBe(calls);
    expect([...index.entries()].map((e) => e.chunkId)).toEqual(ids);
  });

  it("replaces every entry of the previous version", async () => {
    const { store, index, pipeline } = setup();
    await pipeline.ingest(request(NOTES_V1, "h1"));
    const oldIds = store.getChunks("doc1").map((c) => c.id);

    const outcome = await pipeline.ingest(request(NOTES_V2, "h2"));

    expect(outcome.kind).toBe("ingested");
    expect(oldIds.some((id) => index.has(id))).toBe(false);
    expect(index.countByDocument("doc1")).toBe(chunkText(NOTES_V2, 120, 20).length);
    expect(store.getChunks("doc1").every((c) => c.text.length > 0 && index.has(c.id))).toBe(true);
    expect(store.getHash("doc1")).toBe("h2");
  });

  it("marks the document failed when embedding stays unavailable", async () => {
    const { store, index, embedder, pipeline, status } = setup();
    embedder.failAlways = true;

    const outcome = await pipeline.ingest(request("Short note about enzymes.", "h1"));

    expect(outcome.kind).toBe("failed");
    expect(embedder.calls).toBe(3);
    expect(index.size).toBe(0);
    const rec = store.get("doc1");
    expect(rec?.status).toBe("failed");
    expect(rec?.reason).toBe("Embedding service unavailable after 3 attempts: test embedder offline");
    expect(status.getStatus().ingestion.embedRetries).toBe(2);
  });

  it("recovers from transient embedding failures", async () => {
    const { store, embedder, pipeline } = setup();
    embedder.failuresLeft = 2;
    const outcome = await pipeline.ingest(request("Short note about enzymes.", "h1"));
    expect(outcome.kind).toBe("ingested");
    expect(store.get("doc1")?.status).toBe("ready");
  });

  it("keeps the previous version queryable when a replacement fails", async () => {
    const { store, index, embedder, pipeline } = setup();
    await pipeline.ingest(request(NOTES_V1, "h1"));
    const before = index.countByDocument("doc1");
    embedder.failAlways = true;

    const outcome = await pipeline.ingest(request(NOTES_V2, "h2"));

    expect(outcome.kind).toBe("failed");
    expect(store.get("doc1")?.status).toBe("failed");
    expect(store.getHash("doc1")).toBe("h1");
    expect(index.countByDocument("doc1")).toBe(before);
  });

  it("starts over when a failed document is uploaded again", async () => {
    const { store, embedder, pipeline } = setup();
    embedder.failAlways = true;
    await pipeline.ingest(request(NOTES_V1, "h1"));
    embedder.failAlways = false;

    const outcome = await pipeline.ingest(request(NOTES_V1, "h1"));

    expect(outcome.kind).toBe("ingested");
    expect(store.get("doc1")?.status).toBe("ready");
    expect(store.get("doc1")?.reason).toBeUndefined();
  });

  it("serves the committed version while a replacement is embedding", async () => {
    const ctx = setup();
    const { store, embedder, pipeline } = ctx;
    await pipeline.ingest(request(CHLOROPLAST_NOTE, "h1"));
    const gate = deferred();
    embedder.gate = gate.promise;
    const calls = embedder.calls;

    const replacing = pipeline.ingest(request(STOMATA_NOTE, "h2"));
    await vi.waitFor(() => expect(embedder.calls).toBe(calls + 1));

    expect(store.get("doc1")?.status).toBe("pending");
    expect(await queryTexts(ctx)).toEqual([CHLOROPLAST_NOTE]);

    gate.resolve();
    expect((await replacing).kind).toBe("ingested");
    expect(await queryTexts(ctx)).toEqual([STOMATA_NOTE]);
  });

  it("keeps a failed document's committed version queryable while it is uploaded again", async () => {
    const ctx = await failedReplacement();
    const { store, index, embedder, pipeline, committedIds } = ctx;
    const gate = deferred();
    embedder.gate = gate.promise;
    const calls = embedder.calls;

    const reupload = pipeline.ingest(request(XYLEM_NOTE, "h3"));
    await vi.waitFor(() => expect(embedder.calls).toBe(calls + 1));

    expect(store.get("doc1")?.status).toBe("pending");
    expect(store.getHash("doc1")).toBe("h1");
    expect(await queryTexts(ctx)).toEqual([CHLOROPLAST_NOTE]);

    gate.resolve();
    expect((await reupload).kind).toBe("ingested");
    expect(await queryTexts(ctx)).toEqual([XYLEM_NOTE]);
    expect(committedIds.some((id) => index.has(id))).toBe(false);
    expect(store.getHash("doc1")).toBe("h3");
  });

  it("keeps the committed version when the upload after a failure fails too", async () => {
    const ctx = await failedReplacement();
    const { store, index, embedder, pipeline, committedIds } = ctx;
    embedder.failAlways = true;

    const outcome = await pipeline.ingest(request(XYLEM_NOTE, "h3"));

    expect(outcome.kind).toBe("failed");
    expect(store.get("doc1")?.status).toBe("failed");
    expect(store.getHash("doc1")).toBe("h1");
    expect(store.getChunks("doc1").map((c) => c.id)).toEqual(committedIds);
    expect(committedIds.every((id) => index.has(id))).toBe(true);
    expect(await queryTexts(ctx)).toEqual([CHLOROPLAST_NOTE]);
  });

  it("treats re-uploading the committed bytes of a failed document as a no-op", async () => {
    const { store, index, embedder, pipeline, committedIds } = await failedReplacement();
    const calls = embedder.calls;

    const outcome = await pipeline.ingest(request(CHLOROPLAST_NOTE, "h1"));

    expect(outcome).toEqual({ kind: "unchanged", documentId: "doc1", chunkCount: 1 });
    expect(embedder.calls).toBe(calls);
    expect([...index.entries()].map((e) => e.chunkId)).toEqual(committedIds);
    expect(store.get("doc1")?.status).toBe("ready");
    expect(store.get("doc1")?.reason).toBeUndefined();
  });

  it("fails text that yields no chunks", async () => {
    const { store, pipeline } = setup();
    const outcome = await pipeline.ingest(request("   \n  ", "h1"));
    expect(outcome).toEqual({ kind: "failed", documentId: "doc1", reason: "No text to index in bio.md" });
    expect(store.get("doc1")?.status).toBe("failed");
  });

  it("joins an in-flight attempt for identical content", async () => {
    const { embedder, pipeline } = setup();
    const gate = deferred();
    embedder.gate = gate.promise;

    const first = pipeline.ingest(request("Mitosis has four phases.", "h1"));
    const second = pipeline.ingest(request("Mitosis has four phases.", "h1"));
    gate.resolve();

    const [a, b] = await Promise.all([first, second]);
    expect(a).toEqual({ kind: "ingested", documentId: "doc1", chunkCount: 1 });
    expect(b).toEqual(a);
    expect(embedder.calls).toBe(1);
  });

  it("lets a newer upload supersede an in-flight one", async () => {
    const { store, index, embedder, pipeline, status } = setup();
    const gate = deferred();
    embedder.gate = gate.promise;

    const first = pipeline.ingest(request(NOTES_V1, "h1"));
    const second = pipeline.ingest(request(NOTES_V2, "h2"));
    gate.resolve();

    expect(await first).toEqual({ kind: "superseded", documentId: "doc1" });
    expect((await second).kind).toBe("ingested");
    expect(store.getHash("doc1")).toBe("h2");
    expect(index.countByDocument("doc1")).toBe(chunkText(NOTES_V2, 120, 20).length);
    expect(status.getStatus().ingestion.superseded).toBe(1);
  });

  it("drops in-flight work when the document is removed", async () => {
    const { store, index, embedder, pipeline } = setup();
    const gate = deferred();
    embedder.gate = gate.promise;

    const running = pipeline.ingest(request(NOTES_V1, "h1"));
    await expect(pipeline.remove("doc1")).resolves.toMatchObject({ documentId: "doc1" });
    gate.resolve();

    expect((await running).kind).toBe("superseded");
    expect(store.get("doc1")).toBeUndefined();
    expect(index.size).toBe(0);
    expect(pipeline.isInFlight("doc1")).toBe(false);
    await expect(pipeline.remove("doc1")).resolves.toBeUndefined();
  });

  it("quarantines a document so identical bytes ingest again", async () => {
    const { store, index, pipeline } = setup();
    await pipeline.ingest(request(NOTES_V1, "h1"));

    await pipeline.quarantine("doc1", "Index corruption: test");

    expect(store.get("doc1")?.status).toBe("failed");
    expect(store.get("doc1")?.reason).toBe("Index corruption: test");
    expect(index.countByDocument("doc1")).toBe(0);
    expect((await pipeline.ingest(request(NOTES_V1, "h1"))).kind).toBe("ingested");
  });
});
