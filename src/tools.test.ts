import path from "node:path";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { IndexCorruption, InputError, NotFound } from "./errors";
import { NotesService, documentIdFor } from "./service";
import { FAST_RETRY, HashEmbedder, makeTempDir, removeDir } from "./test-helpers";
import { handleToolCall, toMcpError } from "./tools";

let tmp: string;
let service: NotesService;

beforeEach(async () => {
  tmp = await makeTempDir();
  service = new NotesService({
    embedder: new HashEmbedder(),
    uploadDir: path.join(tmp, "uploads"),
    allowedExt: ["txt", "md"],
    chunkSize: 200,
    chunkOverlap: 20,
    topK: 3,
    maxTopK: 50,
    retry: FAST_RETRY,
  });
});

afterEach(async () => {
  await service.close();
  await removeDir(tmp);
});

describe("handleToolCall", () => {
  it("uploads text content", async () => {
    const result = await handleToolCall(service, "upload_document", {
      owner_id: "alice",
      filename: "bio.md",
      text: "Mitochondria produce ATP.",
    });
    expect(result).toEqual({
      document_id: documentIdFor("alice", "bio.md"),
      filename: "bio.md",
      outcome: "ingested",
      chunk_count: 1,
      reason: undefined,
    });
  });

  it("uploads base64 content", async () => {
    const content_base64 = Buffer.from("Ribosomes build proteins.", "utf8").toString("base64");
    const result = await handleToolCall(service, "upload_document", {
      owner_id: "alice",
      filename: "cells.txt",
      content_base64,
    });
    expect(result).toMatchObject({ outcome: "ingested", chunk_count: 1 });
    expect(service.store.getChunks(documentIdFor("alice", "cells.txt"))[0].text).toBe("Ribosomes build proteins.");
  });

  it("requires exactly one content field", async () => {
    await expect(
      handleToolCall(service, "upload_document", { owner_id: "alice", filename: "a.md", text: "x", content_base64: "eA==" }),
    ).rejects.toBeInstanceOf(z.ZodError);
    await expect(handleToolCall(service, "upload_document", { owner_id: "alice", filename: "a.md" })).rejects.toBeInstanceOf(
      z.ZodError,
    );
  });

  it("answers, lists and deletes", async () => {
    await handleToolCall(service, "upload_document", {
      owner_id: "alice",
      filename: "bio.md",
      text: "Mitochondria produce ATP through cellular respiration.",
    });

    const answer = await handleToolCall(service, "ask", { owner_id: "alice", query: "mitochondria ATP", top_k: 1 });
    expect(answer).toMatchObject({ passages: [{ filename: "bio.md", sequence: 0, offset: 0 }] });

    const listing = await handleToolCall(service, "list_documents", { owner_id: "alice" });
    expect(listing).toMatchObject({ documents: [{ filename: "bio.md", status: "ready", chunk_count: 1 }] });

    const id = documentIdFor("alice", "bio.md");
    await expect(handleToolCall(service, "delete_document", { owner_id: "alice", document_id: id })).resolves.toEqual({
      deleted: id,
    });
    await expect(handleToolCall(service, "list_documents", { owner_id: "alice" })).resolves.toEqual({ documents: [] });
  });

  it("rejects unknown tools and import without an import root", async () => {
    await expect(handleToolCall(service, "rag_query", {})).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    await expect(handleToolCall(service, "import_directory", { owner_id: "alice" })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });
});

describe("toMcpError", () => {
  it("maps domain errors onto JSON-RPC codes", () => {
    expect(toMcpError(new InputError("bad")).code).toBe(ErrorCode.InvalidParams);
    expect(toMcpError(new NotFound("doc_1")).code).toBe(ErrorCode.InvalidRequest);
    expect(toMcpError(new IndexCorruption("doc_1", "mismatch")).code).toBe(ErrorCode.InternalError);
    expect(toMcpError(new Error("boom")).code).toBe(ErrorCode.InternalError);
  });

  it("names the offending argument for validation errors", () => {
    const parsed = z.object({ owner_id: z.string() }).safeParse({ owner_id: 7 });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const err = toMcpError(parsed.error);
    expect(err.code).toBe(ErrorCode.InvalidParams);
    expect(err.message).toContain("owner_id: ");
  });

  it("passes McpError through", () => {
    const original = new McpError(ErrorCode.InvalidRequest, "nope");
    expect(toMcpError(original)).toBe(original);
  });
});
