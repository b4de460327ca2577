/**
 * MCP tool surface over {@link NotesService}.
 *
 * Tools:
 *  - upload_document  : store + ingest one file (UTF-8 `text` or `content_base64`).
 *  - delete_document  : remove a document with all of its chunks and vectors.
 *  - ask              : top-k passages from the caller's own documents.
 *  - list_documents   : the caller's documents with status and failure reason.
 *  - import_directory : bulk upload from under IMPORT_ROOT (only listed when set).
 *
 * Every call names its `owner_id`; documents are never visible across owners.
 * Argument validation is zod; domain errors are mapped to JSON-RPC codes in
 * {@link toMcpError}.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import { describeError, isRagError } from "./errors";
import type { NotesService } from "./service";

const ownerId = z.string().trim().min(1, "owner_id must not be empty");

const uploadArgs = z
  .object({
    owner_id: ownerId,
    filename: z.string().trim().min(1, "filename must not be empty"),
    text: z.string().optional(),
    content_base64: z
      .string()
      .transform((s) => s.replace(/\s+/g, ""))
      .refine((s) => /^[A-Za-z0-9+/]*={0,2}$/.test(s), "content_base64 is not valid base64")
      .optional(),
  })
  .refine((a) => (a.text === undefined) !== (a.content_base64 === undefined), {
    message: "Provide exactly one of text or content_base64",
  });

const deleteArgs = z.object({ owner_id: ownerId, document_id: z.string().trim().min(1) });

const askArgs = z.object({
  owner_id: ownerId,
  query: z.string(),
  top_k: z.number().int().optional(),
});

const listArgs = z.object({ owner_id: ownerId });

const importArgs = z.object({ owner_id: ownerId, dir: z.string().default(".") });

const OWNER_PROP = { type: "string", description: "Id of the user the documents belong to." };

function toolDefinitions(maxTopK: number, importEnabled: boolean): Tool[] {
  const tools: Tool[] = [
    {
      name: "upload_document",
      description:
        "Upload a course note (pdf, txt, md). Re-uploading the same filename replaces " +
        "the previous version; identical content is a no-op.",
      inputSchema: {
        type: "object",
        properties: {
          owner_id: OWNER_PROP,
          filename: { type: "string", description: "File name including extension, e.g. 'week3.md'." },
          text: { type: "string", description: "UTF-8 file content (text formats)." },
          content_base64: { type: "string", description: "Base64 file content (required for PDFs)." },
        },
        required: ["owner_id", "filename"],
      },
    },
    {
      name: "delete_document",
      description: "Delete one of your documents and everything indexed from it.",
      inputSchema: {
        type: "object",
        properties: {
          owner_id: OWNER_PROP,
          document_id: { type: "string", description: "Id returned by upload_document or list_documents." },
        },
        required: ["owner_id", "document_id"],
      },
    },
    {
      name: "ask",
      description:
        "Semantically search your documents and return the most relevant passages " +
        "with filename, chunk sequence and score.",
      inputSchema: {
        type: "object",
        properties: {
          owner_id: OWNER_PROP,
          query: { type: "string", description: "Natural language question." },
          top_k: {
            type: "number",
            description: `Maximum number of passages (1-${maxTopK}).`,
            minimum: 1,
            maximum: maxTopK,
          },
        },
        required: ["owner_id", "query"],
      },
    },
    {
      name: "list_documents",
      description: "List your documents with status (pending, ready, failed) and chunk counts.",
      inputSchema: {
        type: "object",
        properties: { owner_id: OWNER_PROP },
        required: ["owner_id"],
      },
    },
  ];
  if (importEnabled) {
    tools.push({
      name: "import_directory",
      description: "Upload every supported file under a directory of the server's import root.",
      inputSchema: {
        type: "object",
        properties: {
          owner_id: OWNER_PROP,
          dir: { type: "string", description: "Directory relative to the import root. Defaults to '.'." },
        },
        required: ["owner_id"],
      },
    });
  }
  return tools;
}

/** Map anything thrown below the tool layer onto a JSON-RPC error. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof z.ZodError) {
    const issue = e.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    return new McpError(ErrorCode.InvalidParams, `${where}${issue?.message ?? "invalid arguments"}`);
  }
  if (isRagError(e)) {
    if (e.kind === "input") return new McpError(ErrorCode.InvalidParams, e.message);
    if (e.kind === "not_found") return new McpError(ErrorCode.InvalidRequest, e.message);
    return new McpError(ErrorCode.InternalError, e.message);
  }
  console.error("[RAG] Unexpected tool error:", e);
  return new McpError(ErrorCode.InternalError, describeError(e));
}

/** Run one tool against the service and return its JSON payload. */
export async function handleToolCall(
  service: NotesService,
  name: string,
  args: unknown,
): Promise<unknown> {
  switch (name) {
    case "upload_document": {
      const a = uploadArgs.parse(args ?? {});
      const bytes =
        a.content_base64 !== undefined
          ? Buffer.from(a.content_base64, "base64")
          : Buffer.from(a.text ?? "", "utf8");
      const { documentId, filename, outcome } = await service.uploadDocument(
        a.owner_id,
        a.filename,
        bytes,
      );
      return {
        document_id: documentId,
        filename,
        outcome: outcome.kind,
        chunk_count: "chunkCount" in outcome ? outcome.chunkCount : undefined,
        reason: outcome.kind === "failed" ? outcome.reason : undefined,
      };
    }
    case "delete_document": {
      const a = deleteArgs.parse(args ?? {});
      await service.deleteDocument(a.owner_id, a.document_id);
      return { deleted: a.document_id };
    }
    case "ask": {
      const a = askArgs.parse(args ?? {});
      const passages = await service.ask(a.owner_id, a.query, a.top_k);
      return {
        passages: passages.map((p) => ({
          document_id: p.documentId,
          filename: p.filename,
          sequence: p.sequence,
          score: Number(p.score.toFixed(4)),
          text: p.text,
          offset: p.offset,
          length: p.length,
        })),
      };
    }
    case "list_documents": {
      const a = listArgs.parse(args ?? {});
      return {
        documents: service.listDocuments(a.owner_id).map((d) => ({
          document_id: d.documentId,
          filename: d.filename,
          status: d.status,
          chunk_count: d.chunkCount,
          ingested_at: d.ingestedAt,
          reason: d.reason,
        })),
      };
    }
    case "import_directory": {
      if (!service.importRoot) break;
      const a = importArgs.parse(args ?? {});
      return { results: await service.importDirectory(a.owner_id, a.dir) };
    }
  }
  throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
}

/**
 * Fresh MCP server bound to the shared service. One is created per transport
 * session; all of them close over the same index.
 */
export function createServer(service: NotesService, maxTopK: number): Server {
  const server = new Server(
    { name: "notes-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions(maxTopK, service.importRoot !== undefined),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    try {
      const payload = await handleToolCall(service, req.params.name, req.params.arguments);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
        toolResult: payload,
      };
    } catch (e) {
      throw toMcpError(e);
    }
  });

  return server;
}
