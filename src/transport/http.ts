/**
 * Streamable HTTP transport.
 *
 * Each session (identified by the `mcp-session-id` header) owns its own MCP
 * Server + transport pair; all servers share the one NotesService.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests. A request without a session header must be `initialize`.
 *  - GET  /mcp    : follow-up stream for an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : readiness, corpus size and ingestion counters.
 *
 * Environment:
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1), ALLOWED_HOSTS (comma list of
 *  host[:port]), ENABLE_DNS_REBINDING_PROTECTION ("false" disables; on by default).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" && header ? header : undefined;
}

/**
 * Start the Express app and resolve once it is listening.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 */
export async function startHttpTransport(createServer: () => Server): Promise<void> {
  const app = express();
  // Base64 PDFs arrive in the JSON body.
  app.use(express.json({ limit: process.env.MCP_BODY_LIMIT ?? "25mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
          allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean),
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[HTTP] Failed to close session server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[HTTP] POST /mcp error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp: valid only for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[HTTP] ${req.method} /mcp error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[HTTP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
