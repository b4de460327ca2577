import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve a single MCP session over stdin/stdout. Logging goes to stderr, so
 * nothing else may write to stdout while this is active.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  transport.onclose = () => console.error("[RAG] stdio transport closed");
  await server.connect(transport);
}
