import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { statusManager } from "../status";

/**
 * Serve one MCP session over stdin/stdout. stdout belongs to the protocol
 * from here on; all logging stays on stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  statusManager.markTransport("stdio");
  await createServer().connect(new StdioServerTransport());
  console.error("[RAG] MCP server listening on stdio");
}
