/**
 * Streamable HTTP transport for the MCP server.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp without
 *    an `mcp-session-id` header; a new transport + Server pair is created and
 *    the SDK returns the generated session id in the response headers.
 *  - Every later request of that session carries the same header and is routed
 *    to the same transport. Closing the transport evicts the session.
 *
 * Endpoints:
 *  - POST /mcp    JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    Streaming channel of an existing session.
 *  - DELETE /mcp  Session teardown.
 *  - GET  /health Index status snapshot from `statusManager`.
 *
 * DNS rebinding protection is on, with allowed hosts limited to localhost and
 * the bind address.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
}

function sessionHeader(req: express.Request): string | undefined {
  const v = req.headers["mcp-session-id"];
  return typeof v === "string" ? v : undefined;
}

/**
 * Bind the Express app and serve MCP sessions until the process exits.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` per session.
 * @returns The bound listener, once listening. Port 0 picks a free port.
 */
export async function startHttpTransport(
  createServer: () => Server,
  { port, host }: HttpTransportOptions,
): Promise<HttpServer> {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  let boundPort = port;
  const allowedHosts = () =>
    Array.from(
      new Set([
        "127.0.0.1",
        `127.0.0.1:${boundPort}`,
        "localhost",
        `localhost:${boundPort}`,
        host,
        `${host}:${boundPort}`,
      ]),
    );

  /** Active session transports keyed by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports.set(sid, transport);
      },
      enableDnsRebindingProtection: true,
      allowedHosts: allowedHosts(),
    });
    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return;
      closing = true;
      if (transport.sessionId) transports.delete(transport.sessionId);
      // server.close() closes the transport again; detach first.
      transport.onclose = undefined;
      server.close().catch((e: unknown) => console.error("[RAG] Failed to close MCP session:", e));
    };
    await server.connect(transport);
    return transport;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionHeader(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
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
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET and DELETE are only valid for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionHeader(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  statusManager.markTransport("http");
  return new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      const address = listener.address();
      if (address && typeof address === "object") boundPort = address.port;
      console.error(`[RAG] Streamable HTTP listening at http://${host}:${boundPort}/mcp`);
      resolve(listener);
    });
  });
}
