import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import type { QueryEngine } from "./query-engine";

const MAX_TOP_K = 50;

const ragQueryArgsSchema = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
  answer: z.boolean().optional(),
});

export interface RagQueryMatch {
  score: number;
  position: number;
  text: string;
}

export interface RagQueryResult {
  matches: RagQueryMatch[];
  prompt?: string;
  promptTokens?: number;
  answer?: string;
}

/**
 * Execute a `rag_query` tool call: retrieval only, or (default) retrieval
 * plus prompt assembly and completion.
 *
 * @throws {McpError} InvalidParams for a missing/empty query or an out-of-range top_k.
 */
export async function handleRagQuery(engine: QueryEngine, args: unknown): Promise<RagQueryResult> {
  const parsed = ragQueryArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid rag_query arguments: ${parsed.error.message}`);
  }
  const { query, top_k, answer = true } = parsed.data;

  if (!answer) {
    const results = await engine.retrieve(query, top_k);
    return { matches: results.map(toMatch) };
  }
  const turn = await engine.answer(query, top_k);
  return {
    matches: turn.results.map(toMatch),
    prompt: turn.prompt,
    promptTokens: turn.promptTokens,
    answer: turn.answer,
  };
}

function toMatch(r: { score: number; position: number; text: string }): RagQueryMatch {
  return { score: Number(r.score.toFixed(4)), position: r.position, text: r.text };
}

/**
 * Factory for an MCP Server exposing the loaded index. A fresh server is
 * created per transport session; the query engine is shared.
 *
 *  rag_query
 *    Input:  { query: string, top_k?: number, answer?: boolean }
 *    Output: JSON text { matches, prompt?, promptTokens?, answer? }
 */
export function createServer(engine: QueryEngine, defaultTopK: number): Server {
  const server = new Server({ name: "docs-rag", version: APP_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "rag_query",
          description:
            "Semantically search the indexed documents and answer the query with the generation model using the best matching chunks as context.",
          inputSchema: {
            type: "object",
            properties: {
              query: {
                type: "string",
                description: "Natural language question.",
              },
              top_k: {
                type: "number",
                description: `Number of chunks to retrieve (1-${MAX_TOP_K}). Defaults to ${defaultTopK}.`,
                minimum: 1,
                maximum: MAX_TOP_K,
              },
              answer: {
                type: "boolean",
                description: "Set false to return only the retrieved chunks without calling the model.",
              },
            },
            required: ["query"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    if (req.params.name !== "rag_query") {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
    }
    const result = await handleRagQuery(engine, req.params.arguments);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  });

  return server;
}
