#!/usr/bin/env tsx
/**
 * Application entry point.
 *
 * 1. Load `.env` and turn the environment into one immutable RagConfig.
 * 2. Hand it to the command tree (see cli.ts): every command first decides
 *    whether the persisted index can be reused, rebuilds it if not, and only
 *    then serves queries (interactive loop or MCP server).
 *
 * ENVIRONMENT VARIABLES (all optional; see .env.example):
 *  - INDEX_TEXT_CHUNK_LEN     Chunk length in characters (0 = embedding model maximum).
 *  - EMBEDDING_MODEL_MAX_LEN  Embedding model input limit (default 512).
 *  - INDEX_URLS               Comma list of pages to ingest.
 *  - INDEX_LOCAL_DATA_DIRS    Comma list of directories to ingest (default local_data).
 *  - INDEX_SAVE_DIR           Where index artifacts live (default ./index-store).
 *  - LLAMAFILE_HOST           Host of the llamafile servers (default 127.0.0.1).
 *  - EMBEDDING_MODEL_PORT     Embedding server port (default 8081).
 *  - GENERATION_MODEL_PORT    Tokenize/completion server port (default 8080).
 *  - GENERATION_MAX_TOKENS    Completion length cap (default 256).
 *  - GENERATION_TEMPERATURE   Sampling temperature (default 0.2).
 *  - RAG_TOP_K                Default number of retrieved chunks (default 3).
 *  - VERBOSE                  '1'/'true'/... enables extra logging.
 *  - MCP_TRANSPORT            'stdio' (default) or 'http' for `serve`.
 *  - MCP_PORT, HOST           HTTP bind for `serve` (default 3000, 127.0.0.1).
 */
import process from "node:process";
import { buildCli } from "./cli";
import { loadConfig, loadEnvFile } from "./config";
import { describe } from "./errors";

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig(process.env);
  await buildCli(config).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`[RAG] ${describe(error)}`);
  if (error instanceof Error && error.stack && /^(1|true|yes|on)$/i.test(process.env.VERBOSE ?? "")) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});
