import readline from "node:readline";
import { Command, InvalidArgumentError } from "commander";
import { APP_VERSION, type RagConfig } from "./config";
import { Embedder } from "./embedder";
import { createIndexer } from "./indexer";
import { LlamafileClient } from "./llamafile";
import { Persistence } from "./persistence";
import { QueryEngine } from "./query-engine";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import type { ModelService } from "./types";

export const QUERY_PROMPT = "Enter query (ctrl-d to quit):> ";

function parseTopK(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

/**
 * Load the persisted index and wire a query engine over it.
 * @throws {IndexNotFoundError} before any session starts when nothing was built.
 */
async function openEngine(config: RagConfig, service: ModelService, topK: number): Promise<QueryEngine> {
  const store = new Persistence(config.saveDir, config.verbose);
  const { index, documents } = await store.load();
  console.error(`[RAG] Index with ${index.size} entries loaded from ${store.directory}`);
  return new QueryEngine({ index, documents, embedder: new Embedder(service), service, topK });
}

/**
 * Command tree:
 *  docs-rag [-k n]   build-or-reuse the index, then the interactive query loop
 *  docs-rag build    build-or-reuse only
 *  docs-rag serve    build-or-reuse, then an MCP server (stdio or HTTP)
 */
export function buildCli(config: RagConfig, service: ModelService = LlamafileClient.fromConfig(config)): Command {
  const program = new Command();

  program
    .name("docs-rag")
    .description("Index web pages and local text/PDF files, then answer questions against them")
    .version(APP_VERSION)
    .option("-k, --k-search-results <n>", "Number of search results to add to the prompt.", parseTopK, config.topK)
    .action(async (opts: { kSearchResults: number }) => {
      // Phase 1: resolve or build the index. Phase 2: query loop.
      await createIndexer(config, service).resolve();
      const engine = await openEngine(config, service, opts.kSearchResults);

      statusManager.markTransport("repl");
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        terminal: process.stdin.isTTY,
      });
      rl.setPrompt(QUERY_PROMPT);
      try {
        await engine.run(rl, { prompt: () => rl.prompt() });
      } finally {
        rl.close();
      }
    });

  program
    .command("build")
    .description("Build the index if it is missing or stale, then exit")
    .action(async () => {
      const report = await createIndexer(config, service).resolve();
      if (report.rebuilt) {
        console.error(
          `[RAG] Built ${report.entries} entries from ${report.sourcesIndexed} source(s); ${report.sourcesSkipped} skipped`,
        );
      }
    });

  program
    .command("serve")
    .description("Build the index if needed, then expose it as an MCP server")
    .action(async () => {
      await createIndexer(config, service).resolve();
      const engine = await openEngine(config, service, config.topK);
      const factory = () => createServer(engine, config.topK);
      if (config.transport === "http") {
        await startHttpTransport(factory, { port: config.httpPort, host: config.httpHost });
      } else {
        await startStdioTransport(factory);
      }
    });

  return program;
}
