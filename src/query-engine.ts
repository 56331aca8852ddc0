import type { Embedder } from "./embedder";
import { DimensionMismatchError, IndexCorruptError, describe } from "./errors";
import type { ModelService, RetrievedChunk } from "./types";
import type { VectorIndex } from "./vector-index";

export const DEFAULT_TOP_K = 3;
/** Characters of each hit shown in the results listing. */
export const PREVIEW_LENGTH = 100;
export const SEPARATOR = "-".repeat(80);
export const NO_RESULTS = "No results found.";

/** Everything produced by one query turn. */
export interface QueryTurn {
  query: string;
  results: RetrievedChunk[];
  prompt: string;
  promptTokens: number;
  answer: string;
}

/**
 * Fixed prompt template: instruction, retrieved chunks (newline-joined, in
 * the order given), then the literal query. No hits means an empty context block.
 */
export function buildPrompt(contexts: readonly string[], query: string): string {
  return (
    "You are an expert Q&A system. Answer the user's query using the provided context information.\n" +
    "Context information:\n" +
    `${contexts.join("\n")}\n` +
    `Query: ${query}`
  );
}

/** One line per hit (`0.1234 - "preview"`), or {@link NO_RESULTS}. */
export function renderResults(results: readonly RetrievedChunk[]): string[] {
  if (results.length === 0) return [NO_RESULTS];
  return results.map((r) => `${r.score.toFixed(4)} - "${r.text.slice(0, PREVIEW_LENGTH)}"`);
}

export interface QueryEngineOptions {
  index: VectorIndex;
  /** Chunk texts; `documents[i]` belongs to vector i. */
  documents: readonly string[];
  embedder: Embedder;
  service: ModelService;
  topK?: number;
  /** Line sink for the rendered turn; defaults to stdout. */
  out?: (line: string) => void;
}

export interface RunOptions {
  /** Called before waiting for each line (e.g. to redraw a readline prompt). */
  prompt?: () => void;
}

/**
 * Query side of the pipeline. Holds a loaded index read-only; a failed turn
 * never touches index state.
 */
export class QueryEngine {
  private readonly index: VectorIndex;
  private readonly documents: readonly string[];
  private readonly embedder: Embedder;
  private readonly service: ModelService;
  private readonly topK: number;
  private readonly out: (line: string) => void;

  public constructor(opts: QueryEngineOptions) {
    if (opts.index.size !== opts.documents.length) {
      throw new IndexCorruptError(
        `Index has ${opts.index.size} vectors but ${opts.documents.length} documents`,
      );
    }
    this.index = opts.index;
    this.documents = opts.documents;
    this.embedder = opts.embedder;
    this.embedder.establish(opts.index.dimension);
    this.service = opts.service;
    this.topK = opts.topK ?? DEFAULT_TOP_K;
    this.out = opts.out ?? ((line) => process.stdout.write(`${line}\n`));
  }

  /** Embed the query and return the top-k chunks, best first. */
  public async retrieve(query: string, k = this.topK): Promise<RetrievedChunk[]> {
    const emb = await this.embedder.embed(query);
    return this.index
      .search(emb, k)
      .map((hit) => ({ ...hit, text: this.documents[hit.position] }));
  }

  /** Full turn without rendering. */
  public async answer(query: string, k = this.topK): Promise<QueryTurn> {
    return this.turn(query, k, () => {});
  }

  /** Full turn, rendering each stage to the output sink as it completes. */
  public async ask(query: string, k = this.topK): Promise<QueryTurn> {
    return this.turn(query, k, this.out);
  }

  /**
   * Read queries until the input ends. Blank lines are ignored. A failing
   * turn is reported and the loop continues with the next line; a dimension
   * mismatch ends the session.
   *
   * @returns Number of turns answered.
   */
  public async run(lines: AsyncIterable<string>, opts: RunOptions = {}): Promise<number> {
    let answered = 0;
    opts.prompt?.();
    for await (const line of lines) {
      const query = line.trim();
      if (query) {
        try {
          await this.ask(query);
          answered++;
        } catch (e) {
          if (e instanceof DimensionMismatchError) throw e;
          console.error(`[RAG] Query failed: ${describe(e)}`);
          this.out(SEPARATOR);
        }
      }
      opts.prompt?.();
    }
    return answered;
  }

  private async turn(query: string, k: number, emit: (line: string) => void): Promise<QueryTurn> {
    emit("=== Query ===");
    emit(query);
    emit("");

    const results = await this.retrieve(query, k);
    emit("=== Search Results ===");
    for (const line of renderResults(results)) emit(line);
    emit("");

    const prompt = buildPrompt(
      results.map((r) => r.text),
      query,
    );
    emit("=== Prompt ===");
    emit(`"${prompt}"`);
    const promptTokens = (await this.service.tokenize(prompt)).length;
    emit(`(prompt_ntokens: ${promptTokens})`);
    emit("");

    const answer = await this.service.complete(prompt);
    emit("=== Answer ===");
    emit(`"${answer}"`);
    emit("");
    emit(SEPARATOR);

    return { query, results, prompt, promptTokens, answer };
  }
}
