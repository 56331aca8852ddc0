import { z } from "zod";
import type { RagConfig } from "./config";
import { CompletionServiceError, EmbeddingServiceError, describe } from "./errors";
import type { ModelService } from "./types";

// llama.cpp servers answer /embedding either flat or as a per-input list
// (pooled vector or one vector per token).
const embeddingResponseSchema = z.union([
  z.object({ embedding: z.array(z.number()) }),
  z
    .array(
      z.object({
        embedding: z.union([z.array(z.number()), z.array(z.array(z.number()))]),
      }),
    )
    .nonempty(),
]);

const tokenizeResponseSchema = z.object({ tokens: z.array(z.number()) });

const completionResponseSchema = z.object({ content: z.string() });

export interface LlamafileClientOptions {
  host: string;
  embeddingPort: number;
  generationPort: number;
  /** Completion length cap (`n_predict`). */
  maxTokens?: number;
  temperature?: number;
  verbose?: boolean;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

let requestSeq = 0;

function isMatrix(v: number[] | number[][]): v is number[][] {
  return Array.isArray(v[0]);
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return `${text.slice(0, maxLen)}…`;
}

/**
 * HTTP client for a llamafile (llama.cpp server) pair: one instance serving
 * embeddings, one serving tokenize + completion. No retries and no explicit
 * timeout beyond fetch's own; every call is a single round trip.
 */
export class LlamafileClient implements ModelService {
  private readonly embeddingUrl: string;
  private readonly generationUrl: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly verbose: boolean;
  private readonly fetchImpl: typeof fetch;

  public constructor(opts: LlamafileClientOptions) {
    this.embeddingUrl = `http://${opts.host}:${opts.embeddingPort}`;
    this.generationUrl = `http://${opts.host}:${opts.generationPort}`;
    this.maxTokens = opts.maxTokens ?? 256;
    this.temperature = opts.temperature ?? 0.2;
    this.verbose = !!opts.verbose;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  public static fromConfig(config: RagConfig, fetchImpl?: typeof fetch): LlamafileClient {
    return new LlamafileClient({
      host: config.llamafileHost,
      embeddingPort: config.embeddingPort,
      generationPort: config.generationPort,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      verbose: config.verbose,
      fetchImpl,
    });
  }

  /**
   * Raw (un-normalized) embedding for one input.
   * @throws {EmbeddingServiceError}
   */
  public async embed(text: string): Promise<number[]> {
    const fail = (message: string, cause?: unknown) => new EmbeddingServiceError(message, { cause });
    const data = await this.post(`${this.embeddingUrl}/embedding`, { content: text }, fail);
    const parsed = embeddingResponseSchema.safeParse(data);
    if (!parsed.success) throw fail(`Malformed embedding response: ${parsed.error.message}`);
    if (!Array.isArray(parsed.data)) return parsed.data.embedding;
    const [first] = parsed.data;
    return isMatrix(first.embedding) ? (first.embedding[0] ?? []) : first.embedding;
  }

  /** @throws {CompletionServiceError} */
  public async tokenize(text: string): Promise<number[]> {
    const fail = (message: string, cause?: unknown) => new CompletionServiceError(message, { cause });
    const data = await this.post(`${this.generationUrl}/tokenize`, { content: text }, fail);
    const parsed = tokenizeResponseSchema.safeParse(data);
    if (!parsed.success) throw fail(`Malformed tokenize response: ${parsed.error.message}`);
    return parsed.data.tokens;
  }

  /** @throws {CompletionServiceError} */
  public async complete(prompt: string): Promise<string> {
    const fail = (message: string, cause?: unknown) => new CompletionServiceError(message, { cause });
    const data = await this.post(
      `${this.generationUrl}/completion`,
      { prompt, n_predict: this.maxTokens, temperature: this.temperature, stream: false },
      fail,
    );
    const parsed = completionResponseSchema.safeParse(data);
    if (!parsed.success) throw fail(`Malformed completion response: ${parsed.error.message}`);
    return parsed.data.content.trim();
  }

  private async post(
    url: string,
    body: Record<string, unknown>,
    fail: (message: string, cause?: unknown) => Error,
  ): Promise<unknown> {
    const requestId = (requestSeq += 1);
    const startMs = Date.now();
    if (this.verbose) console.error(`[RAG][verbose] llamafile#${requestId} -> ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
      });
    } catch (e) {
      throw fail(`Request to ${url} failed: ${describe(e)}`, e);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw fail(
        `${url} answered HTTP ${response.status} ${response.statusText}${text ? `: ${truncate(text, 200)}` : ""}`,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (e) {
      throw fail(`${url} returned invalid JSON: ${describe(e)}`, e);
    }
    if (this.verbose) {
      console.error(`[RAG][verbose] llamafile#${requestId} <- ok (${Date.now() - startMs} ms)`);
    }
    return data;
  }
}
