import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RagConfig } from "./config";
import type { ModelService } from "./types";

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * In-process stand-in for the llamafile servers. Embeddings are word counts
 * over a fixed vocabulary (one dimension per word), tokenization splits on
 * whitespace and completion returns a canned reply.
 */
export class FakeModelService implements ModelService {
  public readonly calls = { embed: 0, tokenize: 0, complete: 0 };
  public readonly prompts: string[] = [];

  public constructor(
    private readonly vocabulary: readonly string[],
    private readonly reply = "stub answer",
  ) {}

  public async embed(text: string): Promise<number[]> {
    this.calls.embed++;
    const vec = new Array<number>(this.vocabulary.length).fill(0);
    for (const w of words(text)) {
      const i = this.vocabulary.indexOf(w);
      if (i >= 0) vec[i] += 1;
    }
    return vec;
  }

  public async tokenize(text: string): Promise<number[]> {
    this.calls.tokenize++;
    return text
      .split(/\s+/)
      .filter(Boolean)
      .map((_, i) => i);
  }

  public async complete(prompt: string): Promise<string> {
    this.calls.complete++;
    this.prompts.push(prompt);
    return this.reply;
  }
}

export const FRUIT_VOCABULARY = ["apples", "are", "red", "bananas", "yellow", "what", "color"];

export async function makeTempDir(prefix = "docs-rag-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(dir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, "utf8");
  }
}

export function testConfig(overrides: Partial<RagConfig>): RagConfig {
  return {
    chunkLength: 50,
    embeddingMaxLength: 512,
    urls: [],
    localDirs: [],
    saveDir: path.join(os.tmpdir(), "docs-rag-unused"),
    llamafileHost: "127.0.0.1",
    embeddingPort: 8081,
    generationPort: 8080,
    maxTokens: 64,
    temperature: 0,
    topK: 3,
    verbose: false,
    transport: "stdio",
    httpPort: 3000,
    httpHost: "127.0.0.1",
    ...overrides,
  };
}

export async function drain<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of it) out.push(v);
  return out;
}

export async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}
