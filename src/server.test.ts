import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { describe, expect, it } from "vitest";
import { Embedder } from "./embedder";
import { QueryEngine } from "./query-engine";
import { handleRagQuery } from "./server";
import { FRUIT_VOCABULARY, FakeModelService } from "./test-helpers";
import { VectorIndex } from "./vector-index";

async function setup(): Promise<{ engine: QueryEngine; service: FakeModelService }> {
  const service = new FakeModelService(FRUIT_VOCABULARY, "Yellow.");
  const embedder = new Embedder(service);
  const documents = ["Apples are red.", "Bananas are yellow."];
  const index = new VectorIndex(FRUIT_VOCABULARY.length);
  for (const doc of documents) index.add(await embedder.embed(doc));
  const engine = new QueryEngine({ index, documents, embedder, service, topK: 2, out: () => {} });
  return { engine, service };
}

describe("handleRagQuery", () => {
  it("retrieves and answers by default", async () => {
    const { engine, service } = await setup();
    const result = await handleRagQuery(engine, { query: "  what color are bananas  ", top_k: 1 });

    expect(result.matches).toEqual([{ score: 0.5774, position: 1, text: "Bananas are yellow." }]);
    expect(result.answer).toBe("Yellow.");
    expect(result.prompt).toBe(service.prompts[0]);
    expect(result.prompt?.endsWith("\nQuery: what color are bananas")).toBe(true);
    expect(result.promptTokens).toBe(25);
  });

  it("only retrieves when answer is false", async () => {
    const { engine, service } = await setup();
    const result = await handleRagQuery(engine, { query: "red apples", answer: false });

    expect(result).toEqual({
      matches: [
        { score: 0.8165, position: 0, text: "Apples are red." },
        { score: 0, position: 1, text: "Bananas are yellow." },
      ],
    });
    expect(service.calls.complete).toBe(0);
    expect(service.calls.tokenize).toBe(0);
  });

  it("rejects invalid arguments", async () => {
    const { engine } = await setup();
    await expect(handleRagQuery(engine, {})).rejects.toBeInstanceOf(McpError);
    await expect(handleRagQuery(engine, { query: "   " })).rejects.toBeInstanceOf(McpError);
    await expect(handleRagQuery(engine, { query: "ok", top_k: 0 })).rejects.toBeInstanceOf(McpError);
    await expect(handleRagQuery(engine, undefined)).rejects.toBeInstanceOf(McpError);
  });
});
