import { describe, expect, it } from "vitest";
import { Chunker, DEFAULT_CHUNK_OVERLAP, effectiveChunkLength } from "./chunker";
import { ConfigError } from "./errors";
import { drain } from "./test-helpers";

/** Length of the longest suffix of `prev` that is also a prefix of `next`. */
function sharedSpan(prev: string, next: string): number {
  for (let k = Math.min(prev.length, next.length); k > 0; k--) {
    if (prev.endsWith(next.slice(0, k))) return k;
  }
  return 0;
}

describe("effectiveChunkLength", () => {
  it("uses the configured length when positive and below the model maximum", () => {
    expect(effectiveChunkLength(50, 512)).toBe(50);
  });

  it("falls back to the model maximum otherwise", () => {
    expect(effectiveChunkLength(0, 512)).toBe(512);
    expect(effectiveChunkLength(-1, 512)).toBe(512);
    expect(effectiveChunkLength(512, 512)).toBe(512);
    expect(effectiveChunkLength(4096, 512)).toBe(512);
  });
});

describe("Chunker", () => {
  it("yields a short text as exactly one chunk", async () => {
    const chunker = new Chunker({ chunkLength: 50 });
    expect(await drain(chunker.split("Apples are red."))).toEqual(["Apples are red."]);
    expect(await drain(chunker.split("  Apples are red.\n"))).toEqual(["Apples are red."]);
  });

  it("yields nothing for blank text", async () => {
    const chunker = new Chunker({ chunkLength: 50 });
    expect(await drain(chunker.split(""))).toEqual([]);
    expect(await drain(chunker.split("  \n\n \t"))).toEqual([]);
  });

  it("keeps every chunk within the limit and overlaps consecutive chunks", async () => {
    const text = Array.from({ length: 60 }, (_, i) => `word${i}`).join(" ");
    const chunker = new Chunker({ chunkLength: 100 });
    const chunks = await drain(chunker.split(text));

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeGreaterThan(0);
      expect(chunk.length).toBeLessThanOrEqual(100);
    }
    for (let i = 1; i < chunks.length; i++) {
      // One space separates the pieces.
      expect(sharedSpan(chunks[i - 1], chunks[i])).toBe(DEFAULT_CHUNK_OVERLAP - 1);
    }
    expect(chunks[0].startsWith("word0 word1")).toBe(true);
    expect(chunks[chunks.length - 1].endsWith("word59")).toBe(true);
  });

  it("carries the overlap across sentence boundaries in prose", async () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about fruit and color. `).join("");
    const chunker = new Chunker({ chunkLength: 100 });
    const chunks = await drain(chunker.split(text));

    expect(chunks.length).toBeGreaterThan(10);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(100);
    for (let i = 1; i < chunks.length; i++) {
      const span = sharedSpan(chunks[i - 1], chunks[i]);
      expect(span).toBeGreaterThanOrEqual(DEFAULT_CHUNK_OVERLAP - 2);
      expect(span).toBeLessThanOrEqual(DEFAULT_CHUNK_OVERLAP + 2);
    }
    expect(chunks[0]).toBe("Sentence number 0 talks about fruit and color");
    expect(chunks[1]).toBe("e number 0 talks about fruit and color. Sentence number 1 talks about fruit and color");
  });

  it("splits on paragraph boundaries before anything finer", async () => {
    const first = "Apples grow on trees in the orchard beside the old barn.";
    const second = "Bananas ripen in bunches under the warm tropical sun.";
    const text = `${first}\n\n${second}`;
    const chunker = new Chunker({ chunkLength: 100 });
    expect(await drain(chunker.split(text))).toEqual([
      first,
      text.slice(text.indexOf(second) - DEFAULT_CHUNK_OVERLAP),
    ]);
  });

  it("hard-cuts a run of characters with no separators", async () => {
    const chunker = new Chunker({ chunkLength: 50 });
    const chunks = await drain(chunker.split("x".repeat(180)));
    expect(chunks.length).toBeGreaterThan(3);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(50);
  });

  it("defaults to a 40 character overlap", () => {
    expect(new Chunker({ chunkLength: 100 }).overlap).toBe(DEFAULT_CHUNK_OVERLAP);
  });

  it("shrinks the overlap when it would not fit inside a chunk", () => {
    expect(new Chunker({ chunkLength: 30 }).overlap).toBe(4);
  });

  it("rejects a non-positive chunk length", () => {
    expect(() => new Chunker({ chunkLength: 0 })).toThrow(ConfigError);
  });
});
