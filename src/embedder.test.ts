import { describe, expect, it } from "vitest";
import { Embedder, PROBE_TEXT, l2Normalize } from "./embedder";
import { DimensionMismatchError, EmbeddingServiceError } from "./errors";
import { FRUIT_VOCABULARY, FakeModelService } from "./test-helpers";
import type { ModelService } from "./types";

function norm(v: Float32Array): number {
  let s = 0;
  for (const x of v) s += x * x;
  return Math.sqrt(s);
}

function serviceReturning(vector: number[] | (() => never)): ModelService {
  return {
    embed: async () => (typeof vector === "function" ? vector() : vector),
    tokenize: async () => [],
    complete: async () => "",
  };
}

describe("l2Normalize", () => {
  it("scales to unit length in place", () => {
    const v = new Float32Array([3, 4]);
    const out = l2Normalize(v);
    expect(out).toBe(v);
    expect(v[0]).toBeCloseTo(0.6, 6);
    expect(v[1]).toBeCloseTo(0.8, 6);
  });

  it("leaves a zero vector untouched", () => {
    expect(Array.from(l2Normalize(new Float32Array(3)))).toEqual([0, 0, 0]);
  });
});

describe("Embedder", () => {
  it("returns unit-norm vectors for non-zero input", async () => {
    const embedder = new Embedder(new FakeModelService(FRUIT_VOCABULARY));
    for (const text of ["Apples are red.", "what color are bananas", "yellow yellow red"]) {
      expect(norm(await embedder.embed(text))).toBeCloseTo(1, 6);
    }
  });

  it("establishes the dimension from the probe text", async () => {
    const service = new FakeModelService(FRUIT_VOCABULARY);
    const embedder = new Embedder(service);
    expect(embedder.dimension).toBeNull();
    expect(await embedder.probe()).toBe(FRUIT_VOCABULARY.length);
    expect(embedder.dimension).toBe(FRUIT_VOCABULARY.length);
    expect(service.calls.embed).toBe(1);
    expect(PROBE_TEXT).toBe("Apples are red.");
  });

  it("fails with DimensionMismatchError when the service drifts", async () => {
    const embedder = new Embedder(new FakeModelService(FRUIT_VOCABULARY));
    embedder.establish(3);
    await expect(embedder.embed("apples")).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("refuses to re-establish a different dimension", () => {
    const embedder = new Embedder(new FakeModelService(FRUIT_VOCABULARY));
    embedder.establish(7);
    embedder.establish(7);
    expect(() => embedder.establish(8)).toThrow(DimensionMismatchError);
  });

  it("wraps arbitrary service failures in EmbeddingServiceError", async () => {
    const embedder = new Embedder(
      serviceReturning(() => {
        throw new TypeError("fetch failed");
      }),
    );
    const err = await embedder.embed("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    expect(err).toHaveProperty("message", "Embedding service failed: fetch failed");
  });

  it("rejects empty and non-finite vectors", async () => {
    await expect(new Embedder(serviceReturning([])).embed("x")).rejects.toBeInstanceOf(EmbeddingServiceError);
    await expect(new Embedder(serviceReturning([1, Number.NaN])).embed("x")).rejects.toBeInstanceOf(
      EmbeddingServiceError,
    );
  });
});
