import { DimensionMismatchError, EmbeddingServiceError, describe } from "./errors";
import type { ModelService } from "./types";

/** Deterministic input used to discover the model's output dimension at build start. */
export const PROBE_TEXT = "Apples are red.";

/**
 * Scale a vector to unit L2 norm in place. A zero vector is left untouched
 * (there is no direction to preserve).
 *
 * @returns The same array, for chaining.
 */
export function l2Normalize(vec: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < vec.length; i++) sum += vec[i] * vec[i];
  const norm = Math.sqrt(sum);
  if (norm === 0) return vec;
  for (let i = 0; i < vec.length; i++) vec[i] /= norm;
  return vec;
}

/**
 * Turns text into unit-length vectors through an external {@link ModelService},
 * guarding the dimension agreed for the current index. Unit length makes the
 * index's inner product equal to cosine similarity.
 */
export class Embedder {
  private dim: number | null = null;

  public constructor(private readonly service: ModelService) {}

  /** Dimension established for the current index, or null before {@link probe}/{@link establish}. */
  public get dimension(): number | null {
    return this.dim;
  }

  /**
   * Embed {@link PROBE_TEXT} and adopt its length as the index dimension.
   * Called once per build, before the index is created.
   */
  public async probe(): Promise<number> {
    const vec = await this.raw(PROBE_TEXT);
    this.dim = vec.length;
    return this.dim;
  }

  /**
   * Adopt the dimension of an index loaded from disk.
   * @throws {DimensionMismatchError} if a different dimension was already established.
   */
  public establish(dimension: number): void {
    if (this.dim !== null && this.dim !== dimension) {
      throw new DimensionMismatchError(this.dim, dimension);
    }
    this.dim = dimension;
  }

  /**
   * One service call, then in-place L2 normalization.
   *
   * @throws {EmbeddingServiceError} service unreachable or returned something that is not a vector.
   * @throws {DimensionMismatchError} result length differs from the established dimension.
   */
  public async embed(text: string): Promise<Float32Array> {
    const vec = await this.raw(text);
    if (this.dim !== null && vec.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, vec.length);
    }
    return l2Normalize(vec);
  }

  private async raw(text: string): Promise<Float32Array> {
    let values: number[];
    try {
      values = await this.service.embed(text);
    } catch (e) {
      if (e instanceof EmbeddingServiceError) throw e;
      throw new EmbeddingServiceError(`Embedding service failed: ${describe(e)}`, { cause: e });
    }
    if (values.length === 0 || !values.every(Number.isFinite)) {
      throw new EmbeddingServiceError("Embedding service returned an empty or non-finite vector");
    }
    return Float32Array.from(values);
  }
}
