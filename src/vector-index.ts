import { DimensionMismatchError, IndexCorruptError } from "./errors";
import type { SearchHit } from "./types";

const MAGIC = "RAGX";
const FORMAT_VERSION = 1;
// magic(4) + version(u32) + dimension(u32) + count(u32)
const HEADER_BYTES = 16;

/**
 * Flat (exact, brute-force) inner-product index. Vectors are appended into a
 * single growable Float32Array; position i always refers to the i-th added
 * vector. Callers store unit vectors so scores are cosine similarities.
 */
export class VectorIndex {
  public readonly dimension: number;
  private data: Float32Array;
  private count = 0;

  public constructor(dimension: number, initialCapacity = 64) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Index dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.data = new Float32Array(dimension * Math.max(1, initialCapacity));
  }

  /** Number of stored vectors (N). */
  public get size(): number {
    return this.count;
  }

  /**
   * Append a vector; amortized O(1) (capacity doubles when full).
   * @returns Position assigned to the vector.
   */
  public add(vector: Float32Array): number {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
    const needed = (this.count + 1) * this.dimension;
    if (needed > this.data.length) {
      const grown = new Float32Array(Math.max(needed, this.data.length * 2));
      grown.set(this.data.subarray(0, this.count * this.dimension));
      this.data = grown;
    }
    this.data.set(vector, this.count * this.dimension);
    return this.count++;
  }

  /** Copy of the vector stored at `position`. */
  public vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      throw new RangeError(`Position ${position} out of range [0, ${this.count})`);
    }
    const start = position * this.dimension;
    return this.data.slice(start, start + this.dimension);
  }

  /**
   * Exact top-k by inner product, O(N·D). Scores are non-increasing; equal
   * scores keep insertion order. Returns min(k, N) hits, none for an empty index.
   */
  public search(query: Float32Array, k: number): SearchHit[] {
    if (query.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, query.length);
    }
    const limit = Math.min(Math.floor(k), this.count);
    if (!(limit > 0)) return [];

    const hits: SearchHit[] = [];
    const d = this.dimension;
    for (let i = 0; i < this.count; i++) {
      let dot = 0;
      const base = i * d;
      for (let j = 0; j < d; j++) dot += this.data[base + j] * query[j];
      hits.push({ position: i, score: dot });
    }
    hits.sort((a, b) => b.score - a.score || a.position - b.position);
    return hits.slice(0, limit);
  }

  /** Binary artifact: header followed by N·D little-endian float32 values. */
  public serialize(): Buffer {
    const values = this.count * this.dimension;
    const buf = Buffer.alloc(HEADER_BYTES + values * 4);
    buf.write(MAGIC, 0, "ascii");
    buf.writeUInt32LE(FORMAT_VERSION, 4);
    buf.writeUInt32LE(this.dimension, 8);
    buf.writeUInt32LE(this.count, 12);
    for (let i = 0; i < values; i++) buf.writeFloatLE(this.data[i], HEADER_BYTES + i * 4);
    return buf;
  }

  /** @throws {IndexCorruptError} on a bad header or a payload of the wrong size. */
  public static deserialize(buf: Buffer): VectorIndex {
    if (buf.length < HEADER_BYTES || buf.toString("ascii", 0, 4) !== MAGIC) {
      throw new IndexCorruptError("Index artifact has no valid header");
    }
    const version = buf.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new IndexCorruptError(`Unsupported index format version ${version}`);
    }
    const dimension = buf.readUInt32LE(8);
    const count = buf.readUInt32LE(12);
    if (dimension < 1) throw new IndexCorruptError("Index artifact declares dimension 0");
    const values = count * dimension;
    if (buf.length !== HEADER_BYTES + values * 4) {
      throw new IndexCorruptError(
        `Index artifact size mismatch: expected ${HEADER_BYTES + values * 4} bytes for ${count}x${dimension}, got ${buf.length}`,
      );
    }
    const index = new VectorIndex(dimension, count);
    for (let i = 0; i < values; i++) index.data[i] = buf.readFloatLE(HEADER_BYTES + i * 4);
    index.count = count;
    return index;
  }
}
