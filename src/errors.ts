/**
 * Error classes shared by the build and query pipelines. Each failure class
 * gets its own name so callers (and the CLI's exit path) can branch with
 * `instanceof` rather than parsing messages.
 */

/** Thrown when an environment value cannot be turned into a usable setting. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Thrown when a configured local source cannot be enumerated or read. */
export class SourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceError";
  }
}

/** Embedding service unreachable, non-2xx, or returned something that is not a vector. */
export class EmbeddingServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

/** Tokenize / completion endpoint unreachable or returned a malformed payload. */
export class CompletionServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompletionServiceError";
  }
}

/**
 * A vector's dimensionality differs from the one the index was created with.
 * Always fatal: a flat index cannot mix dimensions.
 */
export class DimensionMismatchError extends Error {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: index expects ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** No persisted index at the configured save directory. */
export class IndexNotFoundError extends Error {
  constructor(saveDir: string) {
    super(`Index not found @ ${saveDir}. Run a build first.`);
    this.name = "IndexNotFoundError";
  }
}

/** Persisted artifacts are missing, unreadable, or disagree with each other. */
export class IndexCorruptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexCorruptError";
  }
}

/** Message of an unknown thrown value. */
export function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** True for a Node filesystem error raised because the path does not exist. */
export function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
