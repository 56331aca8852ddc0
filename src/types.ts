/**
 * Shared document / retrieval types used across the build and query layers.
 */

/** Text extracted from one source, consumed immediately by the chunker. */
export interface RawDocument {
  /** URL or absolute file path the text came from. */
  readonly origin: string;
  /** Full extracted text. */
  readonly text: string;
}

/** One ranked hit from a vector search. */
export interface SearchHit {
  /** Insertion position inside the index (and the parallel document list). */
  readonly position: number;
  /** Inner product with the query; equals cosine similarity for unit vectors. */
  readonly score: number;
}

/** A search hit joined with the chunk text stored at the same position. */
export interface RetrievedChunk extends SearchHit {
  readonly text: string;
}

/**
 * Black-box model service the pipeline talks to: one embedding endpoint, a
 * tokenizer used for prompt-length reporting, and a completion endpoint.
 */
export interface ModelService {
  embed(text: string): Promise<number[]>;
  tokenize(text: string): Promise<number[]>;
  complete(prompt: string): Promise<string>;
}
