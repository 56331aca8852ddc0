import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { ConfigError } from "./errors";

/** Characters shared by consecutive chunks of the same document. */
export const DEFAULT_CHUNK_OVERLAP = 40;

// Paragraph, line, sentence, word, then a hard character cut.
const SEPARATORS = ["\n\n", "\n", ". ", " ", ""];

/**
 * Chunk length actually used: the configured length when it is positive and
 * below the embedding model's maximum, otherwise the model maximum.
 */
export function effectiveChunkLength(chunkLength: number, modelMaxLength: number): number {
  return chunkLength > 0 && chunkLength < modelMaxLength ? chunkLength : modelMaxLength;
}

export interface ChunkerOptions {
  /** Hard upper bound (characters) for every chunk. */
  chunkLength: number;
  overlap?: number;
}

/**
 * Splits a document into bounded, overlapping segments, preferring semantic
 * boundaries before falling back to a hard cut.
 */
export class Chunker {
  public readonly chunkLength: number;
  public readonly overlap: number;
  private readonly splitter: RecursiveCharacterTextSplitter;

  public constructor(opts: ChunkerOptions) {
    if (!Number.isInteger(opts.chunkLength) || opts.chunkLength < 1) {
      throw new ConfigError(`Chunk length must be a positive integer, got ${opts.chunkLength}`);
    }
    this.chunkLength = opts.chunkLength;
    this.overlap = opts.overlap ?? DEFAULT_CHUNK_OVERLAP;
    // Overlap must stay below the chunk length for forward progress.
    if (this.overlap >= this.chunkLength) {
      const fallback = Math.max(0, Math.floor(this.chunkLength * 0.15));
      console.error(
        `[RAG] Chunk overlap (=${this.overlap}) >= chunk length (=${this.chunkLength}). Using fallback overlap ${fallback}.`,
      );
      this.overlap = fallback;
    }
    // Pieces are cut without overlap; split() re-attaches it from the source
    // text, since the splitter only carries whole pieces over.
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.chunkLength - this.overlap,
      chunkOverlap: 0,
      separators: SEPARATORS,
      keepSeparator: false,
    });
  }

  /**
   * Lazily yield the chunks of `text`. Every chunk is non-empty and at most
   * {@link chunkLength} characters; a blank text yields nothing and a text
   * that already fits yields exactly one chunk (trimmed). Each later chunk
   * starts with the {@link overlap} characters of source text preceding it,
   * so consecutive chunks share that span less the separator between them.
   */
  public async *split(text: string): AsyncGenerator<string> {
    const trimmed = text.trim();
    if (!trimmed) return;
    if (trimmed.length <= this.chunkLength) {
      yield trimmed;
      return;
    }

    const pieces = await this.splitter.splitText(text);
    let cursor = 0;
    let previous: string | null = null;
    for (const piece of pieces) {
      if (piece.length === 0) continue;
      const start = text.indexOf(piece, cursor);
      let chunk: string;
      if (previous === null) {
        chunk = piece;
      } else if (start >= 0) {
        chunk = text.slice(Math.max(0, start - this.overlap), start + piece.length);
      } else {
        // Collapsed separator runs leave the piece without a verbatim match.
        chunk = (this.overlap > 0 ? previous.slice(-this.overlap) : "") + piece;
      }
      if (start >= 0) cursor = start + piece.length;
      previous = piece;
      yield chunk;
    }
  }
}
