import { Chunker, effectiveChunkLength } from "./chunker";
import type { RagConfig } from "./config";
import { Embedder } from "./embedder";
import { IndexCache, type RebuildReason } from "./index-cache";
import { Persistence } from "./persistence";
import type { PdfTextExtractor } from "./pdf-extractor";
import { SourceCollector } from "./sources";
import { statusManager } from "./status";
import type { ModelService } from "./types";
import { VectorIndex } from "./vector-index";

/**
 * Collaborators required to construct an {@link Indexer}. `sources` must
 * return a fresh collector on each call (collectors are single-use).
 */
export interface BuildIndexOptions {
  store: Persistence;
  cache: IndexCache;
  embedder: Embedder;
  chunker: Chunker;
  sources: () => SourceCollector;
  verbose?: boolean;
}

export interface BuildSummary {
  reason: RebuildReason;
  entries: number;
  dimension: number;
  sourcesIndexed: number;
  sourcesSkipped: number;
}

/** What startup did about the index: reused it, or rebuilt it. */
export type BuildReport = { rebuilt: false } | ({ rebuilt: true } & BuildSummary);

/**
 * Build phase: decides whether the persisted index is reusable and, if not,
 * streams SourceCollector → Chunker → Embedder → VectorIndex one source and
 * one chunk at a time, then persists index, documents and hash marker
 * together. Nothing is written unless the whole build succeeds.
 */
export class Indexer {
  private readonly store: Persistence;
  private readonly cache: IndexCache;
  private readonly embedder: Embedder;
  private readonly chunker: Chunker;
  private readonly sources: () => SourceCollector;
  private readonly verbose: boolean;

  public constructor(opts: BuildIndexOptions) {
    this.store = opts.store;
    this.cache = opts.cache;
    this.embedder = opts.embedder;
    this.chunker = opts.chunker;
    this.sources = opts.sources;
    this.verbose = !!opts.verbose;
  }

  /** Reuse the persisted index when the cache allows it, otherwise rebuild. */
  public async resolve(): Promise<BuildReport> {
    statusManager.setSaveDir(this.store.directory);
    const decision = await this.cache.decide();
    if (decision.action === "reuse") {
      const manifest = await this.store.readManifest();
      console.error(`[RAG] Index already exists at ${this.store.directory}, skipping build`);
      statusManager.markReady(false, manifest?.entries ?? 0);
      return { rebuilt: false };
    }
    return { rebuilt: true, ...(await this.build(decision.reason)) };
  }

  /**
   * Unconditional full build.
   *
   * Embedding failures, dimension drift and local source errors abort the
   * build before anything is persisted; skipped URLs do not.
   */
  public async build(reason: RebuildReason = "missing-index"): Promise<BuildSummary> {
    statusManager.beginBuild();
    const dimension = await this.embedder.probe();
    const index = new VectorIndex(dimension);
    const documents: string[] = [];
    console.error(`[RAG] Building index (dimension ${dimension}, chunk length ${this.chunker.chunkLength})...`);

    const collector = this.sources();
    let sourcesIndexed = 0;
    for await (const doc of collector.documents()) {
      let chunks = 0;
      for await (const chunk of this.chunker.split(doc.text)) {
        index.add(await this.embedder.embed(chunk));
        documents.push(chunk);
        statusManager.incEmbedded();
        chunks++;
      }
      sourcesIndexed++;
      statusManager.incSources();
      if (this.verbose) console.error(`[RAG][verbose] ${doc.origin}: ${chunks} chunk(s)`);
    }
    statusManager.setSkipped(collector.skipped.length);

    const hashMarker = await this.cache.computeMarker();
    await this.store.save({ index, documents, hashMarker });
    console.error(`[RAG] Index with ${index.size} entries saved to ${this.store.directory}`);
    statusManager.markReady(true, index.size);

    return {
      reason,
      entries: index.size,
      dimension,
      sourcesIndexed,
      sourcesSkipped: collector.skipped.length,
    };
  }
}

/** Test seams for {@link createIndexer}. */
export interface IndexerOverrides {
  fetchImpl?: typeof fetch;
  pdf?: PdfTextExtractor;
}

/** Wire an {@link Indexer} and its collaborators from configuration. */
export function createIndexer(
  config: RagConfig,
  service: ModelService,
  overrides: IndexerOverrides = {},
): Indexer {
  const store = new Persistence(config.saveDir, config.verbose);
  return new Indexer({
    store,
    cache: new IndexCache(store, config.localDirs, config.verbose),
    embedder: new Embedder(service),
    chunker: new Chunker({
      chunkLength: effectiveChunkLength(config.chunkLength, config.embeddingMaxLength),
    }),
    sources: () =>
      new SourceCollector({
        urls: config.urls,
        localDirs: config.localDirs,
        fetchImpl: overrides.fetchImpl,
        pdf: overrides.pdf,
        verbose: config.verbose,
      }),
    verbose: config.verbose,
  });
}
