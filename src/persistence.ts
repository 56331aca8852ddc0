import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { z } from "zod";
import { IndexCorruptError, IndexNotFoundError, describe, isNotFound } from "./errors";
import { VectorIndex } from "./vector-index";

const MANIFEST_FILE = "manifest.json";
// Artifacts of every generation; anything not named by the live manifest is stale.
const ARTIFACT_PATTERNS = ["index-*.bin", "documents-*.json", "last_hash-*.txt", `${MANIFEST_FILE}.*.tmp`];

const manifestSchema = z.object({
  version: z.literal(1),
  generation: z.string().min(1),
  dimension: z.number().int().positive(),
  entries: z.number().int().nonnegative(),
  savedAt: z.string(),
  files: z.object({
    index: z.string().min(1),
    documents: z.string().min(1),
    hashMarker: z.string().min(1),
  }),
});

const documentsSchema = z.array(z.string());

/** Pointer file published last; names the artifacts of the current generation. */
export type Manifest = z.infer<typeof manifestSchema>;

/** Parameters for {@link Persistence.save}. `documents[i]` is the chunk embedded as vector i. */
export interface SaveParams {
  index: VectorIndex;
  documents: readonly string[];
  /** Concatenated per-directory content hashes (see IndexCache). */
  hashMarker: string;
}

/** Index plus its parallel chunk texts, as read back from disk. */
export interface StoredIndex {
  index: VectorIndex;
  documents: string[];
  manifest: Manifest;
}

/**
 * Persistence for the three index artifacts (vector index binary, ordered
 * document list, hash marker) under one save directory.
 *
 * Each save writes a fresh generation of artifacts and then publishes them
 * together by atomically replacing `manifest.json` (write temp file, rename).
 * A crash before the rename leaves the previous generation live; readers only
 * ever see artifacts the manifest names. Concurrent writers are unsupported.
 */
export class Persistence {
  /** Filesystem directory holding the artifacts. */
  private readonly saveDir: string;
  private readonly verbose: boolean;

  /**
   * @param saveDir Directory for the persisted artifacts (created on first save).
   * @param verbose Whether to emit verbose logging.
   */
  public constructor(saveDir: string, verbose = false) {
    this.saveDir = path.resolve(saveDir);
    this.verbose = verbose;
  }

  public get directory(): string {
    return this.saveDir;
  }

  /** Whether a published index exists. */
  public exists(): boolean {
    return fsSync.existsSync(path.join(this.saveDir, MANIFEST_FILE));
  }

  /**
   * Persist index, documents and hash marker as one generation.
   * @throws {IndexCorruptError} if the index and document list are misaligned.
   */
  public async save(params: SaveParams): Promise<Manifest> {
    const { index, documents, hashMarker } = params;
    if (index.size !== documents.length) {
      throw new IndexCorruptError(
        `Refusing to persist misaligned index: ${index.size} vectors vs ${documents.length} documents`,
      );
    }
    await fs.mkdir(this.saveDir, { recursive: true });

    const generation = `${Date.now().toString(36)}-${randomUUID().slice(0, 8)}`;
    const manifest: Manifest = {
      version: 1,
      generation,
      dimension: index.dimension,
      entries: index.size,
      savedAt: new Date().toISOString(),
      files: {
        index: `index-${generation}.bin`,
        documents: `documents-${generation}.json`,
        hashMarker: `last_hash-${generation}.txt`,
      },
    };

    await fs.writeFile(this.resolve(manifest.files.index), index.serialize());
    await fs.writeFile(this.resolve(manifest.files.documents), JSON.stringify(documents), "utf8");
    await fs.writeFile(this.resolve(manifest.files.hashMarker), hashMarker, "utf8");

    const tmp = this.resolve(`${MANIFEST_FILE}.${process.pid}.tmp`);
    await fs.writeFile(tmp, JSON.stringify(manifest, null, 2), "utf8");
    await fs.rename(tmp, this.resolve(MANIFEST_FILE));
    if (this.verbose) console.error(`[RAG][verbose] Published generation ${generation} in ${this.saveDir}`);

    await this.removeStale(manifest);
    return manifest;
  }

  /**
   * Load the published index and its documents.
   *
   * @throws {IndexNotFoundError} when nothing has been published.
   * @throws {IndexCorruptError} when an artifact is missing or unreadable, or counts disagree.
   */
  public async load(): Promise<StoredIndex> {
    const manifest = await this.readManifest();
    if (!manifest) throw new IndexNotFoundError(this.saveDir);

    const index = VectorIndex.deserialize(await this.readArtifact(manifest.files.index));

    const rawDocs = (await this.readArtifact(manifest.files.documents)).toString("utf8");
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(rawDocs);
    } catch (e) {
      throw new IndexCorruptError(`Document list is not valid JSON: ${describe(e)}`, { cause: e });
    }
    const docs = documentsSchema.safeParse(parsedJson);
    if (!docs.success) throw new IndexCorruptError("Document list is not an array of strings");
    const documents = docs.data;

    if (index.size !== documents.length || index.size !== manifest.entries) {
      throw new IndexCorruptError(
        `Index/document mismatch: ${index.size} vectors, ${documents.length} documents, manifest says ${manifest.entries}`,
      );
    }
    if (index.dimension !== manifest.dimension) {
      throw new IndexCorruptError(
        `Index dimension ${index.dimension} disagrees with manifest dimension ${manifest.dimension}`,
      );
    }
    return { index, documents, manifest };
  }

  /** Content of the live hash marker, or null when there is none. */
  public async readHashMarker(): Promise<string | null> {
    const manifest = await this.readManifest();
    if (!manifest) return null;
    try {
      return await fs.readFile(this.resolve(manifest.files.hashMarker), "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  /**
   * Parsed manifest, or null when none is published.
   * @throws {IndexCorruptError} if the manifest exists but cannot be parsed.
   */
  public async readManifest(): Promise<Manifest | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.resolve(MANIFEST_FILE), "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new IndexCorruptError(`Manifest is not valid JSON: ${describe(e)}`, { cause: e });
    }
    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) throw new IndexCorruptError(`Invalid manifest: ${parsed.error.message}`);
    return parsed.data;
  }

  private resolve(file: string): string {
    return path.join(this.saveDir, file);
  }

  private async readArtifact(file: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(file));
    } catch (e) {
      if (isNotFound(e)) {
        throw new IndexCorruptError(`Index artifact ${file} is missing from ${this.saveDir}`, { cause: e });
      }
      throw e;
    }
  }

  private async removeStale(live: Manifest): Promise<void> {
    const keep = new Set(Object.values(live.files));
    const files = await fg(ARTIFACT_PATTERNS, { cwd: this.saveDir, onlyFiles: true, deep: 1 });
    for (const file of files) {
      if (keep.has(file)) continue;
      await fs.rm(this.resolve(file), { force: true });
      if (this.verbose) console.error(`[RAG][verbose] Removed stale artifact ${file}`);
    }
  }
}
