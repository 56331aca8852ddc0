import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import fg from "fast-glob";
import { SourceError, describe } from "./errors";
import type { Persistence } from "./persistence";

export type RebuildReason = "missing-index" | "missing-marker" | "hash-mismatch";

/** Outcome of the startup staleness check. */
export type CacheDecision = { action: "reuse" } | { action: "build"; reason: RebuildReason };

/**
 * SHA-256 content hash of a directory tree. Files are visited in sorted
 * relative-path order and each contributes the digest of its path and bytes,
 * so adding, removing, renaming or editing any file changes the result.
 *
 * @throws {SourceError} if `dir` is missing or not a directory.
 */
export async function hashDirectory(dir: string): Promise<string> {
  const abs = path.resolve(dir);
  const st = await fs.stat(abs).catch((e: unknown) => {
    throw new SourceError(`Local data directory ${abs} is not accessible: ${describe(e)}`, { cause: e });
  });
  if (!st.isDirectory()) throw new SourceError(`Local data path ${abs} is not a directory`);

  const files = (await fg("**/*", { cwd: abs, dot: true, onlyFiles: true })).sort();
  const digest = createHash("sha256");
  for (const rel of files) {
    const content = await fs.readFile(path.join(abs, rel));
    digest.update(createHash("sha256").update(rel).update("\0").update(content).digest("hex"));
  }
  return digest.digest("hex");
}

/**
 * Decides at startup whether the persisted index can be reused.
 *
 * Known limitation, kept deliberately: the marker is the concatenation of the
 * per-directory hashes with no delimiter, and a directory counts as unchanged
 * when its current hash occurs anywhere in that string. This is containment,
 * not equality over (directory, hash) pairs: dropping a directory from the
 * configuration is not noticed, and a hash that happens to be a substring of
 * the marker would be accepted.
 */
export class IndexCache {
  public constructor(
    private readonly store: Persistence,
    private readonly localDirs: readonly string[],
    private readonly verbose = false,
  ) {}

  /** Current hash of every configured directory, in configuration order. */
  public async computeHashes(): Promise<string[]> {
    const hashes: string[] = [];
    for (const dir of this.localDirs) hashes.push(await hashDirectory(dir));
    return hashes;
  }

  /** Marker content for the current directory state (hashes concatenated, no delimiter). */
  public async computeMarker(): Promise<string> {
    return (await this.computeHashes()).join("");
  }

  public async decide(): Promise<CacheDecision> {
    if (!this.store.exists()) {
      if (this.verbose) console.error(`[RAG][verbose] No index at ${this.store.directory}`);
      return { action: "build", reason: "missing-index" };
    }

    const marker = await this.store.readHashMarker();
    if (marker === null) {
      console.error("[RAG] Index dir hash file not found, rebuilding index");
      return { action: "build", reason: "missing-marker" };
    }

    const hashes = await this.computeHashes();
    for (let i = 0; i < hashes.length; i++) {
      if (!marker.includes(hashes[i])) {
        console.error(`[RAG] Index dir hash mismatch for ${this.localDirs[i]}, rebuilding index`);
        return { action: "build", reason: "hash-mismatch" };
      }
    }
    return { action: "reuse" };
  }
}
