import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceError } from "./errors";
import { IndexCache, hashDirectory } from "./index-cache";
import { Persistence } from "./persistence";
import { makeTempDir, writeFiles } from "./test-helpers";
import { VectorIndex } from "./vector-index";

describe("hashDirectory", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("is stable for unchanged content and sensitive to edits and renames", async () => {
    await writeFiles(root, { "a.txt": "alpha", "sub/b.txt": "beta" });
    const first = await hashDirectory(root);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
    expect(await hashDirectory(root)).toBe(first);

    await writeFiles(root, { "a.txt": "alpha!" });
    const edited = await hashDirectory(root);
    expect(edited).not.toBe(first);

    await fs.rename(path.join(root, "a.txt"), path.join(root, "c.txt"));
    expect(await hashDirectory(root)).not.toBe(edited);
  });

  it("rejects a missing directory", async () => {
    await expect(hashDirectory(path.join(root, "absent"))).rejects.toBeInstanceOf(SourceError);
  });

  it("rejects a path that is a file", async () => {
    await writeFiles(root, { "file.txt": "x" });
    await expect(hashDirectory(path.join(root, "file.txt"))).rejects.toBeInstanceOf(SourceError);
  });
});

describe("IndexCache", () => {
  let root: string;
  let dirA: string;
  let dirB: string;
  let store: Persistence;

  async function publish(marker: string): Promise<void> {
    await store.save({ index: new VectorIndex(2), documents: [], hashMarker: marker });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    dirA = path.join(root, "a");
    dirB = path.join(root, "b");
    await writeFiles(dirA, { "doc1.txt": "Apples are red." });
    await writeFiles(dirB, { "doc2.txt": "Bananas are yellow." });
    store = new Persistence(path.join(root, "store"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("asks for a build when no index exists", async () => {
    expect(await new IndexCache(store, [dirA]).decide()).toEqual({ action: "build", reason: "missing-index" });
  });

  it("asks for a build when the marker is gone", async () => {
    const manifest = await store.save({ index: new VectorIndex(2), documents: [], hashMarker: "x" });
    await fs.rm(path.join(store.directory, manifest.files.hashMarker));
    expect(await new IndexCache(store, [dirA]).decide()).toEqual({ action: "build", reason: "missing-marker" });
  });

  it("reuses the index while the directories are unchanged", async () => {
    const cache = new IndexCache(store, [dirA, dirB]);
    await publish(await cache.computeMarker());
    expect(await cache.decide()).toEqual({ action: "reuse" });
  });

  it("concatenates directory hashes in configuration order", async () => {
    const cache = new IndexCache(store, [dirA, dirB]);
    expect(await cache.computeMarker()).toBe((await hashDirectory(dirA)) + (await hashDirectory(dirB)));
  });

  it("detects a modified file", async () => {
    const cache = new IndexCache(store, [dirA, dirB]);
    await publish(await cache.computeMarker());
    await writeFiles(dirB, { "doc2.txt": "Bananas are green." });
    expect(await cache.decide()).toEqual({ action: "build", reason: "hash-mismatch" });
  });

  it("detects a removed file", async () => {
    const cache = new IndexCache(store, [dirA, dirB]);
    await publish(await cache.computeMarker());
    await fs.rm(path.join(dirA, "doc1.txt"));
    expect(await cache.decide()).toEqual({ action: "build", reason: "hash-mismatch" });
  });

  it("does not notice a directory dropped from the configuration", async () => {
    await publish(await new IndexCache(store, [dirA, dirB]).computeMarker());
    expect(await new IndexCache(store, [dirB]).decide()).toEqual({ action: "reuse" });
  });

  it("reuses the index when no directories are configured", async () => {
    await publish("");
    expect(await new IndexCache(store, []).decide()).toEqual({ action: "reuse" });
  });
});
