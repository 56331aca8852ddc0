import { APP_VERSION } from "./config";

/**
 * Aggregated counters for the most recent build. Reset at the start of
 * every build; monotonic while it runs.
 */
export interface BuildStatus {
  /** Documents handed to the chunker (URLs fetched + local files read). */
  sourcesCollected: number;
  /** URLs skipped after a fetch or extraction failure. */
  sourcesSkipped: number;
  /** Chunks embedded and appended to the index so far. */
  chunksEmbedded: number;
}

/**
 * Mutable in-memory snapshot of process lifecycle + index state.
 *
 * ready = true once an index is loaded (freshly built or reused) and queries
 * can be served.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Directory holding the persisted index. */
  saveDir: string;
  /** Active transport in use: 'stdio' | 'http' | 'repl' | 'unknown'. */
  transport: string;
  /** Whether the last startup rebuilt the index or reused it; null before the decision. */
  rebuilt: boolean | null;
  /** True once an index is loaded and queries can be answered. */
  ready: boolean;
  /** Entries in the loaded index. */
  entries: number;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  build: BuildStatus;
}

/**
 * Class wrapper around mutable status state. Avoids ad-hoc mutation from
 * the indexer and transports.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      saveDir: initial?.saveDir ?? "",
      transport: initial?.transport ?? "unknown",
      rebuilt: initial?.rebuilt ?? null,
      ready: initial?.ready ?? false,
      entries: initial?.entries ?? 0,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      build: initial?.build ?? { sourcesCollected: 0, sourcesSkipped: 0, chunksEmbedded: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setSaveDir(dir: string) {
    this.data.saveDir = dir;
  }

  /** Zero the build counters; called when a rebuild starts. */
  public beginBuild() {
    this.data.ready = false;
    this.data.build = { sourcesCollected: 0, sourcesSkipped: 0, chunksEmbedded: 0 };
  }

  public incSources(count = 1) {
    this.data.build.sourcesCollected += count;
  }

  public setSkipped(count: number) {
    this.data.build.sourcesSkipped = count;
  }

  public incEmbedded(count = 1) {
    this.data.build.chunksEmbedded += count;
  }

  /** Record the build-vs-reuse outcome and mark the index queryable. */
  public markReady(rebuilt: boolean, entries: number) {
    this.data.rebuilt = rebuilt;
    this.data.entries = entries;
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }
}

// Singleton instance used across modules (indexer, transports, health checks).
export const statusManager = new StatusManager();
