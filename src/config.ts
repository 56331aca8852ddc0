import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { ConfigError } from "./errors";

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type TransportMode = "stdio" | "http";

/**
 * Immutable configuration value built once at startup and handed to every
 * component that needs it. Nothing below the CLI reads `process.env`.
 */
export interface RagConfig {
  /** Requested chunk length in characters; 0 or negative means "use the model maximum". */
  readonly chunkLength: number;
  /** Maximum input length accepted by the embedding model. */
  readonly embeddingMaxLength: number;
  /** Remote pages to ingest, in order. */
  readonly urls: readonly string[];
  /** Local directories to ingest recursively (*.txt then *.pdf), in order. */
  readonly localDirs: readonly string[];
  /** Directory holding the persisted index artifacts. */
  readonly saveDir: string;
  readonly llamafileHost: string;
  readonly embeddingPort: number;
  readonly generationPort: number;
  /** Completion length cap (llama.cpp `n_predict`). */
  readonly maxTokens: number;
  readonly temperature: number;
  /** Default number of chunks retrieved per query. */
  readonly topK: number;
  readonly verbose: boolean;
  /** Transport used by `serve`. */
  readonly transport: TransportMode;
  readonly httpPort: number;
  readonly httpHost: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Load `.env` once. When running from inside src/ or a build output folder,
 * prefer the project-root `.env` (one level up); otherwise use dotenv's default lookup.
 */
export function loadEnvFile(): void {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
}

function str(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function list(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function num(env: Env, name: string, fallback: number): number {
  const raw = str(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`Invalid number for ${name}: ${raw}`);
  return n;
}

function int(env: Env, name: string, fallback: number, min: number): number {
  return Math.max(min, Math.floor(num(env, name, fallback)));
}

function port(env: Env, name: string, fallback: number): number {
  const p = int(env, name, fallback, 0);
  if (p < 1 || p > 65535) throw new ConfigError(`${name} must be a TCP port, got ${p}`);
  return p;
}

// Tolerant truthy parsing (supports several common forms).
function flag(env: Env, name: string): boolean {
  const v = (env[name] ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function transport(env: Env): TransportMode {
  const v = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  if (!v || v === "stdio") return "stdio";
  if (v === "http" || v === "streamable-http") return "http";
  throw new ConfigError(`Unknown MCP_TRANSPORT: ${v} (expected stdio or http)`);
}

/**
 * Build a {@link RagConfig} from an environment record.
 *
 * @throws {ConfigError} on non-numeric numbers, out-of-range ports or an unknown transport.
 */
export function loadConfig(env: Env): RagConfig {
  const embeddingMaxLength = int(env, "EMBEDDING_MODEL_MAX_LEN", 512, 1);

  return {
    chunkLength: int(env, "INDEX_TEXT_CHUNK_LEN", 0, 0),
    embeddingMaxLength,
    urls: list(env, "INDEX_URLS", []),
    localDirs: list(env, "INDEX_LOCAL_DATA_DIRS", ["local_data"]),
    saveDir: path.resolve(str(env, "INDEX_SAVE_DIR") ?? "index-store"),
    llamafileHost: str(env, "LLAMAFILE_HOST") ?? "127.0.0.1",
    embeddingPort: port(env, "EMBEDDING_MODEL_PORT", 8081),
    generationPort: port(env, "GENERATION_MODEL_PORT", 8080),
    maxTokens: int(env, "GENERATION_MAX_TOKENS", 256, 1),
    temperature: Math.max(0, num(env, "GENERATION_TEMPERATURE", 0.2)),
    topK: int(env, "RAG_TOP_K", 3, 1),
    verbose: flag(env, "VERBOSE"),
    transport: transport(env),
    httpPort: port(env, "MCP_PORT", 3000),
    httpHost: str(env, "HOST") ?? "127.0.0.1",
  };
}
