import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { SourceError, describe } from "./errors";
import { PdfExtractor, type PdfTextExtractor } from "./pdf-extractor";
import type { RawDocument } from "./types";

/** Result of ingesting one remote source: a document, or the reason it was skipped. */
export type SourceOutcome =
  | { ok: true; document: RawDocument }
  | { ok: false; origin: string; reason: string };

export type SkippedSource = Extract<SourceOutcome, { ok: false }>;

export interface SourceCollectorOptions {
  urls: readonly string[];
  localDirs: readonly string[];
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
  pdf?: PdfTextExtractor;
  verbose?: boolean;
}

/**
 * Reduce an HTML page to its visible text: scripts, styles and comments are
 * dropped, block-level tags become line breaks, remaining tags are stripped
 * and common entities decoded.
 */
export function htmlToText(html: string): string {
  let s = html;
  s = s.replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, " ");
  s = s.replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, " ");
  s = s.replace(/<noscript\b[^>]*>[\s\S]*?<\/noscript>/gi, " ");
  s = s.replace(/<!--[\s\S]*?-->/g, " ");
  s = s.replace(/<br\s*\/?\s*>/gi, "\n");
  s = s.replace(/<\/?(?:p|div|section|article|li|tr|h[1-6])\b[^>]*>/gi, "\n");
  s = s.replace(/<[^>]+>/g, " ");

  s = s
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");

  s = s.replace(/\r/g, "");
  s = s.replace(/[ \t]+/g, " ");
  s = s.replace(/ *\n */g, "\n");
  s = s.replace(/\n{3,}/g, "\n\n");
  return s.trim();
}

/**
 * Produces raw documents from the configured URLs, then from the configured
 * local directories.
 *
 * The two kinds of source fail differently. A URL is best effort: any
 * network error, non-2xx status or extraction failure becomes a
 * {@link SkippedSource} recorded in {@link skipped}, and collection moves on.
 * A local directory is trusted configuration: read and PDF parse errors
 * propagate and abort the build.
 */
export class SourceCollector {
  /** URLs that could not be ingested during the current iteration. */
  public readonly skipped: SkippedSource[] = [];
  private readonly urls: readonly string[];
  private readonly localDirs: readonly string[];
  private readonly fetchImpl: typeof fetch;
  private readonly pdf: PdfTextExtractor;
  private readonly verbose: boolean;
  private started = false;

  public constructor(opts: SourceCollectorOptions) {
    this.urls = opts.urls;
    this.localDirs = opts.localDirs;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.pdf = opts.pdf ?? new PdfExtractor();
    this.verbose = !!opts.verbose;
  }

  /**
   * Lazy, finite, single-use sequence of documents in source-declared order:
   * URLs first, then for each directory its `*.txt` files followed by its
   * `*.pdf` files (each group sorted by relative path).
   *
   * @throws {SourceError} when iterated a second time or a directory is unusable.
   */
  public async *documents(): AsyncGenerator<RawDocument> {
    if (this.started) throw new SourceError("Source collection can only be iterated once");
    this.started = true;

    for (const url of this.urls) {
      const outcome = await this.fetchUrl(url);
      if (!outcome.ok) {
        this.skipped.push(outcome);
        console.error(`[RAG] Skipping ${outcome.origin}: ${outcome.reason}`);
        continue;
      }
      yield outcome.document;
    }

    for (const dir of this.localDirs) {
      yield* this.readDirectory(dir);
    }
  }

  /** Fetch one URL and extract its visible text. Never throws. */
  public async fetchUrl(url: string): Promise<SourceOutcome> {
    try {
      const response = await this.fetchImpl(url);
      if (!response.ok) {
        return { ok: false, origin: url, reason: `HTTP ${response.status} ${response.statusText}`.trim() };
      }
      const text = htmlToText(await response.text());
      if (this.verbose) console.error(`[RAG][verbose] Fetched ${url} (${text.length} chars)`);
      return { ok: true, document: { origin: url, text } };
    } catch (e) {
      return { ok: false, origin: url, reason: describe(e) };
    }
  }

  private async *readDirectory(dir: string): AsyncGenerator<RawDocument> {
    const root = path.resolve(dir);
    const st = await fs.stat(root).catch((e: unknown) => {
      throw new SourceError(`Local data directory ${root} is not accessible: ${describe(e)}`, { cause: e });
    });
    if (!st.isDirectory()) throw new SourceError(`Local data path ${root} is not a directory`);

    const files = (
      await fg("**/*.{txt,pdf}", { cwd: root, absolute: true, onlyFiles: true, caseSensitiveMatch: false })
    ).sort();
    const textFiles = files.filter((f) => !PdfExtractor.isPdf(f));
    const pdfFiles = files.filter((f) => PdfExtractor.isPdf(f));
    if (this.verbose) {
      console.error(
        `[RAG][verbose] ${root}: ${textFiles.length} text file(s), ${pdfFiles.length} PDF file(s)`,
      );
    }

    for (const file of textFiles) {
      yield { origin: file, text: await fs.readFile(file, "utf8") };
    }
    for (const file of pdfFiles) {
      const pages = await this.pdf.extractPages(file);
      yield { origin: file, text: pages.join("") };
    }
  }
}
