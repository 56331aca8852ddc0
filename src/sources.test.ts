import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceError } from "./errors";
import type { PdfTextExtractor } from "./pdf-extractor";
import { SourceCollector, htmlToText } from "./sources";
import { drain, makeTempDir, writeFiles } from "./test-helpers";

/** Serves fixed pages by URL; anything else answers 404. */
function fakeFetch(pages: Record<string, string | Error>): typeof fetch {
  return async (input) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const page = pages[url];
    if (page instanceof Error) throw page;
    if (page === undefined) return new Response("missing", { status: 404, statusText: "Not Found" });
    return new Response(page, { status: 200, headers: { "content-type": "text/html" } });
  };
}

class FakePdf implements PdfTextExtractor {
  public readonly seen: string[] = [];
  public constructor(private readonly pages: string[]) {}

  public async extractPages(pdfAbsPath: string): Promise<string[]> {
    this.seen.push(pdfAbsPath);
    return this.pages;
  }
}

describe("htmlToText", () => {
  it("keeps visible text and drops markup, scripts and styles", () => {
    const html =
      "<html><head><style>p { color: red }</style></head><body>" +
      "<h1>Title</h1><p>Hello &amp; welcome</p><script>track()</script>Line<br>two</body></html>";
    expect(htmlToText(html)).toBe("Title\n\nHello & welcome\nLine\ntwo");
  });

  it("decodes entities without double-decoding", () => {
    expect(htmlToText("a &lt;b&gt; &amp;lt; &quot;c&quot;")).toBe('a <b> &lt; "c"');
  });
});

describe("SourceCollector", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("yields URLs before directories, text files before PDFs", async () => {
    await writeFiles(root, { "b.txt": "bee", "a.txt": "ay", "sub/c.txt": "see", "doc.pdf": "%PDF-stub" });
    const pdf = new FakePdf(["page one ", "page two"]);
    const collector = new SourceCollector({
      urls: ["https://docs.test/page"],
      localDirs: [root],
      fetchImpl: fakeFetch({ "https://docs.test/page": "<p>remote text</p>" }),
      pdf,
    });

    const docs = await drain(collector.documents());
    expect(docs).toEqual([
      { origin: "https://docs.test/page", text: "remote text" },
      { origin: path.join(root, "a.txt"), text: "ay" },
      { origin: path.join(root, "b.txt"), text: "bee" },
      { origin: path.join(root, "sub", "c.txt"), text: "see" },
      { origin: path.join(root, "doc.pdf"), text: "page one page two" },
    ]);
    expect(pdf.seen).toEqual([path.join(root, "doc.pdf")]);
    expect(collector.skipped).toEqual([]);
  });

  it("skips URLs that fail and keeps going", async () => {
    const collector = new SourceCollector({
      urls: ["https://docs.test/gone", "https://docs.test/down", "https://docs.test/ok"],
      localDirs: [],
      fetchImpl: fakeFetch({
        "https://docs.test/down": new TypeError("fetch failed"),
        "https://docs.test/ok": "fine",
      }),
    });

    const docs = await drain(collector.documents());
    expect(docs).toEqual([{ origin: "https://docs.test/ok", text: "fine" }]);
    expect(collector.skipped).toEqual([
      { ok: false, origin: "https://docs.test/gone", reason: "HTTP 404 Not Found" },
      { ok: false, origin: "https://docs.test/down", reason: "fetch failed" },
    ]);
  });

  it("ignores files that are neither text nor PDF", async () => {
    await writeFiles(root, { "notes.md": "# skip", "keep.TXT": "kept" });
    const docs = await drain(new SourceCollector({ urls: [], localDirs: [root], pdf: new FakePdf([]) }).documents());
    expect(docs).toEqual([{ origin: path.join(root, "keep.TXT"), text: "kept" }]);
  });

  it("fails on a missing local directory", async () => {
    const collector = new SourceCollector({ urls: [], localDirs: [path.join(root, "absent")] });
    await expect(drain(collector.documents())).rejects.toBeInstanceOf(SourceError);
  });

  it("can only be iterated once", async () => {
    const collector = new SourceCollector({ urls: [], localDirs: [] });
    expect(await drain(collector.documents())).toEqual([]);
    await expect(drain(collector.documents())).rejects.toBeInstanceOf(SourceError);
  });
});
