/**
 * PDF text extraction.
 *
 * Text is returned per page, in page order, so callers decide how pages are
 * joined. Read or parse failures propagate to the caller.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";

/** Anything that can turn a PDF on disk into per-page text. */
export interface PdfTextExtractor {
  extractPages(pdfAbsPath: string): Promise<string[]>;
}

/**
 * {@link PdfTextExtractor} backed by pdf-parse.
 */
export class PdfExtractor implements PdfTextExtractor {
  /**
   * Extract the text of every page of a PDF file.
   * @param pdfAbsPath Absolute path to the PDF file
   * @returns One string per page, first page first
   */
  public async extractPages(pdfAbsPath: string): Promise<string[]> {
    const dataBuffer = await fs.readFile(pdfAbsPath);
    const parser = new PDFParse({ data: dataBuffer });
    try {
      const textResult = await parser.getText();
      return textResult.pages.map((page) => page.text);
    } finally {
      await parser.destroy();
    }
  }

  /**
   * Check if a file is a PDF based on its extension.
   * @param filePath File path to check
   * @returns True if file has .pdf extension (case-insensitive)
   */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
