import { readFile } from "fs/promises";
import { extname } from "path";
import { createRequire } from "module";
import { EPub } from "epub2";
import type PdfParse from "pdf-parse";
import type { TextExtractor } from "../core/types";

export type BookFormat = "pdf" | "epub" | "txt";

export const SUPPORTED_EXTENSIONS: Record<string, BookFormat> = {
  ".pdf": "pdf",
  ".epub": "epub",
  ".txt": "txt",
};

// Tried in order; utf-8 is strict so invalid bytes fall through.
const TEXT_ENCODINGS = ["utf-8", "windows-1252", "latin1"];

export type PdfParseFn = (data: Buffer) => Promise<{ text: string }>;

export interface TextExtractorOptions {
  /** Override the PDF parser (defaults to pdf-parse) */
  parsePdf?: PdfParseFn;
  /** Called when a file cannot be read; defaults to console.error */
  onError?: (filePath: string, error: Error) => void;
}

export function detectBookFormat(fileName: string): BookFormat | null {
  return SUPPORTED_EXTENSIONS[extname(fileName).toLowerCase()] ?? null;
}

export function isSupportedBookFile(fileName: string): boolean {
  return detectBookFormat(fileName) !== null;
}

/**
 * pdf-parse runs a self-test when it is the entry module, so it is loaded
 * through require with this module as its parent.
 */
function loadPdfParse(): typeof PdfParse {
  const require = createRequire(import.meta.url);
  return require("pdf-parse");
}

/**
 * Extracts plain text from PDF, EPUB and TXT books.
 * Every failure is reported through `onError` and turns into null.
 */
export class BookTextExtractor implements TextExtractor {
  private parsePdf?: PdfParseFn;
  private onError: (filePath: string, error: Error) => void;

  constructor(options?: TextExtractorOptions) {
    this.parsePdf = options?.parsePdf;
    this.onError =
      options?.onError ??
      ((filePath, error) =>
        console.error(`Error extracting text from ${filePath}: ${error.message}`));
  }

  async extract(filePath: string): Promise<string | null> {
    const format = detectBookFormat(filePath);

    if (!format) {
      this.onError(
        filePath,
        new Error(`Unsupported file extension: ${extname(filePath) || "(none)"}`)
      );
      return null;
    }

    try {
      switch (format) {
        case "pdf":
          return await this.extractPdf(filePath);
        case "epub":
          return await this.extractEpub(filePath);
        case "txt":
          return this.decodeText(await readFile(filePath));
      }
    } catch (error) {
      this.onError(filePath, error instanceof Error ? error : new Error(String(error)));
      return null;
    }
  }

  private async extractPdf(filePath: string): Promise<string> {
    const parse = this.parsePdf ?? loadPdfParse();
    const buffer = await readFile(filePath);
    const result = await parse(buffer);
    return result.text;
  }

  private async extractEpub(filePath: string): Promise<string> {
    const epub = await EPub.createAsync(filePath);
    const documents: string[] = [];

    for (const item of epub.flow) {
      if (!item.id) continue;
      const html = await epub.getChapterAsync(item.id);
      const text = htmlToPlainText(html);
      if (text.length > 0) {
        documents.push(text);
      }
    }

    if (documents.length === 0) {
      throw new Error("EPUB contains no readable documents");
    }

    return documents.join("\n\n");
  }

  private decodeText(buffer: Buffer): string {
    for (const encoding of TEXT_ENCODINGS) {
      try {
        return new TextDecoder(encoding, { fatal: true }).decode(buffer);
      } catch {
        // not valid in this encoding, try the next one
        continue;
      }
    }

    throw new Error("Could not decode text file with any encoding");
  }
}

/**
 * Convert HTML to plain text
 * Removes tags, decodes common entities and keeps block breaks as blank lines
 */
export function htmlToPlainText(html: string): string {
  // Remove script and style tags with content
  let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "");
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "");

  // Convert block elements to line breaks before dropping tags
  text = text.replace(/<br\s*\/?>/gi, "\n");
  text = text.replace(/<\/(p|div|h[1-6]|li|blockquote|section)>/gi, "\n\n");

  // Remove all remaining HTML tags
  text = text.replace(/<[^>]+>/g, "");

  // Convert common HTML entities (&amp; last so it is not decoded twice)
  text = text
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");

  // Clean up whitespace
  return text
    .replace(/[ \t]+/g, " ") // Multiple spaces to single
    .replace(/ *\n */g, "\n") // Strip spaces around line breaks
    .replace(/\n{3,}/g, "\n\n") // Multiple newlines to double
    .trim();
}
