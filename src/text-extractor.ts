/**
 * Text extraction for uploaded documents.
 *
 * PDFs go through pdf-parse; everything else on the allow-list is decoded as
 * strict UTF-8. Anything that yields no usable text is rejected with an
 * {@link InputError} before chunking, so it is never recorded.
 */
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { InputError, describeError } from "./errors";

export interface ExtractedText {
  text: string;
  /** Page count for PDFs; undefined for plain text. */
  pageCount?: number;
}

export class TextExtractor {
  private readonly allowedExt: ReadonlySet<string>;
  private readonly verbose: boolean;

  /**
   * @param allowedExt Extensions without the leading dot, e.g. `["pdf", "md"]`.
   */
  public constructor(allowedExt: readonly string[], verbose = false) {
    this.allowedExt = new Set(allowedExt.map((e) => e.toLowerCase().replace(/^\./, "")));
    this.verbose = verbose;
  }

  /** Extension of `filename` without the dot, lower-cased ("" when none). */
  public static extensionOf(filename: string): string {
    return path.extname(filename).slice(1).toLowerCase();
  }

  public async extract(filename: string, bytes: Uint8Array): Promise<ExtractedText> {
    const ext = TextExtractor.extensionOf(filename);
    if (!this.allowedExt.has(ext)) {
      throw new InputError(`Unsupported file type: ${filename}`);
    }
    if (bytes.byteLength === 0) {
      throw new InputError(`Empty upload: ${filename}`);
    }

    const result = ext === "pdf" ? await this.extractPdf(filename, bytes) : decodeText(filename, bytes);
    if (result.text.trim().length === 0) {
      throw new InputError(`No extractable text in ${filename}`);
    }
    return result;
  }

  private async extractPdf(filename: string, bytes: Uint8Array): Promise<ExtractedText> {
    if (this.verbose) console.error(`[PDF] Extracting text from ${filename}...`);
    let parser: PDFParse | undefined;
    try {
      parser = new PDFParse({ data: bytes });
      const result = await parser.getText();
      if (this.verbose) console.error(`[PDF] ${filename}: ${result.pages.length} pages`);
      return { text: result.text || "", pageCount: result.pages.length };
    } catch (e) {
      throw new InputError(`Unreadable PDF ${filename}: ${describeError(e)}`, { cause: e });
    } finally {
      await parser?.destroy();
    }
  }
}

/** Strict UTF-8 decode; binary content (NUL bytes, invalid sequences) is rejected. */
export function decodeText(filename: string, bytes: Uint8Array): ExtractedText {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(bytes);
  } catch (e) {
    throw new InputError(`${filename} is not valid UTF-8 text`, { cause: e });
  }
  if (text.includes("\u0000")) {
    throw new InputError(`${filename} looks like a binary file`);
  }
  return { text: text.replace(/\r\n?/g, "\n") };
}
