import mammoth from "mammoth";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import {
  describeError,
  ExtractionError,
  NoContentError,
  UnsupportedDocumentError,
} from "../../domain/errors.js";
import { isTimeout } from "../ai/http.js";
import { normalizeText } from "../../utils/text.js";

export type DocumentType = "pdf" | "docx";

const SUPPORTED_EXTENSIONS: Record<string, DocumentType> = {
  ".pdf": "pdf",
  ".docx": "docx",
};

export interface DocumentExtractor {
  extractText(url: string, documentType: DocumentType): Promise<string>;
}

export interface HttpDocumentExtractorOptions {
  timeoutMs: number;
  maxBytes: number;
}

export function getSupportedDocumentExtensions(): string[] {
  return Object.keys(SUPPORTED_EXTENSIONS);
}

/**
 * Determines the document type from the URL path's extension, ignoring the
 * query string and fragment. Runs before any network access.
 */
export function resolveDocumentType(documentUrl: string): DocumentType {
  let parsed: URL;
  try {
    parsed = new URL(documentUrl);
  } catch {
    throw new UnsupportedDocumentError(`Invalid document URL: ${documentUrl}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new UnsupportedDocumentError(
      `Unsupported URL scheme: ${parsed.protocol}. Only http and https are allowed.`,
    );
  }

  const pathname = decodePathname(parsed.pathname).toLowerCase();
  const dot = pathname.lastIndexOf(".");
  const extension = dot >= 0 && dot > pathname.lastIndexOf("/") ? pathname.slice(dot) : "";
  const documentType = SUPPORTED_EXTENSIONS[extension];
  if (!documentType) {
    throw new UnsupportedDocumentError(
      `Unsupported extension: ${extension || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }
  return documentType;
}

export class HttpDocumentExtractor implements DocumentExtractor {
  constructor(private readonly options: HttpDocumentExtractorOptions) {}

  async extractText(url: string, documentType: DocumentType): Promise<string> {
    const data = await this.download(url);
    const text =
      documentType === "pdf"
        ? await loadPdfTextFromBuffer(data)
        : await loadDocxTextFromBuffer(data);

    if (!text) {
      throw new NoContentError(`No text could be extracted from ${documentType} document.`);
    }
    return text;
  }

  private async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new ExtractionError(
        isTimeout(error)
          ? `Document download timed out after ${this.options.timeoutMs}ms.`
          : `Document download failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new ExtractionError(`Document download failed with status ${response.status}.`);
    }

    const declaredLength = Number(response.headers.get("content-length") ?? "0");
    if (declaredLength > this.options.maxBytes) {
      throw new ExtractionError(
        `Document is ${declaredLength} bytes, above the ${this.options.maxBytes} byte limit.`,
      );
    }

    return this.readBody(response);
  }

  private async readBody(response: Response): Promise<Buffer> {
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const { maxBytes } = this.options;
    const reader = response.body.getReader();
    const parts: Uint8Array[] = [];
    let received = 0;
    for (;;) {
      const result = await reader.read().catch((error: unknown) => {
        throw new ExtractionError(
          isTimeout(error)
            ? `Document download timed out after ${this.options.timeoutMs}ms.`
            : `Document download failed: ${describeError(error)}`,
          { cause: error },
        );
      });
      if (result.done) {
        break;
      }
      received += result.value.byteLength;
      if (received > maxBytes) {
        await reader.cancel();
        throw new ExtractionError(`Document exceeds the ${maxBytes} byte limit.`);
      }
      parts.push(result.value);
    }
    return Buffer.concat(parts);
  }
}

// Non-UTF-8 escapes are legal in a path; match the extension on the raw form then.
function decodePathname(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch (error) {
    if (error instanceof URIError) {
      return pathname;
    }
    throw error;
  }
}

export async function loadPdfTextFromBuffer(data: Buffer): Promise<string> {
  try {
    const pdf = await getDocument({
      data: new Uint8Array(data),
      isEvalSupported: false,
      useSystemFonts: true,
    }).promise;

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        pages.push(
          content.items
            .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
            .join(""),
        );
      }
      return normalizeText(pages.join("\n"));
    } finally {
      await pdf.destroy();
    }
  } catch (error) {
    throw new ExtractionError(`PDF parsing failed: ${describeError(error)}`, { cause: error });
  }
}

export async function loadDocxTextFromBuffer(data: Buffer): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ buffer: data });
    return normalizeText(result.value);
  } catch (error) {
    throw new ExtractionError(`DOCX parsing failed: ${describeError(error)}`, { cause: error });
  }
}
