import path from "path";
import { EmptyContentError, ValidationError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { DocumentUploadResponse } from "../../../shared/schema.js";
import type { TextExtractor } from "./textExtractor.js";

export const SUPPORTED_EXTENSIONS = [".pdf"] as const;

// Bytes per page used by the page estimate
const BYTES_PER_PAGE = 2048;

export interface UploadedDocument {
  originalName: string;
  buffer: Buffer;
}

export function isSupportedDocument(filename: string): boolean {
  const extension = path.extname(filename).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * Rough page count from the file size; never less than 1.
 */
export function estimatePageCount(byteLength: number): number {
  return Math.max(1, Math.floor(byteLength / BYTES_PER_PAGE));
}

export class DocumentProcessor {
  constructor(private readonly extractor: TextExtractor) {}

  get extractorName(): string {
    return this.extractor.name;
  }

  async processDocument({ originalName, buffer }: UploadedDocument): Promise<DocumentUploadResponse> {
    if (!isSupportedDocument(originalName)) {
      throw new ValidationError("Only PDF files are supported");
    }

    logger.info(`📄 Extracting text from ${originalName} (${(buffer.length / 1024).toFixed(0)} KB)`);
    const text = await this.extractor.extractText(buffer);

    if (!text) {
      throw new EmptyContentError();
    }

    const pages = estimatePageCount(buffer.length);
    logger.info(`   ✅ Extracted ${text.length} chars, ~${pages} page(s)`);
    return { text, pages };
  }
}
