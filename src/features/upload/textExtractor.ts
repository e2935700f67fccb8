import PDFParser from "pdf2json";
import { errorMessage, ExtractionError } from "../../errors.js";

/**
 * Turns raw document bytes into plain text.
 */
export interface TextExtractor {
  readonly name: string;
  extractText(buffer: Buffer): Promise<string>;
}

// The subset of pdf2json's output that text extraction reads
interface PdfTextRun {
  T?: string;
}

interface PdfText {
  R?: ReadonlyArray<PdfTextRun>;
}

interface PdfPage {
  Texts?: ReadonlyArray<PdfText>;
}

export interface PdfDocumentData {
  Pages?: ReadonlyArray<PdfPage>;
}

function decodeRun(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    // Runs containing a bare '%' are not URI encoded
    return raw;
  }
}

/**
 * Concatenates the text runs of every page, pages joined back to back.
 */
export function collectPdfText(pdfData: PdfDocumentData): string {
  let text = "";
  for (const page of pdfData.Pages ?? []) {
    const runs: string[] = [];
    for (const textItem of page.Texts ?? []) {
      for (const run of textItem.R ?? []) {
        if (run.T) runs.push(decodeRun(run.T));
      }
    }
    text += runs.join(" ");
  }
  return text.trim();
}

function describeParserError(errData: { parserError: unknown }): string {
  const { parserError } = errData;
  return parserError instanceof Error ? parserError.message : String(parserError);
}

export class PdfTextExtractor implements TextExtractor {
  readonly name = "pdf2json";

  extractText(buffer: Buffer): Promise<string> {
    return new Promise((resolve, reject) => {
      const pdfParser = new PDFParser();

      pdfParser.on("pdfParser_dataError", (errData: { parserError: unknown }) => {
        reject(new ExtractionError(`PDF extraction failed: ${describeParserError(errData)}`));
      });

      pdfParser.on("pdfParser_dataReady", (pdfData: PdfDocumentData) => {
        try {
          resolve(collectPdfText(pdfData));
        } catch (error) {
          reject(new ExtractionError(`PDF extraction failed: ${errorMessage(error)}`, { cause: error }));
        }
      });

      try {
        pdfParser.parseBuffer(buffer);
      } catch (error) {
        reject(new ExtractionError(`PDF extraction failed: ${errorMessage(error)}`, { cause: error }));
      }
    });
  }
}
