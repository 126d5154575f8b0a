import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { IngestionError, errorMessage } from "./errors.js";
import type { ExtractedDocument, PageContent } from "./types.js";

export type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

export async function openPdf(filePath: string): Promise<PdfDocument> {
  const buffer = await readFile(filePath);
  try {
    return await getDocumentProxy(new Uint8Array(buffer));
  } catch (err) {
    throw new IngestionError(filePath, `Failed to open PDF (corrupt or unsupported): ${errorMessage(err)}`, err);
  }
}

/** Page texts, 1-based. Line breaks follow the PDF's end-of-line markers. */
export async function extractPdf(filePath: string, pdf: PdfDocument, maxPages?: number): Promise<ExtractedDocument> {
  const pageCount = Math.min(pdf.numPages, maxPages ?? pdf.numPages);

  const pages: PageContent[] = [];
  for (let i = 1; i <= pageCount; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    const text = textContent.items
      .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
      .join("");
    pages.push({ pageNumber: i, text });
  }

  return {
    source: path.basename(filePath),
    filePath: path.resolve(filePath),
    pages,
  };
}
