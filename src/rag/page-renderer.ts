import { readFile, mkdir, access, writeFile } from "node:fs/promises";
import path from "node:path";
import { createCanvas, DOMMatrix, DOMPoint, ImageData, Path2D } from "@napi-rs/canvas";
import { RAG_CONFIG } from "./config.js";

// Polyfill DOM globals that pdfjs-dist needs in Node.js
for (const [name, value] of Object.entries({ DOMMatrix, DOMPoint, ImageData, Path2D })) {
  if (!Reflect.has(globalThis, name)) Reflect.set(globalThis, name, value);
}

// Dynamic import: must happen after polyfills are in place
let _pdfjs: typeof import("pdfjs-dist/legacy/build/pdf.mjs") | null = null;

async function getPdfjs() {
  if (!_pdfjs) {
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

/** Page images are referenced by `doc_<id>/page-<n>.png`, relative to the pages dir. */
export function pageImageRef(docId: number, pageNumber: number): string {
  return path.posix.join(`doc_${docId}`, `page-${pageNumber}.png`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export interface RenderOptions {
  pagesDir: string;
  docId: number;
  maxPages?: number;
  /** re-render even when the PNG already exists */
  force?: boolean;
  onProgress?: (done: number, total: number) => void;
}

/** Render each page to PNG; returns page number → image ref. */
export async function renderPdfPages(filePath: string, options: RenderOptions): Promise<Map<number, string>> {
  const pdfjs = await getPdfjs();

  const buffer = await readFile(filePath);
  const pdf = await pdfjs.getDocument({
    data: new Uint8Array(buffer),
    useSystemFonts: true,
    isEvalSupported: false,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  }).promise;

  const total = Math.min(pdf.numPages, options.maxPages ?? pdf.numPages);
  await mkdir(path.join(options.pagesDir, `doc_${options.docId}`), { recursive: true });

  const refs = new Map<number, string>();
  let done = 0;
  const concurrency = RAG_CONFIG.renderConcurrency;

  try {
    // Process pages in batches for controlled concurrency
    for (let start = 1; start <= total; start += concurrency) {
      const batch: Promise<void>[] = [];
      for (let p = start; p < start + concurrency && p <= total; p++) {
        const pageNum = p;
        batch.push(
          (async () => {
            const ref = pageImageRef(options.docId, pageNum);
            const outPath = path.join(options.pagesDir, ref);
            if (!options.force && (await fileExists(outPath))) {
              refs.set(pageNum, ref);
              done++;
              options.onProgress?.(done, total);
              return;
            }

            const page = await pdf.getPage(pageNum);
            const viewport = page.getViewport({ scale: RAG_CONFIG.renderScale });
            const canvas = createCanvas(
              Math.floor(viewport.width),
              Math.floor(viewport.height),
            );
            const ctx = canvas.getContext("2d");

            await page.render({
              canvasContext: ctx,
              viewport,
              canvas: null,
            }).promise;

            const pngBuffer = await canvas.encode("png");
            await writeFile(outPath, pngBuffer);
            refs.set(pageNum, ref);
            done++;
            options.onProgress?.(done, total);
          })(),
        );
      }
      await Promise.all(batch);
    }
  } finally {
    await pdf.destroy();
  }

  return refs;
}

export async function loadImage(baseDir: string, ref: string): Promise<Buffer | null> {
  try {
    return await readFile(path.join(baseDir, ref));
  } catch {
    return null;
  }
}
