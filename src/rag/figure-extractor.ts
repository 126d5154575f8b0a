import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { createCanvas, ImageData } from "@napi-rs/canvas";
import { extractImages } from "unpdf";
import { RAG_CONFIG } from "./config.js";
import { contentHash } from "./metadata-store.js";
import type { PdfDocument } from "./pdf-extractor.js";

export interface ExtractedFigure {
  page: number;
  contentHash: string;
  /** relative to the figures dir */
  imageRef: string;
  png: Buffer;
  width: number;
  height: number;
}

function toRgba(data: Uint8ClampedArray, channels: number, pixels: number): Uint8ClampedArray {
  if (channels === 4) return data;
  const rgba = new Uint8ClampedArray(pixels * 4);
  for (let i = 0; i < pixels; i++) {
    if (channels === 1) {
      const v = data[i] ?? 0;
      rgba[i * 4] = v;
      rgba[i * 4 + 1] = v;
      rgba[i * 4 + 2] = v;
    } else {
      rgba[i * 4] = data[i * 3] ?? 0;
      rgba[i * 4 + 1] = data[i * 3 + 1] ?? 0;
      rgba[i * 4 + 2] = data[i * 3 + 2] ?? 0;
    }
    rgba[i * 4 + 3] = 255;
  }
  return rgba;
}

/**
 * Raster images drawn on a page, written as PNG under
 * `<figuresDir>/doc_<id>/fig-<hash>.png`. Tiny images (logos, rules) are skipped.
 */
export async function extractPageFigures(
  pdf: PdfDocument,
  page: number,
  options: { figuresDir: string; docId: number },
): Promise<ExtractedFigure[]> {
  const images = await extractImages(pdf, page);
  const dir = path.join(options.figuresDir, `doc_${options.docId}`);
  const figures: ExtractedFigure[] = [];
  const seen = new Set<string>();

  for (const image of images) {
    if (Math.min(image.width, image.height) < RAG_CONFIG.minFigureSide) continue;

    const hash = contentHash(image.data);
    if (seen.has(hash)) continue;
    seen.add(hash);

    const canvas = createCanvas(image.width, image.height);
    const ctx = canvas.getContext("2d");
    const rgba = toRgba(image.data, image.channels, image.width * image.height);
    ctx.putImageData(new ImageData(rgba, image.width, image.height), 0, 0);
    const png = await canvas.encode("png");

    const imageRef = path.posix.join(`doc_${options.docId}`, `fig-${hash.slice(0, 16)}.png`);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(options.figuresDir, imageRef), png);

    figures.push({ page, contentHash: hash, imageRef, png, width: image.width, height: image.height });
  }

  return figures;
}
