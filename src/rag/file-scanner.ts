import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { IngestionError } from "./errors.js";

export async function hashFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return createHash("sha256").update(buffer).digest("hex");
}

function isPdf(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(".pdf");
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, out);
    } else if (entry.isFile() && isPdf(entry.name)) {
      out.push(full);
    }
  }
}

/** Absolute paths of the PDFs at `target` (a file, or a directory searched recursively), sorted. */
export async function listPdfs(target: string): Promise<string[]> {
  const resolved = path.resolve(target);
  let info: Stats;
  try {
    info = await stat(resolved);
  } catch (err) {
    throw new IngestionError(resolved, `No such file or directory: ${resolved}`, err);
  }

  if (info.isFile()) {
    if (!isPdf(resolved)) throw new IngestionError(resolved, `Not a PDF file: ${resolved}`);
    return [resolved];
  }

  const pdfs: string[] = [];
  await walk(resolved, pdfs);
  return pdfs.sort();
}
