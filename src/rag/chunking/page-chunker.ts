import { RAG_CONFIG } from "../config.js";
import type { ExtractedDocument, TextChunk } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

const SECTION_RE =
  /^(?:\d+(?:\.\d+)*\.?\s+)?(abstract|introduction|methods?|results?|discussion|conclusions?|references)\s*[:.]?$/i;

/**
 * Recursively splits text by trying separators in order: \n\n → \n → " " → hard char limit.
 */
function recursiveSplit(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const separators = ["\n\n", "\n", " "];
  for (const sep of separators) {
    const idx = text.lastIndexOf(sep, maxLength);
    if (idx > 0) {
      return [
        text.slice(0, idx),
        ...recursiveSplit(text.slice(idx + sep.length), maxLength),
      ];
    }
  }

  // Hard split at maxLength
  return [
    text.slice(0, maxLength),
    ...recursiveSplit(text.slice(maxLength), maxLength),
  ];
}

/** Prefix each piece after the first with the word-aligned tail of its predecessor. */
function withOverlap(pieces: string[], overlap: number): string[] {
  if (overlap <= 0) return pieces;
  return pieces.map((piece, i) => {
    const prev = i > 0 ? pieces[i - 1] : undefined;
    if (prev === undefined) return piece;
    let tail = prev.slice(-overlap);
    const space = tail.indexOf(" ");
    if (space >= 0 && space < tail.length - 1) tail = tail.slice(space + 1);
    return `${tail.trim()} ${piece}`;
  });
}

function sectionTitle(raw: string): string {
  const lower = raw.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

/**
 * Split page text at heading lines such as "2 Methods" or "Abstract". Text
 * before the first heading belongs to `carried`, the section the previous
 * page ended in.
 */
export function inferSections(
  text: string,
  carried: string | null = null,
): Array<{ name: string | null; text: string }> {
  const segments: Array<{ name: string | null; text: string }> = [];
  let name: string | null = carried;
  let lines: string[] = [];

  const flush = () => {
    const body = lines.join("\n").trim();
    if (body) segments.push({ name, text: body });
  };

  for (const line of text.split("\n")) {
    const heading = SECTION_RE.exec(line.trim())?.[1];
    if (heading) {
      flush();
      name = sectionTitle(heading);
      lines = [line];
    } else {
      lines.push(line);
    }
  }
  flush();
  return segments;
}

/** Section-aware chunks that never span a page, so every chunk has one page to cite. */
export class PageChunker implements ChunkingStrategy {
  constructor(
    private readonly options: ChunkingOptions = {
      maxChunkLength: RAG_CONFIG.maxChunkLength,
      chunkOverlap: RAG_CONFIG.chunkOverlap,
    },
  ) {}

  chunk(document: ExtractedDocument): TextChunk[] {
    const maxLength = this.options.maxChunkLength;
    const overlap = Math.min(this.options.chunkOverlap, Math.floor(maxLength / 2));
    const pieceLength = Math.max(1, maxLength - overlap - 1);
    const chunks: TextChunk[] = [];
    let carried: string | null = null;

    for (const page of document.pages) {
      const text = page.text.trim();
      if (!text) continue;

      for (const section of inferSections(text, carried)) {
        carried = section.name;
        const pieces = recursiveSplit(section.text, pieceLength)
          .map((p) => p.trim())
          .filter((p) => p.length > 0);
        for (const subText of withOverlap(pieces, overlap)) {
          chunks.push({
            text: subText,
            page: page.pageNumber,
            sectionName: section.name,
          });
        }
      }
    }

    return chunks;
  }
}
