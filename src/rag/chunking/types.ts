import type { ExtractedDocument, TextChunk } from "../types.js";

export interface ChunkingOptions {
  maxChunkLength: number;
  chunkOverlap: number;
}

export interface ChunkingStrategy {
  chunk(document: ExtractedDocument): TextChunk[];
}
