import { mkdir } from "node:fs/promises";
import { LocalIndex } from "vectra";
import { citationKey } from "./citations.js";
import { KeyedLock } from "./keyed-lock.js";
import type { CitationRef, TextHit } from "./types.js";

type VectraMetadata = Record<string, number | string | boolean>;

export interface VectorRecord {
  id: string;
  vector: number[];
  metadata: VectraMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: VectraMetadata;
}

/**
 * A persistent vectra index on disk. Writes are serialized: vectra allows one
 * open update at a time per index.
 */
export class VectraCollection {
  private readonly index: LocalIndex;
  private readonly writes = new KeyedLock();

  constructor(readonly folderPath: string) {
    this.index = new LocalIndex(folderPath);
  }

  async exists(): Promise<boolean> {
    return this.index.isIndexCreated();
  }

  private async ensureCreated(): Promise<void> {
    if (await this.index.isIndexCreated()) return;
    await mkdir(this.folderPath, { recursive: true });
    await this.index.createIndex();
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.writes.run("update", async () => {
      await this.ensureCreated();
      await this.index.beginUpdate();
      try {
        for (const record of records) {
          await this.index.upsertItem({
            id: record.id,
            vector: record.vector,
            metadata: record.metadata,
          });
        }
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw err;
      }
    });
  }

  async remove(ids: string[]): Promise<void> {
    if (ids.length === 0 || !(await this.exists())) return;
    await this.writes.run("update", async () => {
      await this.index.beginUpdate();
      try {
        for (const id of ids) await this.index.deleteItem(id);
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw err;
      }
    });
  }

  async removeWhere(key: string, value: number): Promise<number> {
    if (!(await this.exists())) return 0;
    const items = await this.index.listItemsByMetadata({ [key]: { $eq: value } });
    await this.remove(items.map((item) => item.id));
    return items.length;
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0 || !(await this.exists())) return [];
    const results = await this.index.queryItems(vector, k);
    return results.map((r) => ({
      id: r.item.id,
      score: r.score,
      metadata: r.item.metadata,
    }));
  }

  async size(): Promise<number> {
    if (!(await this.exists())) return 0;
    const items = await this.index.listItems();
    return items.length;
  }
}

export function readInt(metadata: VectraMetadata, key: string): number | null {
  const value = metadata[key];
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/**
 * Chunk embeddings keyed by `doc:page:chunk`. Holds identifiers by value
 * only; the metadata store decides what exists.
 */
export class TextIndex {
  private readonly collection: VectraCollection;

  constructor(folderPath: string) {
    this.collection = new VectraCollection(folderPath);
  }

  async upsertChunks(chunks: Array<CitationRef & { vector: number[] }>): Promise<void> {
    await this.collection.upsert(
      chunks.map((c) => ({
        id: citationKey(c),
        vector: c.vector,
        metadata: { docId: c.docId, page: c.page, chunkId: c.unitId },
      })),
    );
  }

  async removeChunks(refs: CitationRef[]): Promise<void> {
    await this.collection.remove(refs.map(citationKey));
  }

  async removeDocument(docId: number): Promise<number> {
    return this.collection.removeWhere("docId", docId);
  }

  async search(queryVector: number[], k: number): Promise<TextHit[]> {
    const matches = await this.collection.query(queryVector, k);
    const hits: TextHit[] = [];
    for (const m of matches) {
      const docId = readInt(m.metadata, "docId");
      const page = readInt(m.metadata, "page");
      const chunkId = readInt(m.metadata, "chunkId");
      if (docId === null || page === null || chunkId === null) continue;
      hits.push({ docId, page, chunkId, score: m.score });
    }
    return hits;
  }

  async size(): Promise<number> {
    return this.collection.size();
  }
}
