import { describe, expect, it } from "vitest";
import { compareEvidence, minMaxNormalize, rankEvidence, suppliedCitations } from "../src/rag/fusion.js";
import type { ChunkEvidence, EvidenceItem, FigureEvidence, PageEvidence } from "../src/rag/types.js";

function chunk(docId: number, page: number, chunkId: number, score: number): ChunkEvidence {
  return {
    kind: "chunk",
    docId,
    page,
    chunkId,
    sectionName: null,
    text: `chunk ${docId}:${page}:${chunkId}`,
    score,
    citations: [`[${docId}:${page}:${chunkId}]`],
  };
}

function figure(docId: number, page: number, figureId: number, score: number): FigureEvidence {
  return {
    kind: "figure",
    docId,
    page,
    figureId,
    ocrText: null,
    enrichment: null,
    score,
    citations: [`[${docId}:${page}:${figureId}]`],
  };
}

function page(docId: number, pageNumber: number, score: number, citations: string[]): PageEvidence {
  return { kind: "page", docId, page: pageNumber, score, citations };
}

const keys = (items: EvidenceItem[]) => items.map((i) => `${i.kind}:${i.citations.join(",")}:${i.docId}:${i.page}`);

describe("minMaxNormalize", () => {
  it("scales each list to [0, 1]", () => {
    expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
  });

  it("maps a single hit or equal scores to 1", () => {
    expect(minMaxNormalize([])).toEqual([]);
    expect(minMaxNormalize([0.3])).toEqual([1]);
    expect(minMaxNormalize([0.7, 0.7])).toEqual([1, 1]);
  });
});

describe("rankEvidence", () => {
  it("breaks score ties by doc_id, page, then unit id", () => {
    const items = [chunk(2, 1, 0, 0.5), chunk(1, 2, 3, 0.5), chunk(1, 1, 4, 0.5), chunk(1, 1, 1, 0.5)];
    expect(rankEvidence(items, 10).map((i) => i.citations[0])).toEqual(["[1:1:1]", "[1:1:4]", "[1:2:3]", "[2:1:0]"]);
  });

  it("is deterministic regardless of input order", () => {
    const items = [
      chunk(1, 1, 0, 1),
      figure(2, 3, 4, 0.8),
      page(2, 3, 0.8, ["[2:3:4]"]),
      chunk(1, 1, 2, 0.5),
      chunk(3, 1, 0, 0.5),
    ];
    const forward = rankEvidence(items, 10);
    const reversed = rankEvidence([...items].reverse(), 10);
    expect(keys(reversed)).toEqual(keys(forward));
    expect(forward.map((i) => i.kind)).toEqual(["chunk", "page", "figure", "chunk", "chunk"]);
  });

  it("drops the lowest-scored items first and trims page citations to surviving figures", () => {
    const items = [chunk(1, 1, 0, 1), page(2, 3, 0.8, ["[2:3:4]"]), figure(2, 3, 4, 0.8), chunk(1, 1, 2, 0.5)];
    const ranked = rankEvidence(items, 2);
    expect(ranked).toHaveLength(2);
    expect(ranked[0]).toMatchObject({ kind: "chunk", chunkId: 0 });
    expect(ranked[1]).toMatchObject({ kind: "page", citations: [] });
  });

  it("removes duplicate units", () => {
    const ranked = rankEvidence([chunk(1, 1, 0, 0.9), chunk(1, 1, 0, 0.4)], 10);
    expect(ranked).toEqual([chunk(1, 1, 0, 0.9)]);
  });

  it("puts a page ahead of its own figures at the same score", () => {
    expect(compareEvidence(page(1, 1, 0.5, []), figure(1, 1, 0, 0.5))).toBeLessThan(0);
  });
});

describe("suppliedCitations", () => {
  it("collects each token once", () => {
    expect(suppliedCitations([page(2, 3, 1, ["[2:3:4]"]), figure(2, 3, 4, 1), chunk(1, 1, 0, 1)])).toEqual([
      "[2:3:4]",
      "[1:1:0]",
    ]);
  });
});
