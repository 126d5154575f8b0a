import type { EvidenceItem } from "./types.js";

/**
 * Min-max normalize one result list into [0, 1]. Text similarities and
 * page-visual scores live on different scales, so each list is normalized on
 * its own before they are merged. A single hit, or all-equal scores, map to 1.
 */
export function minMaxNormalize(scores: number[]): number[] {
  if (scores.length === 0) return [];
  const max = Math.max(...scores);
  const min = Math.min(...scores);
  if (!Number.isFinite(max) || !Number.isFinite(min) || max === min) {
    return scores.map(() => 1);
  }
  return scores.map((s) => (s - min) / (max - min));
}

/** Page items sort ahead of the units on the same page. */
export function unitOrder(item: EvidenceItem): number {
  switch (item.kind) {
    case "chunk":
      return item.chunkId;
    case "figure":
      return item.figureId;
    case "page":
      return -1;
  }
}

/** Score descending, then doc_id, page, unit id ascending. */
export function compareEvidence(a: EvidenceItem, b: EvidenceItem): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.docId !== b.docId) return a.docId - b.docId;
  if (a.page !== b.page) return a.page - b.page;
  return unitOrder(a) - unitOrder(b);
}

export function evidenceKey(item: EvidenceItem): string {
  return `${item.kind}:${item.docId}:${item.page}:${unitOrder(item)}`;
}

/**
 * Sort, drop duplicates (first occurrence wins) and keep the top `maxItems`.
 * Page items then only advertise the figures that survived the cut.
 */
export function rankEvidence(items: EvidenceItem[], maxItems: number): EvidenceItem[] {
  const seen = new Set<string>();
  const ranked = [...items].sort(compareEvidence).filter((item) => {
    const key = evidenceKey(item);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const kept = ranked.slice(0, Math.max(0, maxItems));
  const keptTokens = new Set(kept.filter((i) => i.kind !== "page").flatMap((i) => i.citations));

  return kept.map((item) =>
    item.kind === "page"
      ? { ...item, citations: item.citations.filter((token) => keptTokens.has(token)) }
      : item,
  );
}

export function suppliedCitations(items: EvidenceItem[]): string[] {
  const tokens = new Set<string>();
  for (const item of items) {
    for (const token of item.citations) tokens.add(token);
  }
  return [...tokens];
}
