import type { CitationRef } from "./types.js";

const TOKEN_RE = /^\[(\d+):(\d+):(\d+)\]$/;
const BRACKETED_RE = /\[[^\[\]]*\]/g;

export function formatCitation(ref: CitationRef): string {
  return `[${ref.docId}:${ref.page}:${ref.unitId}]`;
}

/** Parse one bracketed token. Anything but `[int:int:int]` with no whitespace is null. */
export function parseCitation(token: string): CitationRef | null {
  const m = TOKEN_RE.exec(token);
  if (!m) return null;
  const [docId, page, unitId] = [Number(m[1]), Number(m[2]), Number(m[3])];
  if (!Number.isSafeInteger(docId) || !Number.isSafeInteger(page) || !Number.isSafeInteger(unitId)) {
    return null;
  }
  return { docId, page, unitId };
}

export interface BracketedSegment {
  text: string;
  index: number;
}

export function scanBracketed(text: string): BracketedSegment[] {
  const out: BracketedSegment[] = [];
  for (const m of text.matchAll(BRACKETED_RE)) {
    out.push({ text: m[0], index: m.index ?? 0 });
  }
  return out;
}

export function isCitationToken(segment: string): boolean {
  return parseCitation(segment) !== null;
}

/** Syntactically valid tokens in order of appearance, duplicates kept. */
export function extractCitations(text: string): string[] {
  return scanBracketed(text)
    .map((s) => s.text)
    .filter(isCitationToken);
}

export function citationKey(ref: CitationRef): string {
  return `${ref.docId}:${ref.page}:${ref.unitId}`;
}
