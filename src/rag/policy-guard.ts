import { extractCitations, parseCitation, scanBracketed } from "./citations.js";
import { LANGUAGE_POLICY_MESSAGE } from "./errors.js";
import { checkEnglish } from "./language-policy.js";
import type {
  DraftAnswer,
  GuardResult,
  GuardState,
  PolicyViolation,
  ResolvedCitation,
  ResolvedUnit,
} from "./types.js";

export const CITATION_POLICY_MESSAGE =
  "Citation policy violation: every claim must cite supplied evidence as [doc_id:page:unit_id].";

/** The metadata store, seen from the guard. */
export interface UnitResolver {
  resolve(token: string): ResolvedUnit | null;
}

const ABBREVIATIONS = new Set([
  "e.g.",
  "i.e.",
  "al.",
  "fig.",
  "figs.",
  "eq.",
  "eqs.",
  "ref.",
  "refs.",
  "sec.",
  "vs.",
  "cf.",
  "approx.",
  "no.",
]);

const BOUNDARY_RE = /[.!?](?=\s|$|\[\d+:\d+:\d+\])/g;
const TRAILING_TOKENS_RE = /^(?:\s*\[\d+:\d+:\d+\])+/;
const HEADING_RE = /^#{1,6}\s/;
const CONTENT_RE = /[\p{L}\p{N}]/u;

function endsWithAbbreviation(prefix: string): boolean {
  const word = prefix.split(/\s+/).pop() ?? "";
  return ABBREVIATIONS.has(`${word.replace(/^[(\["']+/, "").toLowerCase()}.`);
}

/**
 * Split per line, then after `.`, `!` or `?` followed by whitespace, end of
 * line or a citation token. Tokens right after the terminator stay with their
 * sentence.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    let start = 0;
    for (const m of line.matchAll(BOUNDARY_RE)) {
      const end = (m.index ?? 0) + 1;
      if (end <= start) continue;
      if (m[0] === "." && endsWithAbbreviation(line.slice(start, end - 1))) continue;
      const trailing = TRAILING_TOKENS_RE.exec(line.slice(end));
      const stop = end + (trailing ? trailing[0].length : 0);
      sentences.push(line.slice(start, stop).trim());
      start = stop;
    }
    sentences.push(line.slice(start).trim());
  }
  return sentences.filter((s) => s.length > 0);
}

/** Questions, lead-ins ending in `:`, headings and bare fragments carry no claim. */
export function requiresCitation(sentence: string): boolean {
  if (HEADING_RE.test(sentence)) return false;
  const content = sentence.replace(/\[[^\[\]]*\]/g, "").trim();
  if (!CONTENT_RE.test(content)) return false;
  return !(content.endsWith("?") || content.endsWith(":"));
}

function excerpt(sentence: string, max = 80): string {
  return sentence.length > max ? `${sentence.slice(0, max - 3)}...` : sentence;
}

/**
 * Every draft passes through here before it reaches the user:
 * received -> script_checked -> citations_checked -> accepted | rejected.
 */
export class PolicyGuard {
  constructor(private readonly resolver: UnitResolver) {}

  enforce(draft: DraftAnswer): GuardResult {
    const states: GuardState[] = ["received"];
    const reject = (violation: PolicyViolation): GuardResult => {
      states.push("rejected");
      return { ok: false, violation, states };
    };

    if (!checkEnglish(draft.text)) {
      return reject({ kind: "language", message: LANGUAGE_POLICY_MESSAGE });
    }
    states.push("script_checked");

    if (draft.insufficientEvidence) {
      states.push("citations_checked", "accepted");
      return { ok: true, answer: { text: draft.text, resolvedCitations: [] }, states };
    }

    const details: string[] = [];
    const resolved: ResolvedCitation[] = [];
    const supplied = new Set(draft.suppliedCitations);
    const seen = new Set<string>();

    if (draft.text.trim().length === 0) details.push("Answer is empty");

    for (const segment of scanBracketed(draft.text)) {
      const token = segment.text;
      const ref = parseCitation(token);
      if (!ref) {
        details.push(`Malformed citation ${token}`);
        continue;
      }
      if (!supplied.has(token)) {
        details.push(`Citation ${token} was not supplied as evidence`);
        continue;
      }
      const unit = this.resolver.resolve(token);
      if (!unit) {
        details.push(`Citation ${token} does not resolve to a stored chunk or figure`);
        continue;
      }
      if (seen.has(token)) continue;
      seen.add(token);
      resolved.push({ kind: unit.kind, docId: ref.docId, page: ref.page, unitId: ref.unitId });
    }

    for (const sentence of splitSentences(draft.text)) {
      if (requiresCitation(sentence) && extractCitations(sentence).length === 0) {
        details.push(`Uncited sentence: "${excerpt(sentence)}"`);
      }
    }
    states.push("citations_checked");

    if (details.length > 0) {
      return reject({ kind: "citation", message: CITATION_POLICY_MESSAGE, details });
    }

    states.push("accepted");
    return { ok: true, answer: { text: draft.text, resolvedCitations: resolved }, states };
  }
}
