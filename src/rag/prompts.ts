import type { EvidenceItem } from "./types.js";

export const INSUFFICIENT_EVIDENCE_ANSWER =
  "The indexed documents do not contain enough evidence to answer this question.";

export const ANSWER_SYSTEM_PROMPT =
  "You are a scientific assistant answering questions about a collection of research papers.\n" +
  "You MUST follow these rules:\n" +
  "- Output English only.\n" +
  "- Use only the provided evidence. Do not add outside knowledge.\n" +
  "- End every factual sentence with one or more citation tokens copied from the allowed list.\n" +
  "- Citation format is exactly [doc_id:page:unit_id], for example [3:2:5]. Never change the numbers.\n" +
  "- Do not use square brackets for anything other than citation tokens.\n" +
  "- Write plain sentences or bullet points. No headings, no tables, no markdown links.\n" +
  `- If the evidence is insufficient, reply with exactly: ${INSUFFICIENT_EVIDENCE_ANSWER}\n`;

function formatChunk(item: Extract<EvidenceItem, { kind: "chunk" }>): string {
  const section = item.sectionName ? ` (${item.sectionName})` : "";
  return `- ${item.citations.join(" ")}${section} ${item.text.replace(/\s+/g, " ").trim()}`;
}

function formatFigure(item: Extract<EvidenceItem, { kind: "figure" }>): string {
  const lines = [`- ${item.citations.join(" ")} Figure on page ${item.page} of document ${item.docId}.`];
  if (item.enrichment) {
    lines.push(`  Caption: ${item.enrichment.caption}`);
    if (item.enrichment.entities.length > 0) {
      lines.push(`  Entities: ${item.enrichment.entities.join(", ")}`);
    }
    for (const bullet of item.enrichment.bullets) lines.push(`  * ${bullet}`);
  }
  if (item.ocrText) lines.push(`  Text in figure: ${item.ocrText.replace(/\s+/g, " ").trim()}`);
  return lines.join("\n");
}

function formatPage(item: Extract<EvidenceItem, { kind: "page" }>): string {
  const cite = item.citations.length > 0 ? `cite its figures ${item.citations.join(" ")}` : "no citable figures";
  return `- Page ${item.page} of document ${item.docId} matched visually (${cite}).`;
}

export function formatEvidenceItem(item: EvidenceItem): string {
  switch (item.kind) {
    case "chunk":
      return formatChunk(item);
    case "figure":
      return formatFigure(item);
    case "page":
      return formatPage(item);
  }
}

export interface AnswerPrompt {
  system: string;
  user: string;
}

export function buildAnswerPrompt(question: string, items: EvidenceItem[], allowed: string[]): AnswerPrompt {
  const text = items.filter((i) => i.kind === "chunk").map(formatEvidenceItem);
  const visual = items.filter((i) => i.kind !== "chunk").map(formatEvidenceItem);

  const user =
    `Question:\n${question.trim()}\n\n` +
    `Evidence (text chunks):\n${text.length > 0 ? text.join("\n") : "(none)"}\n\n` +
    `Evidence (pages and figures):\n${visual.length > 0 ? visual.join("\n") : "(none)"}\n\n` +
    `Allowed citation tokens: ${allowed.join(" ")}\n`;

  return { system: ANSWER_SYSTEM_PROMPT, user };
}
