import { extractCitations } from "./citations.js";
import { GenerationError, QueryCancelledError, errorMessage } from "./errors.js";
import { suppliedCitations } from "./fusion.js";
import type { Logger } from "./logger.js";
import type { OpenRouterClient } from "./openrouter.js";
import { INSUFFICIENT_EVIDENCE_ANSWER, buildAnswerPrompt, type AnswerPrompt } from "./prompts.js";
import { withTimeout } from "./timeout.js";
import type { DraftAnswer, EvidenceSet } from "./types.js";

/** `complete(prompt) -> text`. */
export interface GenerationService {
  readonly model: string;
  complete(prompt: AnswerPrompt, signal?: AbortSignal): Promise<string>;
}

export class OpenRouterGenerationService implements GenerationService {
  constructor(
    private readonly client: OpenRouterClient,
    readonly model: string,
    private readonly maxTokens: number,
  ) {}

  async complete(prompt: AnswerPrompt, signal?: AbortSignal): Promise<string> {
    return this.client.chat(
      this.model,
      [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
      { maxTokens: this.maxTokens, signal, service: "generation" },
    );
  }
}

function insufficientDraft(supplied: string[]): DraftAnswer {
  return {
    text: INSUFFICIENT_EVIDENCE_ANSWER,
    rawCitations: [],
    suppliedCitations: supplied,
    insufficientEvidence: true,
  };
}

/**
 * Produces a draft from the evidence set only. Exactly one call to the
 * generation service per question; the draft is untrusted until the policy
 * guard has seen it.
 */
export class CitationConstrainedGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly service: GenerationService,
    logger: Logger,
    private readonly timeoutMs: number,
  ) {
    this.logger = logger.child({ component: "generator" });
  }

  async generate(question: string, evidence: EvidenceSet, options: { signal?: AbortSignal } = {}): Promise<DraftAnswer> {
    const supplied = suppliedCitations(evidence.items);
    if (supplied.length === 0) {
      this.logger.info("No citable evidence; returning the insufficient-evidence answer");
      return insufficientDraft([]);
    }

    const prompt = buildAnswerPrompt(question, evidence.items, supplied);

    let reply: string;
    try {
      reply = await withTimeout(
        "answer generation",
        this.timeoutMs,
        (signal) => this.service.complete(prompt, signal),
        options.signal,
      );
    } catch (err) {
      if (err instanceof QueryCancelledError) throw err;
      throw new GenerationError(`Answer generation failed: ${errorMessage(err)}`, err);
    }

    const text = reply.trim();
    if (text === INSUFFICIENT_EVIDENCE_ANSWER) return insufficientDraft(supplied);

    const rawCitations = extractCitations(text);
    this.logger.debug(
      { model: this.service.model, length: text.length, citations: rawCitations.length },
      "Draft answer generated",
    );

    return { text, rawCitations, suppliedCitations: supplied, insufficientEvidence: false };
  }
}
