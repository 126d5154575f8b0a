import { z } from "zod";
import { errorMessage } from "./errors.js";
import { checkEnglish } from "./language-policy.js";
import { logDegraded, type Logger } from "./logger.js";
import { pngDataUrl, type OpenRouterClient } from "./openrouter.js";
import { withTimeout } from "./timeout.js";
import type { FigureEnrichment } from "./types.js";

/** `caption(image) -> {caption, entities, bullets}`; null when the model gave nothing usable. */
export interface Captioner {
  readonly available: boolean;
  caption(png: Uint8Array, signal?: AbortSignal): Promise<FigureEnrichment | null>;
}

/** `extract_text(image) -> string`; null when there is no transcript. */
export interface OcrService {
  readonly available: boolean;
  extractText(png: Uint8Array, signal?: AbortSignal): Promise<string | null>;
}

const CAPTION_PROMPT =
  "You are an expert scientific figure analyst. Analyze the figure and output ONLY valid JSON.\n" +
  "JSON schema:\n" +
  "{\n" +
  '  "caption": "Concise technical caption (1-2 sentences).",\n' +
  '  "entities": ["Scientific entities, symbols, variables, instruments shown."],\n' +
  '  "bullets": ["3-5 bullet points describing what the figure shows."]\n' +
  "}\n" +
  "Rules:\n" +
  "- English only.\n" +
  "- Be precise and technical.\n" +
  "- Do not include markdown.\n";

const OCR_PROMPT =
  "Transcribe all legible text in this image exactly as written (axis labels, legends, annotations). " +
  "Output only the transcript, one line per text element. If there is no text, output nothing.";

const CaptionSchema = z.object({
  caption: z.string().trim().min(1),
  entities: z.array(z.coerce.string()).default([]),
  bullets: z.array(z.coerce.string()).default([]),
});

const JSON_OBJECT_RE = /\{[\s\S]*\}/;

export function parseCaptionJson(text: string): FigureEnrichment | null {
  const candidate = JSON_OBJECT_RE.exec(text)?.[0];
  if (!candidate) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch {
    return null;
  }
  const parsed = CaptionSchema.safeParse(raw);
  if (!parsed.success) return null;
  return {
    caption: parsed.data.caption,
    entities: parsed.data.entities.map((e) => e.trim()).filter(Boolean),
    bullets: parsed.data.bullets.map((b) => b.trim()).filter(Boolean),
  };
}

export class VisionCaptioner implements Captioner {
  readonly available = true;

  constructor(
    private readonly client: OpenRouterClient,
    private readonly model: string,
  ) {}

  async caption(png: Uint8Array, signal?: AbortSignal): Promise<FigureEnrichment | null> {
    const reply = await this.client.chat(
      this.model,
      [
        {
          role: "user",
          content: [
            { type: "text", text: CAPTION_PROMPT },
            { type: "image_url", image_url: { url: pngDataUrl(png) } },
          ],
        },
      ],
      { signal, service: "captioning", maxTokens: 512 },
    );
    return parseCaptionJson(reply);
  }
}

export class NoOpCaptioner implements Captioner {
  readonly available = false;

  async caption(): Promise<FigureEnrichment | null> {
    return null;
  }
}

export class VisionOcrService implements OcrService {
  readonly available = true;

  constructor(
    private readonly client: OpenRouterClient,
    private readonly model: string,
  ) {}

  async extractText(png: Uint8Array, signal?: AbortSignal): Promise<string | null> {
    const reply = await this.client.chat(
      this.model,
      [
        {
          role: "user",
          content: [
            { type: "text", text: OCR_PROMPT },
            { type: "image_url", image_url: { url: pngDataUrl(png) } },
          ],
        },
      ],
      { signal, service: "ocr", maxTokens: 1024 },
    );
    return reply.trim();
  }
}

export class NoOpOcr implements OcrService {
  readonly available = false;

  async extractText(): Promise<string | null> {
    return null;
  }
}

export interface EnrichedFigure {
  ocrText: string | null;
  enrichment: FigureEnrichment | null;
}

/**
 * OCR then captioning for one figure image. Either step failing, timing out
 * or answering in another language leaves its field null; the figure is
 * still stored.
 */
export class FigureEnricher {
  constructor(
    private readonly ocr: OcrService,
    private readonly captioner: Captioner,
    private readonly logger: Logger,
    private readonly timeoutMs: number,
  ) {
    if (!ocr.available) logDegraded(logger, "ocr", "OCR unavailable; figures have no transcript");
    if (!captioner.available) logDegraded(logger, "captioning", "captioning unavailable; figures are OCR-only");
  }

  async enrich(png: Uint8Array, figureLabel: string): Promise<EnrichedFigure> {
    const ocrText = await this.step("ocr", figureLabel, (signal) => this.ocr.extractText(png, signal));
    const enrichment = await this.step("captioning", figureLabel, (signal) => this.captioner.caption(png, signal));

    return {
      ocrText: ocrText !== null && checkEnglish(ocrText) ? ocrText : this.dropNonEnglish("ocr", figureLabel, ocrText),
      enrichment:
        enrichment !== null && checkEnglish([enrichment.caption, ...enrichment.entities, ...enrichment.bullets].join("\n"))
          ? enrichment
          : this.dropNonEnglish("captioning", figureLabel, enrichment),
    };
  }

  private async step<T>(
    capability: string,
    figureLabel: string,
    run: (signal: AbortSignal) => Promise<T | null>,
  ): Promise<T | null> {
    try {
      return await withTimeout(`${capability} for ${figureLabel}`, this.timeoutMs, run);
    } catch (err) {
      logDegraded(this.logger, capability, `${capability} failed for ${figureLabel}: ${errorMessage(err)}`);
      return null;
    }
  }

  private dropNonEnglish<T>(capability: string, figureLabel: string, value: T | null): null {
    if (value !== null) {
      this.logger.warn({ capability, figure: figureLabel }, "Discarded non-English figure text");
    }
    return null;
  }
}
