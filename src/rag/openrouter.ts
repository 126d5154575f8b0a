import { QueryCancelledError, RagError, ServiceError, errorMessage } from "./errors.js";

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl: string;
}

export type ContentPart = { type: "text"; text: string } | { type: "image_url"; image_url: { url: string } };

export type MessageContent = string | ContentPart[];

/** Plain text, or a multimodal item for models that embed images. */
export type EmbeddingInput = string | { content: ContentPart[] };

export interface ApiMessage {
  role: "system" | "user" | "assistant";
  content: MessageContent;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  error?: { message?: string };
}

interface EmbeddingResponse {
  data?: Array<{ embedding: number[] }>;
}

/**
 * An aborted request surfaces as the reason its signal carries when that is
 * one of ours (timeout, cancellation), otherwise as a cancellation.
 */
function abortError(signal: AbortSignal, service: string): RagError {
  const reason: unknown = signal.reason;
  return reason instanceof RagError ? reason : new QueryCancelledError(`${service} request`);
}

/** Thin OpenRouter-compatible HTTP client shared by every model service. */
export class OpenRouterClient {
  constructor(private readonly options: OpenRouterClientOptions) {}

  async postJson<T>(service: string, route: string, body: unknown, signal?: AbortSignal): Promise<T> {
    let res: Response;
    try {
      res = await fetch(`${this.options.baseUrl}${route}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw abortError(signal, service);
      throw new ServiceError({ service, message: `${service} request failed: ${errorMessage(err)}`, cause: err });
    }

    try {
      return await this.readJson<T>(service, res);
    } catch (err) {
      if (signal?.aborted) throw abortError(signal, service);
      throw err;
    }
  }

  private async readJson<T>(service: string, res: Response): Promise<T> {
    if (!res.ok) {
      const text = await res.text();
      throw new ServiceError({
        service,
        status: res.status,
        message: `${service} API error (${res.status}): ${text}`,
      });
    }

    return (await res.json()) as T;
  }

  async chat(
    model: string,
    messages: ApiMessage[],
    options: { maxTokens?: number; signal?: AbortSignal; service?: string } = {},
  ): Promise<string> {
    const service = options.service ?? "chat";
    const json = await this.postJson<ChatCompletionResponse>(
      service,
      "/chat/completions",
      {
        model,
        messages,
        temperature: 0,
        max_tokens: options.maxTokens,
      },
      options.signal,
    );
    const content = json.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ServiceError({
        service,
        message: `${service} returned no content${json.error?.message ? `: ${json.error.message}` : ""}`,
      });
    }
    return content;
  }

  async embeddings(
    model: string,
    input: EmbeddingInput[],
    signal?: AbortSignal,
    service = "embeddings",
  ): Promise<number[][]> {
    const json = await this.postJson<EmbeddingResponse>(service, "/embeddings", { model, input }, signal);
    const data = json.data ?? [];
    if (data.length !== input.length) {
      throw new ServiceError({
        service,
        message: `${service} returned ${data.length} vectors for ${input.length} inputs`,
      });
    }
    return data.map((item) => item.embedding);
  }
}

export function pngDataUrl(png: Uint8Array): string {
  return `data:image/png;base64,${Buffer.from(png).toString("base64")}`;
}
