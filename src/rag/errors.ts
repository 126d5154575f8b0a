export type RagErrorCode =
  | "configuration"
  | "language_policy"
  | "retrieval"
  | "generation"
  | "service"
  | "cancelled"
  | "timeout"
  | "ingestion";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  isRetryable(): boolean {
    return false;
  }
}

/** Fatal at startup: bad output language, missing or mismatched model identifier. */
export class ConfigurationError extends RagError {
  constructor(message: string) {
    super("configuration", message);
  }
}

export const LANGUAGE_POLICY_MESSAGE = "Language policy violation: output must be English.";

export class LanguagePolicyError extends RagError {
  constructor() {
    super("language_policy", LANGUAGE_POLICY_MESSAGE);
  }
}

export class TimeoutError extends RagError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }

  override isRetryable(): boolean {
    return true;
  }
}

export class QueryCancelledError extends RagError {
  constructor(operation: string) {
    super("cancelled", `${operation} was cancelled`);
  }
}

/** HTTP-level failure of an external model service. */
export class ServiceError extends RagError {
  readonly service: string;
  readonly status?: number;

  constructor(params: { service: string; message: string; status?: number; cause?: unknown }) {
    super("service", params.message, { cause: params.cause });
    this.service = params.service;
    this.status = params.status;
  }

  override isRetryable(): boolean {
    if (this.status === undefined) return true;
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export class RetrievalError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("retrieval", message, { cause });
  }

  override isRetryable(): boolean {
    return true;
  }
}

export class GenerationError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("generation", message, { cause });
  }

  override isRetryable(): boolean {
    return true;
  }
}

export class IngestionError extends RagError {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super("ingestion", message, { cause });
    this.filePath = filePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
