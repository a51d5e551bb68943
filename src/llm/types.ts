/**
 * LLM Gateway Types
 */

import { FlowError } from "../flow/errors";

/**
 * Interchangeable text-generation providers
 */
export const PROVIDERS = [
  "openai-gpt",
  "anthropic-claude",
  "google-gemini",
] as const;

export type ProviderId = (typeof PROVIDERS)[number];

/**
 * Provider-agnostic request payload. Everything here is part of the
 * cache fingerprint.
 */
export interface LLMRequest {
  prompt: string;
  /** System prompt */
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * A concrete remote provider. Backends never cache; the gateway does.
 */
export interface LLMBackend {
  readonly provider: ProviderId;
  generate(request: LLMRequest, options?: GenerateOptions): Promise<string>;
}

export type LogLevel = "info" | "warn" | "error";

export type GatewayLogger = (level: LogLevel, message: string) => void;

// ============================================================================
// Errors
// ============================================================================

/**
 * A backend call failed. `retryable` separates rate limits, timeouts and
 * server errors from bad requests and malformed responses.
 */
export class BackendError extends FlowError {
  override readonly retryable: boolean = false;
  readonly provider: ProviderId;
  readonly status?: number;

  constructor(
    provider: ProviderId,
    message: string,
    options: { retryable: boolean; status?: number; cause?: unknown },
  ) {
    super(`${provider}: ${message}`, { cause: options.cause });
    this.name = "BackendError";
    this.provider = provider;
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

export class GatewayError extends FlowError {
  constructor(message: string) {
    super(message);
    this.name = "GatewayError";
  }
}

export class CacheError extends FlowError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CacheError";
  }
}
