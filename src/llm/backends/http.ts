/**
 * Shared HTTP plumbing for provider backends
 */

import { isAbortError } from "../../flow/errors";
import { BackendError, type ProviderId } from "../types";

export type FetchLike = typeof fetch;

/** Statuses worth another attempt */
const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

export interface PostJsonOptions {
  provider: ProviderId;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

/**
 * POST a JSON body and return the parsed JSON response.
 * Network failures and retryable statuses become retryable BackendErrors.
 */
export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { provider, url } = options;
  const fetchImpl = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: options.signal,
    });
  } catch (e) {
    if (isAbortError(e) || options.signal?.aborted) {
      throw e;
    }
    const message = e instanceof Error ? e.message : String(e);
    throw new BackendError(provider, `Network error: ${message}`, {
      retryable: true,
      cause: e,
    });
  }

  if (!response.ok) {
    const detail = await response.text();
    throw new BackendError(
      provider,
      `API error (${response.status}): ${detail}`,
      { retryable: isRetryableStatus(response.status), status: response.status },
    );
  }

  try {
    return await response.json();
  } catch (e) {
    throw new BackendError(provider, "Response body is not valid JSON", {
      retryable: false,
      status: response.status,
      cause: e,
    });
  }
}

// ============================================================================
// Response narrowing
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Follow a path of keys and indices through parsed JSON
 */
export function pick(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const step of path) {
    if (typeof step === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[step];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[step];
    }
  }
  return current;
}

export function malformed(provider: ProviderId, what: string): BackendError {
  return new BackendError(provider, `Malformed response: ${what}`, {
    retryable: false,
  });
}

export function missingApiKey(provider: ProviderId): BackendError {
  return new BackendError(provider, "No API key configured", {
    retryable: false,
  });
}
