/**
 * Request Fingerprints
 * Deterministic cache keys derived from the full request payload
 */

import { createHash } from "node:crypto";
import type { LLMRequest } from "./types";

/**
 * Canonical JSON: object keys sorted, undefined fields dropped
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function normalizeRequest(request: LLMRequest | string): LLMRequest {
  return typeof request === "string" ? { prompt: request } : request;
}

/**
 * SHA-256 hex digest of the canonical request. The provider is not an input.
 */
export function fingerprint(request: LLMRequest | string): string {
  const { prompt, system, temperature, maxTokens } = normalizeRequest(request);
  return createHash("sha256")
    .update(canonicalJson({ prompt, system, temperature, maxTokens }))
    .digest("hex");
}
