/**
 * LLM Gateway
 *
 * Makes a remote text-generation call look like a deterministic function:
 * 1. Fingerprint the request (provider-agnostic)
 * 2. Return the cached response on a hit, without contacting any backend
 * 3. On a miss, dispatch to the selected backend and cache its response
 *
 * Failed calls are never cached, so the next identical call retries.
 * Cache read and write failures are logged and never fail the call.
 */

import { toError } from "../flow/errors";
import type { CacheStore } from "./cache";
import { fingerprint, normalizeRequest } from "./fingerprint";
import {
  GatewayError,
  type GatewayLogger,
  type LLMBackend,
  type LLMRequest,
  type ProviderId,
} from "./types";

export interface GatewayOptions {
  backends: LLMBackend[];
  /** Provider used when a call names none */
  defaultProvider: ProviderId;
  /** Omit to disable caching entirely */
  cache?: CacheStore;
  /** Default for calls that don't set useCache (default: true) */
  useCache?: boolean;
  logger?: GatewayLogger;
}

export interface CallOptions {
  provider?: ProviderId;
  /** Skip the cache for this call (both lookup and store) */
  useCache?: boolean;
  signal?: AbortSignal;
}

/** Prompts and responses are logged up to this many characters */
const LOG_PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > LOG_PREVIEW_LENGTH
    ? `${text.substring(0, LOG_PREVIEW_LENGTH)}...`
    : text;
}

export class LLMGateway {
  readonly defaultProvider: ProviderId;
  private readonly backends = new Map<ProviderId, LLMBackend>();
  private readonly cache?: CacheStore;
  private readonly useCache: boolean;
  private readonly logger: GatewayLogger;

  constructor(options: GatewayOptions) {
    for (const backend of options.backends) {
      this.backends.set(backend.provider, backend);
    }
    this.defaultProvider = options.defaultProvider;
    this.cache = options.cache;
    this.useCache = options.useCache ?? true;
    this.logger = options.logger ?? (() => {});
  }

  hasBackend(provider: ProviderId): boolean {
    return this.backends.has(provider);
  }

  /**
   * Generate text for `request`, from the cache when possible
   */
  async call(
    request: LLMRequest | string,
    options: CallOptions = {},
  ): Promise<string> {
    const payload = normalizeRequest(request);
    const provider = options.provider ?? this.defaultProvider;
    const cache =
      (options.useCache ?? this.useCache) ? this.cache : undefined;
    const key = fingerprint(payload);

    this.logger("info", `PROMPT (${provider}): ${preview(payload.prompt)}`);

    if (cache) {
      const cached = await this.lookup(cache, key);
      if (cached !== undefined) {
        this.logger("info", `CACHE HIT ${key.substring(0, 12)}`);
        return cached;
      }
      this.logger("info", `CACHE MISS ${key.substring(0, 12)}`);
    }

    const backend = this.backends.get(provider);
    if (!backend) {
      throw new GatewayError(`No backend registered for provider "${provider}"`);
    }

    let text: string;
    try {
      text = await backend.generate(payload, { signal: options.signal });
    } catch (e) {
      this.logger("error", `FAILED (${provider}): ${toError(e).message}`);
      throw e;
    }

    this.logger("info", `RESPONSE (${provider}): ${preview(text)}`);

    if (cache) {
      try {
        await cache.put(key, text);
      } catch (e) {
        // The response is still good; only persistence failed
        this.logger("error", `Failed to save cache entry: ${toError(e).message}`);
      }
    }

    return text;
  }

  /**
   * A cache that cannot be read counts as a miss; the provider still answers
   */
  private async lookup(
    cache: CacheStore,
    key: string,
  ): Promise<string | undefined> {
    try {
      return await cache.get(key);
    } catch (e) {
      this.logger("error", `Failed to read cache: ${toError(e).message}`);
      return undefined;
    }
  }
}
