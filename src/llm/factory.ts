/**
 * Gateway wiring from configuration
 */

import type { StepwireConfig } from "../config/config";
import { AnthropicBackend } from "./backends/anthropic";
import { GoogleBackend } from "./backends/google";
import type { FetchLike } from "./backends/http";
import { OpenAIBackend } from "./backends/openai";
import { FileCacheStore, type CacheStore } from "./cache";
import { CallLogFile } from "./call-log";
import { LLMGateway } from "./gateway";
import type { GatewayLogger } from "./types";

export interface GatewayOverrides {
  /** Replaces the file cache (ignored when caching is disabled) */
  cache?: CacheStore;
  /** Replaces the call log file */
  logger?: GatewayLogger;
  fetch?: FetchLike;
}

export interface ConfiguredGateway {
  gateway: LLMGateway;
  /** Present when config.logDir is set and no logger override was given */
  callLog?: CallLogFile;
}

export function createGateway(
  config: StepwireConfig,
  overrides: GatewayOverrides = {},
): ConfiguredGateway {
  const { fetch } = overrides;
  const backends = [
    new OpenAIBackend({ ...config.openai, fetch }),
    new AnthropicBackend({ ...config.anthropic, fetch }),
    new GoogleBackend({ ...config.google, fetch }),
  ];

  const cache = config.cache.enabled
    ? (overrides.cache ?? new FileCacheStore(config.cache.file))
    : undefined;

  const callLog =
    !overrides.logger && config.logDir
      ? new CallLogFile(config.logDir)
      : undefined;

  const gateway = new LLMGateway({
    backends,
    defaultProvider: config.provider,
    cache,
    logger: overrides.logger ?? callLog?.logger,
  });

  return { gateway, callLog };
}
