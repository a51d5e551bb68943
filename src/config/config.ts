/**
 * Configuration
 * Reads the environment, applies defaults and validates the result
 */

import Ajv from "ajv";
import addFormats from "ajv-formats";
import type { ProviderId } from "../llm/types";
import { configJsonSchema } from "./json-schema";

export interface EndpointConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
}

export interface StepwireConfig {
  provider: ProviderId;
  cache: {
    enabled: boolean;
    /** Path of the file-backed response cache */
    file: string;
  };
  /** Directory for daily call logs; unset disables them */
  logDir?: string;
  openai: EndpointConfig;
  anthropic: EndpointConfig & { maxTokens: number };
  google: EndpointConfig;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

// Ajv coerces "4096" to 4096 and fills defaults in place
const ajv = new Ajv({ allErrors: true, useDefaults: true, coerceTypes: true });
addFormats(ajv);

const validateConfig = ajv.compile<StepwireConfig>(configJsonSchema);

/** Environment variable behind each config path, for error messages */
const ENV_NAMES: Record<string, string> = {
  "/provider": "LLM_PROVIDER",
  "/cache/enabled": "LLM_CACHE",
  "/cache/file": "LLM_CACHE_FILE",
  "/logDir": "LOG_DIR",
  "/openai/apiKey": "OPENAI_API_KEY",
  "/openai/model": "OPENAI_MODEL",
  "/openai/baseUrl": "OPENAI_BASE_URL",
  "/anthropic/apiKey": "ANTHROPIC_API_KEY",
  "/anthropic/model": "ANTHROPIC_MODEL",
  "/anthropic/baseUrl": "ANTHROPIC_BASE_URL",
  "/anthropic/maxTokens": "ANTHROPIC_MAX_TOKENS",
  "/google/apiKey": "GEMINI_API_KEY",
  "/google/model": "GEMINI_MODEL",
  "/google/baseUrl": "GEMINI_BASE_URL",
};

/**
 * Parse a boolean flag. Unrecognized values are passed through so the
 * schema reports them.
 */
function parseFlag(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return value;
}

/** Drop undefined fields so schema defaults apply */
function defined(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(fields).filter(([, value]) => value !== undefined),
  );
}

/**
 * Build the configuration from environment variables.
 * Empty values count as unset.
 */
export function loadConfig(env: Env = process.env): StepwireConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const candidate: Record<string, unknown> = defined({
    provider: read("LLM_PROVIDER"),
    cache: defined({
      enabled: parseFlag(read("LLM_CACHE")),
      file: read("LLM_CACHE_FILE"),
    }),
    logDir: read("LOG_DIR"),
    openai: defined({
      apiKey: read("OPENAI_API_KEY"),
      model: read("OPENAI_MODEL"),
      baseUrl: read("OPENAI_BASE_URL"),
    }),
    anthropic: defined({
      apiKey: read("ANTHROPIC_API_KEY"),
      model: read("ANTHROPIC_MODEL"),
      baseUrl: read("ANTHROPIC_BASE_URL"),
      maxTokens: read("ANTHROPIC_MAX_TOKENS"),
    }),
    google: defined({
      apiKey: read("GEMINI_API_KEY"),
      model: read("GEMINI_MODEL"),
      baseUrl: read("GEMINI_BASE_URL"),
    }),
  });

  if (!validateConfig(candidate)) {
    const problems = (validateConfig.errors ?? []).map((err) => {
      const path = err.instancePath || "/";
      const name = ENV_NAMES[path] ?? path;
      return `${name} ${err.message ?? "is invalid"}`;
    });
    throw new ConfigError(problems);
  }

  return candidate;
}
