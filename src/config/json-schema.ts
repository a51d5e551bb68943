/**
 * JSON Schema for the resolved configuration
 * Defaults live here and are applied by Ajv (useDefaults)
 */

import { PROVIDERS } from "../llm/types";

const endpointProperties = {
  apiKey: { type: "string", minLength: 1 },
} as const;

export const configJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "Stepwire Configuration",
  type: "object",
  required: ["provider", "cache", "openai", "anthropic", "google"],
  additionalProperties: false,
  properties: {
    provider: {
      type: "string",
      enum: [...PROVIDERS],
      default: "google-gemini",
    },
    cache: {
      type: "object",
      required: ["enabled", "file"],
      additionalProperties: false,
      properties: {
        enabled: { type: "boolean", default: true },
        file: { type: "string", minLength: 1, default: "llm_cache.json" },
      },
    },
    logDir: { type: "string", minLength: 1 },
    openai: {
      type: "object",
      required: ["model", "baseUrl"],
      additionalProperties: false,
      properties: {
        ...endpointProperties,
        model: { type: "string", minLength: 1, default: "gpt-4o-mini" },
        baseUrl: {
          type: "string",
          format: "uri",
          default: "https://api.openai.com/v1",
        },
      },
    },
    anthropic: {
      type: "object",
      required: ["model", "baseUrl", "maxTokens"],
      additionalProperties: false,
      properties: {
        ...endpointProperties,
        model: {
          type: "string",
          minLength: 1,
          default: "claude-3-7-sonnet-latest",
        },
        baseUrl: {
          type: "string",
          format: "uri",
          default: "https://api.anthropic.com/v1",
        },
        maxTokens: { type: "integer", minimum: 1, default: 4096 },
      },
    },
    google: {
      type: "object",
      required: ["model", "baseUrl"],
      additionalProperties: false,
      properties: {
        ...endpointProperties,
        model: {
          type: "string",
          minLength: 1,
          default: "gemini-2.5-pro-exp-03-25",
        },
        baseUrl: {
          type: "string",
          format: "uri",
          default: "https://generativelanguage.googleapis.com/v1beta",
        },
      },
    },
  },
};
