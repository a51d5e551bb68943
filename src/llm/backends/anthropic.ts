/**
 * Anthropic messages backend
 */

import type { GenerateOptions, LLMBackend, LLMRequest } from "../types";
import {
  isRecord,
  malformed,
  missingApiKey,
  pick,
  postJson,
  type FetchLike,
} from "./http";

export const ANTHROPIC_VERSION = "2023-06-01";

export interface AnthropicBackendOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  /** Used when the request sets no maxTokens; the API requires one */
  maxTokens: number;
  fetch?: FetchLike;
}

export class AnthropicBackend implements LLMBackend {
  readonly provider = "anthropic-claude" as const;

  constructor(private readonly options: AnthropicBackendOptions) {}

  async generate(
    request: LLMRequest,
    { signal }: GenerateOptions = {},
  ): Promise<string> {
    const { apiKey, model, baseUrl } = this.options;
    if (!apiKey) {
      throw missingApiKey(this.provider);
    }

    const data = await postJson({
      provider: this.provider,
      url: `${baseUrl}/messages`,
      headers: {
        "x-api-key": apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      body: {
        model,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        ...(request.system ? { system: request.system } : {}),
        ...(request.temperature !== undefined
          ? { temperature: request.temperature }
          : {}),
        messages: [{ role: "user", content: request.prompt }],
      },
      fetch: this.options.fetch,
      signal,
    });

    const blocks = pick(data, "content");
    if (!Array.isArray(blocks)) {
      throw malformed(this.provider, "content is not an array");
    }

    // Thinking blocks carry no answer text
    const texts = blocks.flatMap((block: unknown) =>
      isRecord(block) && block.type === "text" && typeof block.text === "string"
        ? [block.text]
        : [],
    );
    if (texts.length === 0) {
      throw malformed(this.provider, "no text block in content");
    }
    return texts.join("");
  }
}
