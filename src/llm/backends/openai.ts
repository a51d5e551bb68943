/**
 * OpenAI chat completions backend
 */

import type { GenerateOptions, LLMBackend, LLMRequest } from "../types";
import {
  malformed,
  missingApiKey,
  pick,
  postJson,
  type FetchLike,
} from "./http";

export interface OpenAIBackendOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  fetch?: FetchLike;
}

export class OpenAIBackend implements LLMBackend {
  readonly provider = "openai-gpt" as const;

  constructor(private readonly options: OpenAIBackendOptions) {}

  async generate(
    request: LLMRequest,
    { signal }: GenerateOptions = {},
  ): Promise<string> {
    const { apiKey, model, baseUrl } = this.options;
    if (!apiKey) {
      throw missingApiKey(this.provider);
    }

    const messages: Array<{ role: string; content: string }> = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    const data = await postJson({
      provider: this.provider,
      url: `${baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${apiKey}` },
      body: {
        model,
        messages,
        ...(request.temperature !== undefined
          ? { temperature: request.temperature }
          : {}),
        ...(request.maxTokens !== undefined
          ? { max_tokens: request.maxTokens }
          : {}),
      },
      fetch: this.options.fetch,
      signal,
    });

    const content = pick(data, "choices", 0, "message", "content");
    if (typeof content !== "string") {
      throw malformed(this.provider, "choices[0].message.content is missing");
    }
    return content;
  }
}
