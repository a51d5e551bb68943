/**
 * Google Gemini generateContent backend
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

export interface GoogleBackendOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  fetch?: FetchLike;
}

export class GoogleBackend implements LLMBackend {
  readonly provider = "google-gemini" as const;

  constructor(private readonly options: GoogleBackendOptions) {}

  async generate(
    request: LLMRequest,
    { signal }: GenerateOptions = {},
  ): Promise<string> {
    const { apiKey, model, baseUrl } = this.options;
    if (!apiKey) {
      throw missingApiKey(this.provider);
    }

    const generationConfig = {
      ...(request.temperature !== undefined
        ? { temperature: request.temperature }
        : {}),
      ...(request.maxTokens !== undefined
        ? { maxOutputTokens: request.maxTokens }
        : {}),
    };

    const data = await postJson({
      provider: this.provider,
      url: `${baseUrl}/models/${model}:generateContent`,
      // Header instead of the ?key= query parameter
      headers: { "x-goog-api-key": apiKey },
      body: {
        contents: [{ role: "user", parts: [{ text: request.prompt }] }],
        ...(request.system
          ? { systemInstruction: { parts: [{ text: request.system }] } }
          : {}),
        ...(Object.keys(generationConfig).length > 0
          ? { generationConfig }
          : {}),
      },
      fetch: this.options.fetch,
      signal,
    });

    const parts = pick(data, "candidates", 0, "content", "parts");
    if (!Array.isArray(parts)) {
      throw malformed(this.provider, "candidates[0].content.parts is missing");
    }

    const texts = parts.flatMap((part: unknown) =>
      isRecord(part) && typeof part.text === "string" ? [part.text] : [],
    );
    if (texts.length === 0) {
      throw malformed(this.provider, "no text in candidate parts");
    }
    return texts.join("");
  }
}
