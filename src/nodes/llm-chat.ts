/**
 * LLM Chat Node
 * Sends a prompt built from the context through the gateway and stores
 * the response text back into the context.
 */

import { Node, type NodeOptions } from "../flow/nodes";
import type { ReadonlyContext, SharedContext } from "../flow/shared";
import { DEFAULT_ACTION, type Action, type ExecContext } from "../flow/types";
import { LLM_RETRY_POLICY } from "../runtime/retry";
import type { LLMGateway } from "../llm/gateway";
import type { LLMRequest, ProviderId } from "../llm/types";

export interface LLMChatNodeOptions<T extends object>
  extends NodeOptions<LLMRequest, string> {
  gateway: LLMGateway;
  /** Build the request from the context. Throw to fail as a precondition. */
  request(context: ReadonlyContext<T>): LLMRequest | string;
  /** Write the response into the context */
  store(context: SharedContext<T>, text: string): void;
  /** Provider for this node (default: the gateway's) */
  provider?: ProviderId;
  /** Set false to always call the provider */
  useCache?: boolean;
}

export class LLMChatNode<T extends object = Record<string, unknown>> extends Node<
  T,
  LLMRequest,
  string
> {
  private readonly chat: LLMChatNodeOptions<T>;

  /** Retries default to LLM_RETRY_POLICY; `retry` overrides merge onto it */
  constructor(options: LLMChatNodeOptions<T>) {
    super({ ...options, retry: { ...LLM_RETRY_POLICY, ...options.retry } });
    this.chat = options;
  }

  prep(context: ReadonlyContext<T>): LLMRequest {
    const request = this.chat.request(context);
    return typeof request === "string" ? { prompt: request } : request;
  }

  exec(request: LLMRequest, ctx: ExecContext): Promise<string> {
    return this.chat.gateway.call(request, {
      provider: this.chat.provider,
      useCache: this.chat.useCache,
      signal: ctx.signal,
    });
  }

  post(context: SharedContext<T>, _request: LLMRequest, text: string): Action {
    this.chat.store(context, text);
    return DEFAULT_ACTION;
  }
}
