export { LLMChatNode, type LLMChatNodeOptions } from "./llm-chat";
