export * from "./http";
export * from "./openai";
export * from "./anthropic";
export * from "./google";
