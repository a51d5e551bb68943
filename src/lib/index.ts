/**
 * Stepwire - workflow engine with a memoizing LLM gateway
 *
 * Nodes run a prep → exec → post lifecycle against a shared context;
 * flows chain them through labeled edges.
 */

// Flow engine
export * from "../flow";

// Runtime
export * from "../runtime";

// LLM gateway
export * from "../llm";

// Configuration
export * from "../config";

// Built-in nodes
export * from "../nodes";

// Testing Utilities
export * from "../testing";
