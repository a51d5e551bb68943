/**
 * Flow Engine
 *
 * - Node / BatchNode: prep → exec → post with retry and fallback
 * - Flow: action-labelled chain of nodes; nests as a node
 * - SharedContext: the typed blackboard passed to every node
 */

export * from "./types";
export * from "./errors";
export * from "./shared";
export * from "./nodes";
export * from "./flow";
