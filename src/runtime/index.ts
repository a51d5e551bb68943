/**
 * Runtime Module
 * Flow execution wrapper and retry policies
 */

export * from "./runtime";
export * from "./retry";
