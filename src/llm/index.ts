export * from "./types";
export * from "./fingerprint";
export * from "./cache";
export * from "./gateway";
export * from "./call-log";
export * from "./factory";
export * from "./backends";
