export { loadConfig, ConfigError } from "./config";
export type { StepwireConfig, EndpointConfig, Env } from "./config";
export { configJsonSchema } from "./json-schema";
