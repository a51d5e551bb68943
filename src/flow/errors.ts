/**
 * Flow Errors
 *
 * Error taxonomy for the engine:
 * - PreconditionError: prep could not build its input (never retried)
 * - TransientError / FatalError: explicit classification for exec failures
 * - NodeExecutionError: exec failed for good (retries exhausted or fatal)
 * - ContextConflictError: two nodes wrote the same key under "reject"
 */

export interface FlowErrorOptions {
  /** Name of the node the error belongs to */
  node?: string;
  cause?: unknown;
}

export class FlowError extends Error {
  readonly nodeName?: string;
  /** Whether a failed exec attempt may be repeated with the same input */
  readonly retryable: boolean = false;

  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FlowError";
    this.nodeName = options.node;
  }
}

export class PreconditionError extends FlowError {
  readonly key?: string;

  constructor(message: string, options: FlowErrorOptions & { key?: string } = {}) {
    super(message, options);
    this.name = "PreconditionError";
    this.key = options.key;
  }
}

export class MissingContextKeyError extends PreconditionError {
  constructor(key: string) {
    super(`Missing required context key "${key}"`, { key });
    this.name = "MissingContextKeyError";
  }
}

/** Throw from exec to request another attempt */
export class TransientError extends FlowError {
  override readonly retryable = true;

  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, options);
    this.name = "TransientError";
  }
}

/** Throw from exec to skip remaining attempts and any fallback */
export class FatalError extends FlowError {
  constructor(message: string, options: FlowErrorOptions = {}) {
    super(message, options);
    this.name = "FatalError";
  }
}

export class NodeExecutionError extends FlowError {
  readonly attempts: number;

  constructor(node: string, attempts: number, cause: Error) {
    super(
      `Node "${node}" failed after ${attempts} attempt(s): ${cause.message}`,
      { node, cause },
    );
    this.name = "NodeExecutionError";
    this.attempts = attempts;
  }
}

export class ContextConflictError extends FlowError {
  readonly key: string;
  readonly previousWriter: string;

  constructor(key: string, writer: string, previousWriter: string) {
    super(
      `Node "${writer}" cannot overwrite context key "${key}" written by "${previousWriter}"`,
      { node: writer },
    );
    this.name = "ContextConflictError";
    this.key = key;
    this.previousWriter = previousWriter;
  }
}

export type ErrorClass = "transient" | "fatal";

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Classify a thrown value. Unclassified errors count as transient.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof FlowError) {
    return error.retryable ? "transient" : "fatal";
  }
  if (isAbortError(error)) {
    return "fatal";
  }
  return "transient";
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
