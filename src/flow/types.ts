/**
 * Flow Type Definitions
 *
 * Core types shared by nodes, flows and the runtime.
 */

/**
 * Label returned by a node's post phase to pick the next edge
 */
export type Action = string;

export const DEFAULT_ACTION: Action = "default";

export type MaybePromise<T> = T | Promise<T>;

/**
 * The only input exec receives besides its prepared value
 */
export interface ExecContext {
  /** Current attempt number (1-indexed) */
  attempt: number;
  /** Cancellation for the run; remote calls should pass it on */
  signal?: AbortSignal;
}

/**
 * Result of a single exec attempt
 */
export type ExecOutcome<E> =
  | { status: "success"; value: E }
  | { status: "transient"; error: Error }
  | { status: "fatal"; error: Error };

/**
 * Lifecycle callbacks, observed for every node a flow visits
 */
export interface LifecycleHooks {
  onNodeStart?(node: string): void;
  onNodeComplete?(node: string, action: Action | undefined): void;
  onRetry?(node: string, attempt: number, error: Error, delay: number): void;
  onFallback?(node: string, error: Error): void;
}

export interface RunOptions {
  /** Aborts the run before the next node or attempt, and inside remote calls */
  signal?: AbortSignal;
  hooks?: LifecycleHooks;
}
