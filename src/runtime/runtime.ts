/**
 * Stepwire Runtime
 * Runs a flow and reports the outcome instead of throwing
 */

import type { Flow } from "../flow/flow";
import { FlowError, toError } from "../flow/errors";
import {
  SharedContext,
  type SharedContextOptions,
} from "../flow/shared";
import type { Action, LifecycleHooks } from "../flow/types";

// ============================================================================
// Execution Types
// ============================================================================

export interface ExecutionOptions<T extends object> extends LifecycleHooks {
  /** Initial data for a new context (ignored when `context` is given) */
  initialData?: Partial<T>;
  /** Run against an existing context instead of creating one */
  context?: SharedContext<T>;
  /** Overwrite handling for a new context */
  writePolicy?: SharedContextOptions["writePolicy"];
  /** Log retention for a new context */
  maxLogs?: number;
  /** Callback for log messages of a new context */
  onLog?: (message: string) => void;
  /** Callback for the error that aborted the run */
  onError?: (nodeName: string, error: Error) => void;
  /** Cancels the run */
  signal?: AbortSignal;
}

export interface ExecutionResult<T extends object> {
  /** Whether the flow ran to completion */
  success: boolean;
  /** The context the flow ran against, including partial writes on failure */
  context: SharedContext<T>;
  /** Snapshot of the context data when the run ended */
  data: Partial<T>;
  /** All logs from execution */
  logs: string[];
  /** Action returned by the flow */
  action?: Action;
  /** Error information if failed */
  error?: {
    nodeName: string;
    message: string;
    cause: Error;
  };
  /** Duration in milliseconds */
  duration: number;
}

// ============================================================================
// Runtime Class
// ============================================================================

export class Runtime<T extends object = Record<string, unknown>> {
  constructor(private readonly flow: Flow<T>) {}

  /**
   * Execute the flow once
   */
  async execute(
    options: ExecutionOptions<T> = {},
  ): Promise<ExecutionResult<T>> {
    const context =
      options.context ??
      new SharedContext<T>(options.initialData, {
        writePolicy: options.writePolicy,
        maxLogs: options.maxLogs,
        onLog: options.onLog,
      });

    const startTime = performance.now();

    try {
      const action = await this.flow.run(context, {
        signal: options.signal,
        hooks: {
          onNodeStart: options.onNodeStart,
          onNodeComplete: options.onNodeComplete,
          onRetry: options.onRetry,
          onFallback: options.onFallback,
        },
      });

      return {
        success: true,
        context,
        data: context.snapshot(),
        logs: context.logs,
        action,
        duration: performance.now() - startTime,
      };
    } catch (e) {
      const cause = toError(e);
      const nodeName =
        cause instanceof FlowError && cause.nodeName !== undefined
          ? cause.nodeName
          : "runtime";

      context.log("runtime", `Run failed: ${cause.message}`);
      options.onError?.(nodeName, cause);

      return {
        success: false,
        context,
        data: context.snapshot(),
        logs: context.logs,
        error: { nodeName, message: cause.message, cause },
        duration: performance.now() - startTime,
      };
    }
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Run a flow once and report the outcome
 */
export async function runFlow<T extends object>(
  flow: Flow<T>,
  options: ExecutionOptions<T> = {},
): Promise<ExecutionResult<T>> {
  return new Runtime(flow).execute(options);
}
