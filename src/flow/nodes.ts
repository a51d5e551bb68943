/**
 * Node Types
 *
 * Every step of a flow obeys the prep → exec → post lifecycle:
 * 1. prep reads the shared context and returns exactly what exec needs
 * 2. exec does the work (remote calls, computation) and never sees the context
 * 3. post writes results back and returns the action label for routing
 *
 * - BaseNode → successor table, chaining, standalone run
 * - Node → single exec with retry and fallback
 * - BatchNode → exec once per prepared item, sequentially, each with retry
 */

import { calculateDelay, sleep, type RetryPolicy } from "../runtime/retry";
import {
  FlowError,
  NodeExecutionError,
  PreconditionError,
  classifyError,
  toError,
} from "./errors";
import type { ReadonlyContext, SharedContext } from "./shared";
import {
  DEFAULT_ACTION,
  type Action,
  type ExecContext,
  type ExecOutcome,
  type MaybePromise,
  type RunOptions,
} from "./types";

/**
 * Retry defaults for nodes: a single attempt, no delay
 */
export const NODE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelay: 0,
  maxDelay: 30000,
  backoffMultiplier: 1,
  jitter: false,
};

export interface BaseNodeOptions {
  /** Name used in logs and errors (default: the class name) */
  name?: string;
}

// ============================================================================
// BaseNode - successor table and composition
// ============================================================================

export abstract class BaseNode<T extends object = Record<string, unknown>> {
  readonly name: string;
  protected readonly successors = new Map<Action, BaseNode<T>>();

  constructor(options: BaseNodeOptions = {}) {
    this.name = options.name ?? this.constructor.name;
  }

  /**
   * Link `node` as the successor for `action` and return it, so that
   * `a.next(b).next(c)` builds a → b → c.
   */
  next<N extends BaseNode<T>>(node: N, action: Action = DEFAULT_ACTION): N {
    if (this.successors.has(action)) {
      console.warn(
        `Successor for action "${action}" on "${this.name}" is being overwritten`,
      );
    }
    this.successors.set(action, node);
    return node;
  }

  /**
   * Link `node` as the successor for `action` and return this node
   */
  on(action: Action, node: BaseNode<T>): this {
    this.next(node, action);
    return this;
  }

  getNextNode(action: Action | undefined): BaseNode<T> | undefined {
    return this.successors.get(action ?? DEFAULT_ACTION);
  }

  /** Registered action labels */
  get actions(): Action[] {
    return Array.from(this.successors.keys());
  }

  /**
   * Drive this node through its lifecycle. Invoked by the flow engine.
   */
  abstract runLifecycle(
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<Action | undefined>;

  /**
   * Run this node on its own. Successors are not followed; use a Flow.
   */
  async run(
    context: SharedContext<T>,
    options: RunOptions = {},
  ): Promise<Action | undefined> {
    if (this.successors.size > 0) {
      console.warn(
        `"${this.name}" has successors that run() will not follow; wrap it in a Flow`,
      );
    }
    return this.runLifecycle(context, options);
  }
}

// ============================================================================
// Lifecycle helpers
// ============================================================================

/**
 * Wrap anything thrown by a prep phase as a precondition failure of `node`
 */
export function toPreconditionError(node: string, error: unknown): FlowError {
  if (error instanceof FlowError && error.nodeName !== undefined) {
    return error;
  }
  const cause = toError(error);
  return new PreconditionError(`Node "${node}" prep failed: ${cause.message}`, {
    node,
    key: cause instanceof PreconditionError ? cause.key : undefined,
    cause,
  });
}

/**
 * Run `post` with writes attributed to `node`; normalizes the action
 */
export async function postProcess<T extends object>(
  node: BaseNode<T>,
  context: SharedContext<T>,
  post: () => MaybePromise<Action | void>,
): Promise<Action | undefined> {
  try {
    const action = await context.writeAs(node, async () => post());
    return typeof action === "string" ? action : undefined;
  } catch (e) {
    if (e instanceof FlowError && e.nodeName !== undefined) {
      throw e;
    }
    const cause = toError(e);
    throw new FlowError(`Node "${node.name}" post failed: ${cause.message}`, {
      node: node.name,
      cause,
    });
  }
}

async function attemptOnce<E>(
  run: (ctx: ExecContext) => MaybePromise<E>,
  ctx: ExecContext,
): Promise<ExecOutcome<E>> {
  try {
    return { status: "success", value: await run(ctx) };
  } catch (e) {
    const error = toError(e);
    if (ctx.signal?.aborted || classifyError(error) === "fatal") {
      return { status: "fatal", error };
    }
    return { status: "transient", error };
  }
}

interface RetryTask<E> {
  node: string;
  policy: RetryPolicy;
  log: (message: string) => void;
  run: (ctx: ExecContext) => MaybePromise<E>;
  fallback: (error: Error) => MaybePromise<E>;
}

/**
 * Attempt `task.run` up to `policy.maxAttempts` times. Transient failures are
 * retried with backoff, fatal ones end immediately. When attempts run out the
 * fallback decides the result; whatever it throws becomes a NodeExecutionError.
 */
export async function executeWithRetry<E>(
  task: RetryTask<E>,
  options: RunOptions,
): Promise<E> {
  const { node, policy } = task;
  const signal = options.signal;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    const outcome = await attemptOnce(task.run, { attempt, signal });

    if (outcome.status === "success") {
      return outcome.value;
    }
    if (outcome.status === "fatal") {
      throw new NodeExecutionError(node, attempt, outcome.error);
    }

    if (attempt >= maxAttempts) {
      task.log(`All ${attempt} attempt(s) failed: ${outcome.error.message}`);
      options.hooks?.onFallback?.(node, outcome.error);
      try {
        return await task.fallback(outcome.error);
      } catch (e) {
        throw new NodeExecutionError(node, attempt, toError(e));
      }
    }

    const delay = calculateDelay(policy, attempt);
    task.log(
      `Attempt ${attempt}/${maxAttempts} failed: ${outcome.error.message}; retrying in ${Math.round(delay)}ms`,
    );
    options.hooks?.onRetry?.(node, attempt, outcome.error, delay);
    await sleep(delay, signal);
  }
}

// ============================================================================
// LifecycleNode - prep and post shared by Node and BatchNode
// ============================================================================

export interface LifecycleNodeOptions extends BaseNodeOptions {
  /** Overrides merged onto NODE_RETRY_POLICY */
  retry?: Partial<RetryPolicy>;
}

export abstract class LifecycleNode<
  T extends object = Record<string, unknown>,
  P = unknown,
  E = unknown,
> extends BaseNode<T> {
  readonly retryPolicy: RetryPolicy;

  constructor(options: LifecycleNodeOptions = {}) {
    super(options);
    this.retryPolicy = { ...NODE_RETRY_POLICY, ...options.retry };
  }

  /** Read inputs from the context. Must not write to it. */
  abstract prep(context: ReadonlyContext<T>): MaybePromise<P>;

  /** Write results to the context and pick the next edge */
  abstract post(
    context: SharedContext<T>,
    prepRes: P,
    execRes: E,
  ): MaybePromise<Action | void>;

  protected abstract runExec(
    prepRes: P,
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<E>;

  async runLifecycle(
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<Action | undefined> {
    options.signal?.throwIfAborted();

    let prepRes: P;
    try {
      prepRes = await this.prep(context);
    } catch (e) {
      throw toPreconditionError(this.name, e);
    }

    const execRes = await this.runExec(prepRes, context, options);
    return postProcess(this, context, () =>
      this.post(context, prepRes, execRes),
    );
  }
}

// ============================================================================
// Node - single exec with retry
// ============================================================================

export interface NodeOptions<P, E> extends LifecycleNodeOptions {
  /** Result to use once every attempt has failed transiently */
  fallback?(prepRes: P, error: Error): MaybePromise<E>;
}

export abstract class Node<
  T extends object = Record<string, unknown>,
  P = unknown,
  E = unknown,
> extends LifecycleNode<T, P, E> {
  private readonly options: NodeOptions<P, E>;

  constructor(options: NodeOptions<P, E> = {}) {
    super(options);
    this.options = options;
  }

  /** Do the work. Receives only what prep returned. */
  abstract exec(prepRes: P, ctx: ExecContext): MaybePromise<E>;

  /**
   * Called once retries are exhausted. Rethrows unless a fallback is configured.
   */
  execFallback(prepRes: P, error: Error): MaybePromise<E> {
    if (this.options.fallback) {
      return this.options.fallback(prepRes, error);
    }
    throw error;
  }

  protected runExec(
    prepRes: P,
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<E> {
    return executeWithRetry(
      {
        node: this.name,
        policy: this.retryPolicy,
        log: (message) => context.log(this.name, message),
        run: (ctx) => this.exec(prepRes, ctx),
        fallback: (error) => this.execFallback(prepRes, error),
      },
      options,
    );
  }
}

// ============================================================================
// BatchNode - one exec per item, in order
// ============================================================================

export interface BatchNodeOptions<I, R> extends LifecycleNodeOptions {
  /** Result for an item once every attempt for it has failed transiently */
  fallback?(item: I, error: Error): MaybePromise<R>;
}

export abstract class BatchNode<
  T extends object = Record<string, unknown>,
  I = unknown,
  R = unknown,
> extends LifecycleNode<T, I[], R[]> {
  private readonly options: BatchNodeOptions<I, R>;

  constructor(options: BatchNodeOptions<I, R> = {}) {
    super(options);
    this.options = options;
  }

  abstract execItem(item: I, ctx: ExecContext): MaybePromise<R>;

  execItemFallback(item: I, error: Error): MaybePromise<R> {
    if (this.options.fallback) {
      return this.options.fallback(item, error);
    }
    throw error;
  }

  protected async runExec(
    items: I[],
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<R[]> {
    context.log(this.name, `Processing ${items.length} items sequentially`);

    const results: R[] = [];
    for (const [index, item] of items.entries()) {
      results.push(
        await executeWithRetry(
          {
            node: this.name,
            policy: this.retryPolicy,
            log: (message) => context.log(this.name, `item ${index}: ${message}`),
            run: (ctx) => this.execItem(item, ctx),
            fallback: (error) => this.execItemFallback(item, error),
          },
          options,
        ),
      );
    }
    return results;
  }
}
