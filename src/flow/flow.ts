/**
 * Flow
 *
 * Walks a chain of nodes from its start node, running each node's full
 * lifecycle against the live shared context and following the edge that
 * matches the returned action. A Flow is itself a node, so a built chain
 * can be nested as one step of a larger one.
 */

import { FlowError, toError } from "./errors";
import { BaseNode, postProcess, toPreconditionError } from "./nodes";
import type { ReadonlyContext, SharedContext } from "./shared";
import {
  DEFAULT_ACTION,
  type Action,
  type MaybePromise,
  type RunOptions,
} from "./types";

export interface FlowOptions {
  name?: string;
  /**
   * What to do when a node returns an action with no edge:
   * - "end": finish the run (default)
   * - "default": follow the node's default edge if it has one
   */
  unmatchedAction?: "end" | "default";
}

export class Flow<T extends object = Record<string, unknown>> extends BaseNode<T> {
  readonly unmatchedAction: "end" | "default";
  private startNode: BaseNode<T> | undefined;

  constructor(start?: BaseNode<T>, options: FlowOptions = {}) {
    super(options);
    this.startNode = start;
    this.unmatchedAction = options.unmatchedAction ?? "end";
  }

  /**
   * Set the entry node and return it for chaining
   */
  start<N extends BaseNode<T>>(node: N): N {
    this.startNode = node;
    return node;
  }

  /** Runs before the first node; override to validate inputs */
  prep(_context: ReadonlyContext<T>): MaybePromise<void> {}

  /**
   * Runs after the last node. The returned action routes an enclosing flow;
   * by default that is the last action of the inner chain.
   */
  post(
    _context: SharedContext<T>,
    lastAction: Action | undefined,
  ): MaybePromise<Action | undefined> {
    return lastAction;
  }

  async runLifecycle(
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<Action | undefined> {
    options.signal?.throwIfAborted();

    try {
      await this.prep(context);
    } catch (e) {
      throw toPreconditionError(this.name, e);
    }

    const lastAction = await this.orchestrate(context, options);
    return postProcess(this, context, () => this.post(context, lastAction));
  }

  protected async orchestrate(
    context: SharedContext<T>,
    options: RunOptions,
  ): Promise<Action | undefined> {
    if (!this.startNode) {
      throw new FlowError(`Flow "${this.name}" has no start node`, {
        node: this.name,
      });
    }

    let current: BaseNode<T> | undefined = this.startNode;
    let action: Action | undefined;

    while (current) {
      options.signal?.throwIfAborted();
      options.hooks?.onNodeStart?.(current.name);

      try {
        action = await current.runLifecycle(context, options);
      } catch (e) {
        context.log(current.name, `✗ failed: ${toError(e).message}`);
        throw e;
      }

      context.log(current.name, `✓ completed (${action ?? DEFAULT_ACTION})`);
      options.hooks?.onNodeComplete?.(current.name, action);

      current = this.resolveNext(current, action, context);
    }

    return action;
  }

  private resolveNext(
    node: BaseNode<T>,
    action: Action | undefined,
    context: SharedContext<T>,
  ): BaseNode<T> | undefined {
    const next = node.getNextNode(action);
    if (next) {
      return next;
    }

    if (action === undefined || action === DEFAULT_ACTION) {
      return undefined;
    }

    if (this.unmatchedAction === "default") {
      const fallback = node.getNextNode(DEFAULT_ACTION);
      if (fallback) {
        return fallback;
      }
    }

    if (node.actions.length > 0) {
      context.log(
        this.name,
        `Flow ends: "${action}" not found in [${node.actions.join(", ")}]`,
      );
    }
    return undefined;
  }
}
