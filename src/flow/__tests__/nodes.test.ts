/**
 * Node Lifecycle Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  FatalError,
  MissingContextKeyError,
  NodeExecutionError,
  PreconditionError,
  TransientError,
} from "../errors";
import { BatchNode, Node, type NodeOptions } from "../nodes";
import { SharedContext, type ReadonlyContext } from "../shared";
import type { Action, ExecContext } from "../types";

// ============================================================================
// Test Nodes
// ============================================================================

interface Numbers {
  input?: number;
  output?: number;
  calls?: string[];
}

/**
 * Doubles `input` into `output`, recording each phase
 */
class Doubler extends Node<Numbers, number, number> {
  readonly phases: string[] = [];

  prep(ctx: ReadonlyContext<Numbers>): number {
    this.phases.push("prep");
    return ctx.require("input");
  }

  exec(value: number): number {
    this.phases.push("exec");
    return value * 2;
  }

  post(ctx: SharedContext<Numbers>, _prep: number, result: number): Action {
    this.phases.push("post");
    ctx.set("output", result);
    return "doubled";
  }
}

/**
 * Exec throws the scripted errors in order, then returns "ok"
 */
class Scripted extends Node<Numbers, void, string> {
  attempts = 0;
  posted: string | undefined;

  constructor(
    private readonly failures: Error[],
    options: NodeOptions<void, string> = {},
  ) {
    super({ name: "Scripted", ...options });
  }

  prep(): void {}

  exec(_prep: void, ctx: ExecContext): string {
    this.attempts++;
    expect(ctx.attempt).toBe(this.attempts);
    const failure = this.failures[this.attempts - 1];
    if (failure) {
      throw failure;
    }
    return "ok";
  }

  post(_ctx: SharedContext<Numbers>, _prep: void, result: string): void {
    this.posted = result;
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Lifecycle
// ============================================================================

describe("Node lifecycle", () => {
  it("should run prep, exec and post once each, in order", async () => {
    const node = new Doubler();
    const ctx = new SharedContext<Numbers>({ input: 21 });

    const action = await node.run(ctx);

    expect(node.phases).toEqual(["prep", "exec", "post"]);
    expect(action).toBe("doubled");
    expect(ctx.get("output")).toBe(42);
  });

  it("should use the class name when no name is given", () => {
    expect(new Doubler().name).toBe("Doubler");
    expect(new Doubler({ name: "custom" }).name).toBe("custom");
  });

  it("should treat a post with no return value as the default action", async () => {
    const node = new Scripted([]);
    const action = await node.run(new SharedContext<Numbers>());

    expect(action).toBeUndefined();
    expect(node.posted).toBe("ok");
  });

  it("should fail with a precondition error when prep is missing input", async () => {
    const node = new Doubler();
    const ctx = new SharedContext<Numbers>();

    const error = await node.run(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).not.toBeInstanceOf(MissingContextKeyError);
    expect(error).toMatchObject({
      message: 'Node "Doubler" prep failed: Missing required context key "input"',
      key: "input",
      nodeName: "Doubler",
    });
    expect(node.phases).toEqual(["prep"]);
  });

  it("should attribute post failures to the node", async () => {
    class Broken extends Node<Numbers, void, void> {
      prep(): void {}
      exec(): void {}
      post(): void {
        throw new Error("disk full");
      }
    }

    await expect(new Broken().run(new SharedContext<Numbers>())).rejects.toMatchObject(
      {
        message: 'Node "Broken" post failed: disk full',
        nodeName: "Broken",
      },
    );
  });

  it("should warn when run() would ignore successors", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const node = new Scripted([]);
    node.next(new Scripted([], { name: "Other" }));

    await node.run(new SharedContext<Numbers>());

    expect(warn).toHaveBeenCalledWith(
      '"Scripted" has successors that run() will not follow; wrap it in a Flow',
    );
  });
});

// ============================================================================
// Retry & Fallback
// ============================================================================

describe("Node retry", () => {
  it("should retry transient failures until exec succeeds", async () => {
    const node = new Scripted([new Error("boom"), new Error("boom")], {
      retry: { maxAttempts: 3 },
    });
    const ctx = new SharedContext<Numbers>();

    await node.run(ctx);

    expect(node.attempts).toBe(3);
    expect(node.posted).toBe("ok");
    expect(ctx.logs).toEqual([
      "[Scripted] Attempt 1/3 failed: boom; retrying in 0ms",
      "[Scripted] Attempt 2/3 failed: boom; retrying in 0ms",
    ]);
  });

  it("should report retries through the hooks", async () => {
    const onRetry = vi.fn();
    const node = new Scripted([new TransientError("rate limited")], {
      retry: { maxAttempts: 2, initialDelay: 1, backoffMultiplier: 1 },
    });

    await node.run(new SharedContext<Numbers>(), { hooks: { onRetry } });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(
      "Scripted",
      1,
      expect.objectContaining({ message: "rate limited" }),
      1,
    );
  });

  it("should make a single attempt by default", async () => {
    const node = new Scripted([new Error("boom")]);

    const error = await node.run(new SharedContext<Numbers>()).catch((e: unknown) => e);

    expect(node.attempts).toBe(1);
    expect(error).toBeInstanceOf(NodeExecutionError);
    expect(error).toMatchObject({
      message: 'Node "Scripted" failed after 1 attempt(s): boom',
      attempts: 1,
    });
  });

  it("should use the fallback once attempts are exhausted", async () => {
    const onFallback = vi.fn();
    const fallback = vi.fn((_prep: void, error: Error) => `fallback: ${error.message}`);
    const node = new Scripted([new Error("one"), new Error("two")], {
      retry: { maxAttempts: 2 },
      fallback,
    });
    const ctx = new SharedContext<Numbers>();

    await node.run(ctx, { hooks: { onFallback } });

    expect(node.attempts).toBe(2);
    expect(fallback).toHaveBeenCalledTimes(1);
    expect(node.posted).toBe("fallback: two");
    expect(onFallback).toHaveBeenCalledWith(
      "Scripted",
      expect.objectContaining({ message: "two" }),
    );
    expect(ctx.logs).toContain("[Scripted] All 2 attempt(s) failed: two");
  });

  it("should wrap a throwing fallback in a node execution error", async () => {
    const node = new Scripted([new Error("boom")], {
      fallback: () => {
        throw new Error("no fallback either");
      },
    });

    await expect(node.run(new SharedContext<Numbers>())).rejects.toMatchObject({
      name: "NodeExecutionError",
      message: 'Node "Scripted" failed after 1 attempt(s): no fallback either',
    });
  });

  it("should skip retries and fallback for fatal errors", async () => {
    const fallback = vi.fn(() => "unused");
    const node = new Scripted([new FatalError("bad request")], {
      retry: { maxAttempts: 5 },
      fallback,
    });

    const error = await node.run(new SharedContext<Numbers>()).catch((e: unknown) => e);

    expect(node.attempts).toBe(1);
    expect(fallback).not.toHaveBeenCalled();
    expect(error).toBeInstanceOf(NodeExecutionError);
    expect(error).toMatchObject({ attempts: 1 });
  });

  it("should stop retrying when the run is aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled");
    const node = new Scripted([new Error("boom"), new Error("boom")], {
      retry: { maxAttempts: 3, initialDelay: 60000 },
    });

    const pending = node.run(new SharedContext<Numbers>(), {
      signal: controller.signal,
      hooks: { onRetry: () => controller.abort(reason) },
    });

    await expect(pending).rejects.toBe(reason);
    expect(node.attempts).toBe(1);
  });
});

// ============================================================================
// BatchNode
// ============================================================================

interface Batch {
  items?: number[];
  results?: number[];
}

class Squares extends BatchNode<Batch, number, number> {
  prep(ctx: ReadonlyContext<Batch>): number[] {
    return ctx.require("items");
  }

  execItem(item: number): number {
    if (item < 0) {
      throw new Error(`negative: ${item}`);
    }
    return item * item;
  }

  post(ctx: SharedContext<Batch>, _items: number[], results: number[]): void {
    ctx.set("results", results);
  }
}

describe("BatchNode", () => {
  it("should process items in order", async () => {
    const ctx = new SharedContext<Batch>({ items: [1, 2, 3] });

    await new Squares().run(ctx);

    expect(ctx.get("results")).toEqual([1, 4, 9]);
    expect(ctx.logs).toEqual(["[Squares] Processing 3 items sequentially"]);
  });

  it("should apply the item fallback to a failing item only", async () => {
    const ctx = new SharedContext<Batch>({ items: [2, -1, 3] });
    const node = new Squares({ fallback: () => 0 });

    await node.run(ctx);

    expect(ctx.get("results")).toEqual([4, 0, 9]);
    expect(ctx.logs).toContain(
      "[Squares] item 1: All 1 attempt(s) failed: negative: -1",
    );
  });

  it("should fail the node when an item has no fallback", async () => {
    const ctx = new SharedContext<Batch>({ items: [-2] });

    await expect(new Squares().run(ctx)).rejects.toMatchObject({
      message: 'Node "Squares" failed after 1 attempt(s): negative: -2',
    });
    expect(ctx.has("results")).toBe(false);
  });
});

// ============================================================================
// Successors
// ============================================================================

describe("Successors", () => {
  it("should chain with next() and register labels with on()", () => {
    const a = new Scripted([], { name: "a" });
    const b = new Scripted([], { name: "b" });
    const c = new Scripted([], { name: "c" });

    expect(a.next(b)).toBe(b);
    expect(a.on("retry", c)).toBe(a);

    expect(a.getNextNode(undefined)).toBe(b);
    expect(a.getNextNode("default")).toBe(b);
    expect(a.getNextNode("retry")).toBe(c);
    expect(a.getNextNode("missing")).toBeUndefined();
    expect(a.actions).toEqual(["default", "retry"]);
  });

  it("should warn when a successor is replaced", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const a = new Scripted([], { name: "a" });
    const c = new Scripted([], { name: "c" });
    a.next(new Scripted([], { name: "b" }));
    a.next(c);

    expect(warn).toHaveBeenCalledWith(
      'Successor for action "default" on "a" is being overwritten',
    );
    expect(a.getNextNode(undefined)).toBe(c);
  });
});
