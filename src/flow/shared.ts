/**
 * Shared Context
 *
 * The blackboard every node of a run reads from and writes to.
 *
 * Design:
 * - One instance per run, passed by reference, never copied by the engine
 * - Typed keys: `T` describes the pipeline's fields, so accessors are checked
 * - prep gets a ReadonlyContext view; only post writes
 * - Writes are attributed to the node whose post is running
 * - Logs collected for observability
 */

import { ContextConflictError, MissingContextKeyError } from "./errors";

/**
 * What happens when a node overwrites a key another node already wrote
 */
export type WritePolicy = "allow" | "warn" | "reject";

/** Anything that can own a write (nodes and flows) */
export interface ContextWriter {
  readonly name: string;
}

export type ContextKey<T> = keyof T & string;

/**
 * Read-only view handed to a node's prep phase
 */
export interface ReadonlyContext<T extends object> {
  get<K extends ContextKey<T>>(key: K): Partial<T>[K];
  require<K extends ContextKey<T>>(key: K): NonNullable<Partial<T>[K]>;
  has(key: ContextKey<T>): boolean;
  snapshot(): Partial<T>;
  log(source: string, message: string): void;
}

export interface SharedContextOptions {
  /** Overwrite handling across nodes (default: "warn") */
  writePolicy?: WritePolicy;
  /** Maximum number of retained log lines (default: 1000) */
  maxLogs?: number;
  /** Called with every log line as it is recorded */
  onLog?: (line: string) => void;
}

const DEFAULT_MAX_LOGS = 1000;

export class SharedContext<T extends object = Record<string, unknown>>
  implements ReadonlyContext<T>
{
  /** Execution logs */
  readonly logs: string[] = [];
  readonly writePolicy: WritePolicy;

  private readonly data: Partial<T>;
  private readonly writers = new Map<string, ContextWriter>();
  private readonly maxLogs: number;
  private readonly onLog?: (line: string) => void;
  private activeWriter: ContextWriter | undefined;

  constructor(initialData: Partial<T> = {}, options: SharedContextOptions = {}) {
    this.data = { ...initialData };
    this.writePolicy = options.writePolicy ?? "warn";
    this.maxLogs = options.maxLogs ?? DEFAULT_MAX_LOGS;
    this.onLog = options.onLog;
  }

  get<K extends ContextKey<T>>(key: K): Partial<T>[K] {
    return this.data[key];
  }

  /**
   * Get a value that must be present (not undefined or null)
   */
  require<K extends ContextKey<T>>(key: K): NonNullable<Partial<T>[K]> {
    const value = this.data[key];
    if (value == null) {
      throw new MissingContextKeyError(key);
    }
    return value;
  }

  has(key: ContextKey<T>): boolean {
    return Object.prototype.hasOwnProperty.call(this.data, key);
  }

  set<K extends ContextKey<T>>(key: K, value: T[K]): void {
    const writer = this.activeWriter;
    if (writer) {
      this.checkOwnership(key, writer);
      this.writers.set(key, writer);
    }
    this.data[key] = value;
  }

  /**
   * Shallow copy of the current data
   */
  snapshot(): Partial<T> {
    return { ...this.data };
  }

  /**
   * Name of the node that last wrote `key`, if a node wrote it
   */
  writerOf(key: ContextKey<T>): string | undefined {
    return this.writers.get(key)?.name;
  }

  /**
   * Run `fn` with every write attributed to `writer`.
   * Used by the engine around a node's post phase.
   */
  async writeAs<R>(writer: ContextWriter, fn: () => Promise<R>): Promise<R> {
    const previous = this.activeWriter;
    this.activeWriter = writer;
    try {
      return await fn();
    } finally {
      this.activeWriter = previous;
    }
  }

  log(source: string, message: string): void {
    const line = `[${source}] ${message}`;
    this.logs.push(line);
    this.onLog?.(line);

    if (this.logs.length > this.maxLogs) {
      const excess = this.logs.length - this.maxLogs + 1;
      this.logs.splice(0, excess);
      this.logs.unshift(`[system] Log truncated: removed ${excess} old entries`);
    }
  }

  private checkOwnership(key: string, writer: ContextWriter): void {
    const previous = this.writers.get(key);
    if (!previous || previous === writer || this.writePolicy === "allow") {
      return;
    }

    if (this.writePolicy === "reject") {
      throw new ContextConflictError(key, writer.name, previous.name);
    }
    this.log(
      "context",
      `Warning: "${writer.name}" overwrote "${key}" written by "${previous.name}"`,
    );
  }
}

/**
 * Create a new shared context
 */
export function createContext<T extends object = Record<string, unknown>>(
  initialData: Partial<T> = {},
  options: SharedContextOptions = {},
): SharedContext<T> {
  return new SharedContext<T>(initialData, options);
}
