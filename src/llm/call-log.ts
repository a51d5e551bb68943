/**
 * Call Log File
 * Daily append-only log of gateway prompts and responses
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { GatewayLogger, LogLevel } from "./types";

function datestamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}${m}${d}`;
}

export class CallLogFile {
  private queue: Promise<void> = Promise.resolve();
  private ready: Promise<unknown> | null = null;

  constructor(
    readonly directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Log file for the current day */
  get path(): string {
    return join(this.directory, `llm_calls_${datestamp(this.now())}.log`);
  }

  /** Bound logger to hand to the gateway */
  readonly logger: GatewayLogger = (level, message) => {
    this.write(level, message);
  };

  write(level: LogLevel, message: string): void {
    const line = `${this.now().toISOString()} - ${level.toUpperCase()} - ${message}\n`;
    const path = this.path;

    this.queue = this.queue
      .then(() => this.ensureDirectory())
      .then(() => appendFile(path, line, "utf-8"))
      .catch((e: unknown) => {
        console.error(`Failed to write call log ${path}:`, e);
      });
  }

  /**
   * Resolves once every queued line has been written
   */
  flush(): Promise<void> {
    return this.queue;
  }

  private ensureDirectory(): Promise<unknown> {
    this.ready ??= mkdir(this.directory, { recursive: true }).catch(
      (error: unknown) => {
        this.ready = null;
        throw error;
      },
    );
    return this.ready;
  }
}
