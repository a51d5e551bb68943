/**
 * Cache Stores
 * Pluggable fingerprint → response storage for the LLM gateway
 *
 * - InMemoryCacheStore: process lifetime, no durability
 * - FileCacheStore: JSON file, loaded once, one write queue per file for saves
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import Ajv from "ajv";
import { CacheError } from "./types";

export interface CacheStore {
  /** Cached response for a fingerprint, or undefined on a miss */
  get(fingerprint: string): Promise<string | undefined>;
  /** Store a response. Entries are never evicted. */
  put(fingerprint: string, text: string): Promise<void>;
}

/**
 * In-memory cache (no durability, for tests and short-lived processes)
 */
export class InMemoryCacheStore implements CacheStore {
  private entries = new Map<string, string>();

  async get(fingerprint: string): Promise<string | undefined> {
    return this.entries.get(fingerprint);
  }

  async put(fingerprint: string, text: string): Promise<void> {
    this.entries.set(fingerprint, text);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

// ============================================================================
// File store
// ============================================================================

export const CACHE_FILE_VERSION = 1;

export interface CacheFile {
  version: number;
  entries: Record<string, string>;
}

const cacheFileSchema = {
  type: "object",
  required: ["version", "entries"],
  additionalProperties: false,
  properties: {
    version: { type: "integer", const: CACHE_FILE_VERSION },
    entries: {
      type: "object",
      additionalProperties: { type: "string" },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateCacheFile = ajv.compile<CacheFile>(cacheFileSchema);

/**
 * Tail of the pending writes for each cache file, by absolute path.
 * Every store on the same file queues behind the same tail.
 */
const writeQueues = new Map<string, Promise<void>>();

/**
 * File-backed cache. The file is read on first access; every put re-reads
 * it, merges in the new entry and replaces it through a temp file. Puts are
 * queued per file, so only one write is in flight for a path in this
 * process, however many stores have it open.
 */
export class FileCacheStore implements CacheStore {
  private entries: Map<string, string> | null = null;
  private loading: Promise<Map<string, string>> | null = null;
  private readonly queueKey: string;

  constructor(readonly path: string) {
    this.queueKey = resolve(path);
  }

  async get(fingerprint: string): Promise<string | undefined> {
    const entries = await this.load();
    return entries.get(fingerprint);
  }

  async put(fingerprint: string, text: string): Promise<void> {
    const entries = await this.load();
    entries.set(fingerprint, text);

    const tail = writeQueues.get(this.queueKey) ?? Promise.resolve();
    const write = tail.then(() => this.save(fingerprint, text));
    // The queue continues past a failed write; the caller still gets the rejection
    writeQueues.set(
      this.queueKey,
      write.catch(() => undefined),
    );
    return write;
  }

  async size(): Promise<number> {
    return (await this.load()).size;
  }

  private load(): Promise<Map<string, string>> {
    if (this.entries) {
      return Promise.resolve(this.entries);
    }
    if (!this.loading) {
      this.loading = this.readFromDisk().then(
        (entries) => {
          this.entries = entries;
          return entries;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        },
      );
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (e) {
      if (isNotFound(e)) {
        return new Map();
      }
      throw new CacheError(`Failed to read cache file ${this.path}`, e);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new CacheError(`Cache file ${this.path} is not valid JSON`, e);
    }

    if (!validateCacheFile(parsed)) {
      const details = (validateCacheFile.errors ?? [])
        .map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
        .join("; ");
      throw new CacheError(`Cache file ${this.path} is invalid: ${details}`);
    }

    return new Map(Object.entries(parsed.entries));
  }

  private async save(fingerprint: string, text: string): Promise<void> {
    // Another process may have added entries since we loaded
    const onDisk = await this.readFromDisk();
    const merged = new Map([...onDisk, ...(this.entries ?? [])]);
    merged.set(fingerprint, text);

    const file: CacheFile = {
      version: CACHE_FILE_VERSION,
      entries: Object.fromEntries(merged),
    };
    const tmpPath = `${this.path}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(file), "utf-8");
      await rename(tmpPath, this.path);
    } catch (e) {
      throw new CacheError(`Failed to write cache file ${this.path}`, e);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
