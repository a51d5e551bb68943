/**
 * Cache Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative } from "node:path";
import { FileCacheStore, InMemoryCacheStore } from "../cache";
import { CacheError } from "../types";

describe("InMemoryCacheStore", () => {
  it("should return stored responses and undefined on a miss", async () => {
    const store = new InMemoryCacheStore();

    await store.put("k1", "v1");

    expect(await store.get("k1")).toBe("v1");
    expect(await store.get("k2")).toBeUndefined();
    expect(store.size()).toBe(1);

    store.clear();
    expect(await store.get("k1")).toBeUndefined();
  });

  it("should keep an empty string response as a hit", async () => {
    const store = new InMemoryCacheStore();
    await store.put("k", "");

    expect(await store.get("k")).toBe("");
  });
});

function relativePath(path: string): string {
  return relative(process.cwd(), path);
}

describe("FileCacheStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stepwire-cache-"));
    path = join(dir, "llm_cache.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should start empty when the file does not exist", async () => {
    const store = new FileCacheStore(path);

    expect(await store.get("anything")).toBeUndefined();
    expect(await store.size()).toBe(0);
  });

  it("should persist entries for later processes", async () => {
    await new FileCacheStore(path).put("k1", "v1");

    const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(raw).toEqual({ version: 1, entries: { k1: "v1" } });
    expect(await new FileCacheStore(path).get("k1")).toBe("v1");
  });

  it("should create missing parent directories", async () => {
    const nested = join(dir, "a", "b", "cache.json");

    await new FileCacheStore(nested).put("k", "v");

    expect(await new FileCacheStore(nested).get("k")).toBe("v");
  });

  it("should merge entries written by another store", async () => {
    const first = new FileCacheStore(path);
    const second = new FileCacheStore(path);
    await second.get("k1"); // loaded while the file was empty

    await first.put("k1", "v1");
    await second.put("k2", "v2");

    const reread = new FileCacheStore(path);
    expect(await reread.get("k1")).toBe("v1");
    expect(await reread.get("k2")).toBe("v2");
  });

  it("should keep every entry when puts overlap", async () => {
    const store = new FileCacheStore(path);

    await Promise.all(
      ["a", "b", "c", "d"].map((key) => store.put(key, key.toUpperCase())),
    );

    const reread = new FileCacheStore(path);
    expect(await reread.size()).toBe(4);
    expect(await reread.get("c")).toBe("C");
  });

  it("should keep every entry when several stores write one file", async () => {
    const stores = [1, 2, 3, 4].map(() => new FileCacheStore(path));

    for (let round = 0; round < 5; round++) {
      await Promise.all(
        stores.map((store, i) => store.put(`r${round}-s${i}`, `${round}:${i}`)),
      );
    }

    const reread = new FileCacheStore(path);
    expect(await reread.size()).toBe(20);
    expect(await reread.get("r4-s3")).toBe("4:3");
    expect(await reread.get("r0-s0")).toBe("0:0");
  });

  it("should share one write queue between relative and absolute paths", async () => {
    const byRelative = new FileCacheStore(relativePath(path));
    const byAbsolute = new FileCacheStore(path);

    await Promise.all([byRelative.put("rel", "1"), byAbsolute.put("abs", "2")]);

    const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(raw).toEqual({ version: 1, entries: { rel: "1", abs: "2" } });
  });

  it("should reject a file that is not JSON", async () => {
    await writeFile(path, "{ not json", "utf-8");
    const store = new FileCacheStore(path);

    await expect(store.get("k")).rejects.toBeInstanceOf(CacheError);
    await expect(store.get("k")).rejects.toThrow(
      `Cache file ${path} is not valid JSON`,
    );
  });

  it("should reject a file with the wrong shape", async () => {
    await writeFile(path, JSON.stringify({ version: 2, entries: {} }), "utf-8");

    await expect(new FileCacheStore(path).get("k")).rejects.toThrow(
      `Cache file ${path} is invalid: /version must be equal to constant`,
    );
  });

  it("should load again after a failed load", async () => {
    await writeFile(path, "garbage", "utf-8");
    const store = new FileCacheStore(path);
    await expect(store.get("k")).rejects.toBeInstanceOf(CacheError);

    await writeFile(
      path,
      JSON.stringify({ version: 1, entries: { k: "fixed" } }),
      "utf-8",
    );

    expect(await store.get("k")).toBe("fixed");
  });
});
