import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AssetError } from "@guidedeck/shared";

import { AssetCache, CACHE_INDEX_FILENAME, svgSiblingPath } from "../src/cache.js";

const DAY_MS = 86_400_000;

describe("AssetCache", () => {
  let dir: string;
  let workDir: string;
  let nowMs: number;

  const openCache = (overrides: Partial<Parameters<typeof AssetCache.open>[0]> = {}) =>
    AssetCache.open({
      cacheDir: dir,
      now: () => nowMs,
      sleep: async () => {},
      ...overrides,
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-cache-"));
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-work-"));
    nowMs = Date.parse("2024-06-01T00:00:00Z");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("creates the group directories on open", async () => {
    const cache = await openCache();

    expect((await fs.stat(cache.dirFor("images"))).isDirectory()).toBe(true);
    expect((await fs.stat(cache.dirFor("diagrams"))).isDirectory()).toBe(true);
  });

  it("stores images under a hashed filename and indexes them by url", async () => {
    const cache = await openCache();
    const entry = await cache.putImage({
      url: "https://example.test/a.png",
      bytes: new Uint8Array([1, 2, 3]),
      extension: ".png",
      category: "training",
    });

    expect(path.basename(entry.path)).toMatch(/^img_[0-9a-f]{10}\.png$/);
    expect(entry).toMatchObject({ category: "training", timestamp: nowMs / 1000 });
    expect(await cache.lookup("images", "https://example.test/a.png")).toEqual(entry);

    const index: unknown = JSON.parse(await fs.readFile(path.join(dir, CACHE_INDEX_FILENAME), "utf8"));
    expect(index).toMatchObject({ last_updated: nowMs / 1000 });
  });

  it("copies diagram PNG and SVG siblings into the cache", async () => {
    const png = path.join(workDir, "d.png");
    const svg = path.join(workDir, "d.svg");
    await fs.writeFile(png, "png-bytes");
    await fs.writeFile(svg, "<svg/>");

    const cache = await openCache();
    const entry = await cache.putDiagram({ sourceHash: "abc", pngPath: png, svgPath: svg, kind: "flowchart" });

    expect(entry.path).toBe(path.join(dir, "diagrams", "diagram_abc.png"));
    expect(entry.type).toBe("flowchart");
    expect(await fs.readFile(svgSiblingPath(entry.path), "utf8")).toBe("<svg/>");
  });

  it("reports entries whose file is gone as misses", async () => {
    const cache = await openCache();
    const entry = await cache.putImage({ url: "u", bytes: new Uint8Array([9]), extension: "jpg" });
    await fs.rm(entry.path);

    expect(await cache.lookup("images", "u")).toBeNull();
  });

  it("starts empty when the index is corrupt", async () => {
    await fs.writeFile(path.join(dir, CACHE_INDEX_FILENAME), "{ nope");
    const cache = await openCache();

    expect(await cache.list()).toEqual([]);
    await cache.putImage({ url: "u", bytes: new Uint8Array([1]), extension: "png" });
    expect(await cache.list()).toHaveLength(1);
  });

  it("lists entries filtered by group and category", async () => {
    const cache = await openCache();
    await cache.putImage({ url: "a", bytes: new Uint8Array([1]), extension: "png", category: "solar" });
    await cache.putImage({ url: "b", bytes: new Uint8Array([2]), extension: "png", category: "wind" });
    const png = path.join(workDir, "d.png");
    await fs.writeFile(png, "x");
    await cache.putDiagram({ sourceHash: "h1", pngPath: png, kind: "pie" });

    expect((await cache.list()).map((a) => a.key).sort()).toEqual(["a", "b", "h1"]);
    expect((await cache.list({ group: "diagrams" })).map((a) => a.key)).toEqual(["h1"]);
    expect((await cache.list({ category: "solar" })).map((a) => a.key)).toEqual(["a"]);
  });

  it("cleans entries older than the threshold", async () => {
    const cache = await openCache();
    const old = await cache.putImage({ url: "old", bytes: new Uint8Array([1]), extension: "png" });
    nowMs += 40 * DAY_MS;
    const fresh = await cache.putImage({ url: "fresh", bytes: new Uint8Array([2]), extension: "png" });

    expect(await cache.clean({ olderThanDays: 30 })).toEqual({ images: 1, diagrams: 0 });
    await expect(fs.stat(old.path)).rejects.toThrow();
    expect(await cache.lookup("images", "fresh")).toEqual(fresh);
  });

  it("cleans everything with all", async () => {
    const png = path.join(workDir, "d.png");
    const svg = path.join(workDir, "d.svg");
    await fs.writeFile(png, "x");
    await fs.writeFile(svg, "<svg/>");
    const cache = await openCache();
    const entry = await cache.putDiagram({ sourceHash: "h", pngPath: png, svgPath: svg, kind: "pie" });

    expect(await cache.clean({ all: true })).toEqual({ images: 0, diagrams: 1 });
    await expect(fs.stat(svgSiblingPath(entry.path))).rejects.toThrow();
    expect(await cache.list()).toEqual([]);
  });

  it("releases the lock after each write", async () => {
    const cache = await openCache();
    await cache.putImage({ url: "u", bytes: new Uint8Array([1]), extension: "png" });

    await expect(fs.stat(cache.lockPath)).rejects.toThrow();
  });

  it("times out while another writer holds a fresh lock", async () => {
    const cache = await openCache({ lockTimeoutMs: 0, now: () => Date.now() });
    await fs.writeFile(cache.lockPath, "12345");

    await expect(cache.putImage({ url: "u", bytes: new Uint8Array([1]), extension: "png" })).rejects.toThrow(
      AssetError,
    );
  });

  it("steals an abandoned lock", async () => {
    const cache = await openCache({ staleLockMs: 30_000, now: () => Date.now() });
    await fs.writeFile(cache.lockPath, "12345");
    const past = new Date(Date.now() - 60_000);
    await fs.utimes(cache.lockPath, past, past);

    await cache.putImage({ url: "u", bytes: new Uint8Array([1]), extension: "png" });
    expect(await cache.lookup("images", "u")).not.toBeNull();
  });

  it("serializes concurrent writers without losing entries", async () => {
    const cache = await openCache({ now: () => Date.now(), sleep: (ms) => new Promise((r) => setTimeout(r, ms)) });
    await Promise.all(
      ["a", "b", "c", "d"].map((url, i) =>
        cache.putImage({ url, bytes: new Uint8Array([i]), extension: "png" }),
      ),
    );

    expect((await cache.list({ group: "images" })).map((a) => a.key).sort()).toEqual(["a", "b", "c", "d"]);
  });
});
