import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AssetCache } from "@guidedeck/assets";

import { loadImage, resolveLocalImagePath, toDataUri } from "../src/images.js";
import { capturingLogger, failingFetcher, staticFetcher } from "./fixtures.js";

describe("loadImage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-images-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads local files relative to the base directory", async () => {
    await fs.writeFile(path.join(dir, "a.gif"), Buffer.from([7, 8]));

    const image = await loadImage("a.gif", { baseDir: dir, fetcher: failingFetcher() });

    expect(image?.contentType).toBe("image/gif");
    expect(Array.from(image?.bytes ?? [])).toEqual([7, 8]);
  });

  it("returns null with a warning for a missing file", async () => {
    const { logger, events } = capturingLogger();

    expect(await loadImage("nope.png", { baseDir: dir, fetcher: failingFetcher(), logger })).toBeNull();
    expect(events[0]).toMatchObject({ level: "warn", message: "Image file not found", ref: "nope.png" });
  });

  it("guesses the type of a remote image from its URL when the response has none", async () => {
    const image = await loadImage("https://img.test/photo.webp", {
      baseDir: dir,
      fetcher: staticFetcher([1], null),
    });

    expect(image?.contentType).toBe("image/webp");
  });

  it("downloads remote images once through the asset cache", async () => {
    const cache = await AssetCache.open({ cacheDir: path.join(dir, "cache") });
    const fetcher = staticFetcher([1, 2, 3]);
    const options = { baseDir: dir, fetcher, cache };

    const first = await loadImage("https://img.test/a.png", options);
    const second = await loadImage("https://img.test/a.png", options);

    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(first?.contentType).toBe("image/png");
    expect(Array.from(second?.bytes ?? [])).toEqual([1, 2, 3]);
  });

  it("encodes data URIs", () => {
    expect(toDataUri({ bytes: new Uint8Array([1, 2, 3]), contentType: "image/png" })).toBe("data:image/png;base64,AQID");
  });

  it("resolves file URLs and absolute paths as given", () => {
    const absolute = path.join(dir, "x.png");
    expect(resolveLocalImagePath(pathToFileURL(absolute).href, "/elsewhere")).toBe(absolute);
    expect(resolveLocalImagePath(absolute, "/elsewhere")).toBe(absolute);
    expect(resolveLocalImagePath("x.png", dir)).toBe(absolute);
  });
});
