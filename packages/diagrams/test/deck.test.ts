import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AssetCache } from "@guidedeck/assets";
import { getDiagnosticsCounters, normalizeSlides, resetDiagnosticsCounters } from "@guidedeck/shared";

import { resolveDeckDiagrams } from "../src/deck.js";
import { findExistingDiagramImage, historicalDiagramFilenames } from "../src/degraded.js";
import { DiagramAssetResolver } from "../src/resolver.js";

describe("resolveDeckDiagrams", () => {
  let dir: string;
  let cache: AssetCache;
  const render = vi.fn(async (request: { source: string; outputPath: string }) => {
    await fs.writeFile(request.outputPath, "png");
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-deck-"));
    cache = await AssetCache.open({ cacheDir: path.join(dir, "cache") });
    render.mockClear();
    resetDiagnosticsCounters();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("sets image references only on slides with a diagram kind and source", async () => {
    const deck = normalizeSlides([
      { title: "Intro" },
      { title: "Flow", diagram_type: "flowchart", diagram_content: "flowchart TD\n  A --> B" },
      { title: "Null source", diagram_type: "pie", diagram_content: "null" },
      { title: "Plain", content: "text" },
    ]);
    const resolver = new DiagramAssetResolver({ cache, renderer: { render }, workDir: dir, sleep: async () => {} });

    const result = await resolveDeckDiagrams(deck, {
      resolver,
      sourceStem: "guide",
      searchDir: dir,
      relativeTo: dir,
    });

    expect(result.deck.map((s) => s.image_url)).toEqual([null, "guide_slide2_flowchart.png", null, null]);
    expect(result.outcomes).toEqual([
      { slideNumber: 2, kind: "flowchart", state: "rendered", path: path.join(dir, "guide_slide2_flowchart.png") },
      { slideNumber: 3, kind: "pie", state: "missing", path: null },
    ]);
    expect(deck[1]?.image_url).toBeNull();
  });

  it("renders a source shared by several slides once", async () => {
    const source = "flowchart LR\n  A --> B";
    const deck = normalizeSlides([
      { title: "T" },
      { title: "One", diagram_type: "flowchart", diagram_content: source },
      { title: "Two", chart_type: "flowchart", diagram_content: source },
    ]);
    const resolver = new DiagramAssetResolver({ cache, renderer: { render }, workDir: dir, sleep: async () => {} });

    const result = await resolveDeckDiagrams(deck, { resolver, sourceStem: "guide", searchDir: dir });

    expect(render).toHaveBeenCalledTimes(2);
    expect(result.deck[1]?.image_url).toBe(result.deck[2]?.image_url);
  });

  it("keeps an existing image reference when the slide has no source", async () => {
    const deck = normalizeSlides([{ title: "T" }, { title: "D", diagram_type: "mindmap", image_url: "images/m.png" }]);
    const resolver = new DiagramAssetResolver({ cache, renderer: { render }, workDir: dir });

    const result = await resolveDeckDiagrams(deck, { resolver, sourceStem: "guide", searchDir: dir });

    expect(result.deck[1]?.image_url).toBe("images/m.png");
    expect(result.outcomes[0]?.state).toBe("existing");
    expect(render).not.toHaveBeenCalled();
  });

  it("falls back to a degraded filename lookup", async () => {
    await fs.writeFile(path.join(dir, "slide2.png"), "old");
    const deck = normalizeSlides([{ title: "T" }, { title: "D", diagram_type: "mindmap" }]);
    const resolver = new DiagramAssetResolver({ cache, renderer: { render }, workDir: dir });

    const result = await resolveDeckDiagrams(deck, { resolver, sourceStem: "guide", searchDir: dir, relativeTo: dir });

    expect(result.deck[1]?.image_url).toBe("slide2.png");
    expect(result.outcomes[0]?.state).toBe("degraded");
    expect(getDiagnosticsCounters().degradedDiagramLookups).toBe(1);
  });
});

describe("findExistingDiagramImage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-degraded-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists the historical filename patterns in lookup order", () => {
    expect(historicalDiagramFilenames({ sourceStem: "g", slideNumber: 4, kind: "Pie" })).toEqual([
      "g_slide4_pie.png",
      "g_slide4.png",
      "slide4.png",
      "slide4_pie.png",
    ]);
  });

  it("prefers the most specific pattern", async () => {
    await fs.writeFile(path.join(dir, "slide4.png"), "x");
    await fs.writeFile(path.join(dir, "g_slide4_pie.png"), "x");

    expect(await findExistingDiagramImage({ dir, sourceStem: "g", slideNumber: 4, kind: "pie" })).toBe(
      path.join(dir, "g_slide4_pie.png"),
    );
  });

  it("scans the directory without matching other slide numbers", async () => {
    await fs.writeFile(path.join(dir, "deck_slide10_chart.png"), "x");
    await fs.writeFile(path.join(dir, "other_slide1_chart.png"), "x");

    expect(await findExistingDiagramImage({ dir, sourceStem: "g", slideNumber: 1, kind: "pie" })).toBe(
      path.join(dir, "other_slide1_chart.png"),
    );
  });

  it("returns null when nothing matches or the directory is missing", async () => {
    expect(await findExistingDiagramImage({ dir, sourceStem: "g", slideNumber: 3, kind: "pie" })).toBeNull();
    expect(
      await findExistingDiagramImage({ dir: path.join(dir, "nope"), sourceStem: "g", slideNumber: 3, kind: "pie" }),
    ).toBeNull();
  });
});
