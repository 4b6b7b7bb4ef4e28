import { beforeEach, describe, expect, it, vi } from "vitest";

import { LAYOUT_VARIANTS } from "../src/enums.js";
import { knownLayoutAliases, normalizeLayoutKey, resolveLayout } from "../src/layouts.js";
import { createLogger, getDiagnosticsCounters, resetDiagnosticsCounters } from "../src/logger.js";

describe("normalizeLayoutKey", () => {
  it("folds case, separators and surrounding whitespace", () => {
    expect(normalizeLayoutKey("  Title And-Two.Columns ")).toBe("title_and_two_columns");
    expect(normalizeLayoutKey("__quote__")).toBe("quote");
  });
});

describe("resolveLayout", () => {
  beforeEach(() => {
    resetDiagnosticsCounters();
  });

  it("maps every alias in the table to its canonical variant", () => {
    for (const [alias, variant] of Object.entries(knownLayoutAliases())) {
      expect(resolveLayout(alias)).toEqual({ variant, fallback: false, raw: alias });
    }
  });

  it("resolves each canonical variant to itself", () => {
    for (const variant of LAYOUT_VARIANTS) {
      expect(resolveLayout(variant).variant).toBe(variant);
    }
  });

  it("accepts legacy spellings regardless of case", () => {
    expect(resolveLayout("TITLE_AND_BODY").variant).toBe("content");
    expect(resolveLayout("Title Slide").variant).toBe("title");
    expect(resolveLayout("two-column").variant).toBe("two_column");
    expect(resolveLayout("Section Header").variant).toBe("section");
  });

  it("falls back to content for unknown identifiers and counts it", () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: (_level, line) => lines.push(line) });

    const resolution = resolveLayout("hologram", { logger, slideNumber: 4 });

    expect(resolution).toEqual({ variant: "content", fallback: true, raw: "hologram" });
    expect(getDiagnosticsCounters().layoutFallbacks).toBe(1);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: "warn",
      message: "Unknown layout, using content",
      layout: "hologram",
      slideNumber: 4,
    });
  });

  it("treats non-string identifiers as unknown", () => {
    expect(resolveLayout(42)).toEqual({ variant: "content", fallback: true, raw: null });
    expect(resolveLayout("   ").fallback).toBe(true);
  });

  it("applies configured mappings before the alias table", () => {
    const mappings = { Agenda: "two_column", "Big Quote": "QUOTE" };
    expect(resolveLayout("Agenda", { mappings }).variant).toBe("two_column");
    expect(resolveLayout("agenda", { mappings }).variant).toBe("two_column");
    expect(resolveLayout("big-quote", { mappings }).variant).toBe("quote");
  });

  it("does not log for known layouts", () => {
    const sink = vi.fn();
    resolveLayout("comparison", { logger: createLogger({ sink }) });
    expect(sink).not.toHaveBeenCalled();
  });
});
