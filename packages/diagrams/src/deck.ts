import path from "node:path";

import { diagramKindOf, silentLogger } from "@guidedeck/shared";
import type { Logger, SlideRecord } from "@guidedeck/shared";

import { findExistingDiagramImage } from "./degraded.js";
import type { DiagramAssetResolver, DiagramResolution } from "./resolver.js";

export type DiagramOutcome = {
  slideNumber: number;
  kind: string;
  state: DiagramResolution["state"] | "existing" | "degraded" | "missing";
  path: string | null;
};

export type ResolveDeckDiagramsOptions = {
  resolver: DiagramAssetResolver;
  sourceStem: string;
  /** Directory searched by the degraded filename lookup. */
  searchDir: string;
  /** When set, image references are written relative to this directory. */
  relativeTo?: string;
  logger?: Logger;
};

export type ResolvedDeck = {
  deck: SlideRecord[];
  outcomes: DiagramOutcome[];
};

export function hasDiagramSource(source: string | null): source is string {
  if (source === null) return false;
  const trimmed = source.trim();
  return trimmed !== "" && trimmed.toLowerCase() !== "null";
}

function toReference(filePath: string, relativeTo: string | undefined): string {
  if (!relativeTo) return filePath;
  return path.relative(relativeTo, filePath).split(path.sep).join("/");
}

/**
 * Resolve every diagram in the deck to a local image and return a new deck
 * with `image_url` set on the slides that got one. Slides without a diagram
 * kind are returned unchanged.
 */
export async function resolveDeckDiagrams(
  deck: readonly SlideRecord[],
  options: ResolveDeckDiagramsOptions,
): Promise<ResolvedDeck> {
  const log = options.logger ?? silentLogger;
  const outcomes: DiagramOutcome[] = [];
  const out: SlideRecord[] = [];

  for (const slide of deck) {
    const kind = diagramKindOf(slide);
    if (!kind) {
      out.push(slide);
      continue;
    }

    if (hasDiagramSource(slide.diagram_content)) {
      const resolution = await options.resolver.resolve({
        slideNumber: slide.slide_number,
        kind,
        source: slide.diagram_content,
        sourceStem: options.sourceStem,
      });
      outcomes.push({ slideNumber: slide.slide_number, kind, state: resolution.state, path: resolution.path });
      out.push(
        resolution.path ? { ...slide, image_url: toReference(resolution.path, options.relativeTo) } : slide,
      );
      continue;
    }

    if (slide.image_url) {
      outcomes.push({ slideNumber: slide.slide_number, kind, state: "existing", path: slide.image_url });
      out.push(slide);
      continue;
    }

    const found = await findExistingDiagramImage({
      dir: options.searchDir,
      sourceStem: options.sourceStem,
      slideNumber: slide.slide_number,
      kind,
      logger: log,
    });
    outcomes.push({ slideNumber: slide.slide_number, kind, state: found ? "degraded" : "missing", path: found });
    out.push(found ? { ...slide, image_url: toReference(found, options.relativeTo) } : slide);
  }

  const failed = outcomes.filter((o) => o.state === "failed").length;
  log.info("Resolved deck diagrams", { diagrams: outcomes.length, failed });
  return { deck: out, outcomes };
}
