import fs from "node:fs/promises";
import path from "node:path";

import { kindSlug, recordDegradedDiagramLookup, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

export type DegradedLookupParams = {
  dir: string;
  sourceStem: string;
  slideNumber: number;
  kind: string;
  logger?: Logger;
};

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function historicalDiagramFilenames(params: { sourceStem: string; slideNumber: number; kind: string }): string[] {
  const n = params.slideNumber;
  const slug = kindSlug(params.kind);
  return [
    `${params.sourceStem}_slide${n}_${slug}.png`,
    `${params.sourceStem}_slide${n}.png`,
    `slide${n}.png`,
    `slide${n}_${slug}.png`,
  ];
}

/**
 * Last-resort lookup for a slide that names a diagram kind but carries no
 * source: known filename patterns first, then any `*slide<N>*.png` in `dir`.
 * Every hit is logged as degraded.
 */
export async function findExistingDiagramImage(params: DegradedLookupParams): Promise<string | null> {
  const log = params.logger ?? silentLogger;

  let found: string | null = null;
  for (const name of historicalDiagramFilenames(params)) {
    const candidate = path.join(params.dir, name);
    if (await isFile(candidate)) {
      found = candidate;
      break;
    }
  }

  if (!found) {
    const pattern = new RegExp(`slide${params.slideNumber}(?!\\d).*\\.png$`, "i");
    let names: string[] = [];
    try {
      names = (await fs.readdir(params.dir)).sort();
    } catch (error) {
      log.debug("Diagram directory not readable", { dir: params.dir, error: String(error) });
    }
    const match = names.find((name) => pattern.test(name));
    if (match) found = path.join(params.dir, match);
  }

  if (found) {
    recordDegradedDiagramLookup();
    log.warn("Using diagram image found by filename (no diagram source on slide)", {
      slideNumber: params.slideNumber,
      kind: params.kind,
      path: found,
    });
  }
  return found;
}
