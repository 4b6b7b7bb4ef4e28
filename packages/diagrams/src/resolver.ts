import fs from "node:fs/promises";
import path from "node:path";

import { svgSiblingPath } from "@guidedeck/assets";
import type { AssetCache } from "@guidedeck/assets";
import {
  AssetError,
  buildDiagramOutputFilename,
  computeExponentialBackoffDelayMs,
  defaultSleep,
  errorMessage,
  hashTextSha256,
  recordDiagramFailure,
  silentLogger,
} from "@guidedeck/shared";
import type { Logger, RetryDelayOptions } from "@guidedeck/shared";

import { failureMarkerPath, writeFailurePlaceholder } from "./placeholder.js";
import type { DiagramRenderer } from "./renderer.js";
import { fallbackDiagramSource, isValidDiagramSyntax, repairDiagramSyntax } from "./syntax.js";

export const MAX_RENDER_ATTEMPTS = 3;

export type DiagramRepairRequest = {
  source: string;
  error: string;
  kind: string;
};

/** Optional collaborator (usually an LLM) that rewrites broken diagram source. */
export interface DiagramRepairer {
  repair(request: DiagramRepairRequest): Promise<string>;
}

export type DiagramRequest = {
  slideNumber: number;
  kind: string;
  source: string;
  /** Stem of the guide or slides file; used in output filenames. */
  sourceStem: string;
};

export type DiagramResolution =
  | { state: "cached" | "rendered"; path: string; svgPath: string | null; attempts: number }
  | { state: "failed"; path: string | null; svgPath: null; attempts: number; error: string };

export type ErrorReporter = (error: unknown, context: Record<string, unknown>) => void;

export type DiagramAssetResolverOptions = {
  cache: AssetCache;
  renderer: DiagramRenderer;
  repairer?: DiagramRepairer | null;
  /** Directory rendered files are written to. */
  workDir: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  backoff?: RetryDelayOptions;
  reportError?: ErrorReporter;
};

async function nonEmptyFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).size > 0;
  } catch {
    return false;
  }
}

/**
 * Turns diagram source into a local image: served from the asset cache when
 * possible, otherwise rendered with up to three attempts (as-is after local
 * repair, collaborator repair, fallback diagram). When every attempt fails a
 * placeholder PNG and a `.error` marker are written instead.
 */
export class DiagramAssetResolver {
  private readonly cache: AssetCache;
  private readonly renderer: DiagramRenderer;
  private readonly repairer: DiagramRepairer | null;
  private readonly workDir: string;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly backoff: RetryDelayOptions;
  private readonly reportError: ErrorReporter | undefined;
  private readonly inFlight = new Map<string, Promise<DiagramResolution>>();

  constructor(options: DiagramAssetResolverOptions) {
    this.cache = options.cache;
    this.renderer = options.renderer;
    this.repairer = options.repairer ?? null;
    this.workDir = options.workDir;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.backoff = { initialDelayMs: 1_000, multiplier: 2, ...options.backoff };
    this.reportError = options.reportError;
  }

  /** Identical sources within one resolver's lifetime are resolved once. */
  resolve(request: DiagramRequest): Promise<DiagramResolution> {
    const key = hashTextSha256(request.source);
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const pending = this.resolveUncached(key, request);
    this.inFlight.set(key, pending);
    return pending;
  }

  private async resolveUncached(key: string, request: DiagramRequest): Promise<DiagramResolution> {
    const log = this.logger.child("diagram");
    const cached = await this.lookupCache(key);
    if (cached) {
      log.info("Using cached diagram", { slideNumber: request.slideNumber, path: cached });
      const svg = svgSiblingPath(cached);
      return { state: "cached", path: cached, svgPath: (await nonEmptyFile(svg)) ? svg : null, attempts: 0 };
    }

    await fs.mkdir(this.workDir, { recursive: true });
    const pngPath = path.join(
      this.workDir,
      buildDiagramOutputFilename({
        sourceStem: request.sourceStem,
        slideNumber: request.slideNumber,
        kind: request.kind,
      }),
    );

    await fs.rm(pngPath, { force: true });
    await fs.rm(failureMarkerPath(pngPath), { force: true });

    let source = request.source;
    if (!isValidDiagramSyntax(source)) {
      log.warn("Diagram source lacks a diagram type, repairing", { slideNumber: request.slideNumber });
      source = repairDiagramSyntax(source, request.kind);
    }

    let lastError = "";
    for (let attempt = 1; attempt <= MAX_RENDER_ATTEMPTS; attempt += 1) {
      if (attempt === 2) {
        source = await this.repairSource(source, lastError, request.kind);
      } else if (attempt === 3) {
        source = fallbackDiagramSource(request.kind);
        log.info("Trying fallback diagram", { slideNumber: request.slideNumber, source });
      }

      log.info("Rendering diagram", {
        slideNumber: request.slideNumber,
        attempt,
        maxAttempts: MAX_RENDER_ATTEMPTS,
      });
      try {
        await this.renderer.render({ source, outputPath: pngPath });
        if (await nonEmptyFile(pngPath)) {
          const svgPath = await this.renderSvg(source, pngPath, request.slideNumber);
          await this.storeInCache(key, pngPath, svgPath, request.kind);
          return { state: "rendered", path: pngPath, svgPath, attempts: attempt };
        }
        lastError = "Empty output file";
      } catch (error) {
        lastError = errorMessage(error);
      }
      log.warn("Diagram render failed", { slideNumber: request.slideNumber, attempt, error: lastError });

      if (attempt < MAX_RENDER_ATTEMPTS) {
        await this.sleep(computeExponentialBackoffDelayMs(attempt - 1, this.backoff));
      }
    }

    return this.fail(request, pngPath, lastError);
  }

  private async lookupCache(key: string): Promise<string | null> {
    try {
      const entry = await this.cache.lookup("diagrams", key);
      return entry?.path ?? null;
    } catch (error) {
      this.logger.warn("Diagram cache lookup failed", { error: errorMessage(error) });
      return null;
    }
  }

  private async storeInCache(key: string, pngPath: string, svgPath: string | null, kind: string): Promise<void> {
    try {
      await this.cache.putDiagram({ sourceHash: key, pngPath, svgPath, kind });
    } catch (error) {
      this.logger.warn("Unable to cache rendered diagram", { pngPath, error: errorMessage(error) });
    }
  }

  private async repairSource(source: string, lastError: string, kind: string): Promise<string> {
    if (!this.repairer) return source;
    try {
      const repaired = await this.repairer.repair({ source, error: lastError, kind });
      if (repaired.trim() === "") return source;
      this.logger.info("Diagram source repaired", { kind });
      return repaired;
    } catch (error) {
      this.logger.warn("Diagram repair failed, retrying with local repair", { error: errorMessage(error) });
      return source;
    }
  }

  private async renderSvg(source: string, pngPath: string, slideNumber: number): Promise<string | null> {
    const svgPath = svgSiblingPath(pngPath);
    try {
      await this.renderer.render({ source, outputPath: svgPath });
      return (await nonEmptyFile(svgPath)) ? svgPath : null;
    } catch (error) {
      this.logger.warn("SVG render failed, keeping PNG only", { slideNumber, error: errorMessage(error) });
      return null;
    }
  }

  private async fail(request: DiagramRequest, pngPath: string, lastError: string): Promise<DiagramResolution> {
    recordDiagramFailure();
    const error = new AssetError(
      `Failed to render ${request.kind} diagram for slide ${request.slideNumber} after ${MAX_RENDER_ATTEMPTS} attempts: ${lastError}`,
    );
    this.logger.error(error.message, { slideNumber: request.slideNumber, kind: request.kind });
    this.reportError?.(error, { slideNumber: request.slideNumber, kind: request.kind });

    try {
      await writeFailurePlaceholder({
        pngPath,
        slideNumber: request.slideNumber,
        kind: request.kind,
        lastError,
      });
      return { state: "failed", path: pngPath, svgPath: null, attempts: MAX_RENDER_ATTEMPTS, error: lastError };
    } catch (writeError) {
      this.logger.error("Unable to write diagram placeholder", { pngPath, error: errorMessage(writeError) });
      return { state: "failed", path: null, svgPath: null, attempts: MAX_RENDER_ATTEMPTS, error: lastError };
    }
  }
}
