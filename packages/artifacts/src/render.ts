import fs from "node:fs/promises";
import path from "node:path";

import { HttpImageFetcher } from "@guidedeck/assets";
import type { AssetCache, ImageFetcher } from "@guidedeck/assets";
import { OutputWriteError, buildDeckOutputFilenames, silentLogger } from "@guidedeck/shared";
import type { Logger, OutputFormat, SlideRecord } from "@guidedeck/shared";

import { buildRevealHtml } from "./html/revealDeck.js";
import { renderDeckMarkup } from "./markdown/deckMarkup.js";
import { PPTX_CONTENT_TYPE, buildDeckPptxBytes } from "./pptx/deckPptx.js";

export type RenderedArtifact = {
  filename: string;
  contentType: string;
  bytes: Uint8Array;
};

export type RenderDeckOptions = {
  /** Directory relative image references resolve against; normally the output directory. */
  baseDir: string;
  /** Names the output files (`<stem>.md`, `<stem>.pptx`, `<stem>.html`). */
  sourceStem?: string;
  title?: string;
  theme?: string;
  embedImages?: boolean;
  preferSvg?: boolean;
  assetsDir?: string;
  fetcher?: ImageFetcher;
  cache?: AssetCache;
  logger?: Logger;
};

const encoder = new TextEncoder();

function inferFilename(format: OutputFormat, sourceStem: string): string {
  const names = buildDeckOutputFilenames(sourceStem);
  switch (format) {
    case "markdown":
      return names.markdown;
    case "pptx":
      return names.pptx;
    case "html":
      return names.html;
    default: {
      const exhaustive: never = format;
      return exhaustive;
    }
  }
}

export async function renderDeck(
  format: OutputFormat,
  deck: readonly SlideRecord[],
  options: RenderDeckOptions,
): Promise<RenderedArtifact> {
  const log = (options.logger ?? silentLogger).child(format);
  const filename = inferFilename(format, options.sourceStem ?? "deck");
  const loader = {
    baseDir: options.baseDir,
    fetcher: options.fetcher ?? new HttpImageFetcher({ logger: log }),
    cache: options.cache,
    logger: log,
  };

  if (format === "markdown") {
    const markup = await renderDeckMarkup(deck, { baseDir: options.baseDir, preferSvg: options.preferSvg, logger: log });
    return { filename, contentType: "text/markdown; charset=utf-8", bytes: encoder.encode(markup) };
  }

  if (format === "pptx") {
    const bytes = await buildDeckPptxBytes(deck, { ...loader, title: options.title });
    return { filename, contentType: PPTX_CONTENT_TYPE, bytes };
  }

  const html = await buildRevealHtml(deck, {
    ...loader,
    title: options.title,
    theme: options.theme,
    embedImages: options.embedImages,
    assetsDir: options.assetsDir,
  });
  return { filename, contentType: "text/html; charset=utf-8", bytes: encoder.encode(html) };
}

/**
 * Write an artifact into outDir through a temp file and rename. Any failure is
 * an OutputWriteError.
 */
export async function writeArtifact(artifact: RenderedArtifact, outDir: string): Promise<string> {
  const target = path.join(outDir, artifact.filename);
  const temp = `${target}.${process.pid}.tmp`;
  try {
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(temp, artifact.bytes);
    await fs.rename(temp, target);
    return target;
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw new OutputWriteError(target, { cause: error });
  }
}
