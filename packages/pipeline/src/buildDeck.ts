import fs from "node:fs/promises";
import path from "node:path";

import { publishLocalImages, renderDeck, writeArtifact } from "@guidedeck/artifacts";
import type { RenderedArtifact } from "@guidedeck/artifacts";
import type { AssetCache, ImageFetcher, ImageStore } from "@guidedeck/assets";
import { DiagramAssetResolver, resolveDeckDiagrams } from "@guidedeck/diagrams";
import type { DiagramOutcome, DiagramRenderer, DiagramRepairer, ErrorReporter } from "@guidedeck/diagrams";
import type { SlideExtractor } from "@guidedeck/openai";
import {
  ConfigError,
  SlideDecodeError,
  buildDeckOutputFilenames,
  decodeSlideList,
  normalizeSlides,
  serializeDeck,
  silentLogger,
} from "@guidedeck/shared";
import type { DeckConfig, Logger, OutputFormat, SlideRecord } from "@guidedeck/shared";

export type SourceKind = "guide" | "slides";

export type PipelineCollaborators = {
  cache: AssetCache;
  renderer: DiagramRenderer;
  /** Needed only for guide inputs. */
  extractor?: SlideExtractor;
  repairer?: DiagramRepairer | null;
  fetcher?: ImageFetcher;
  /** When set, local images in the deck markup are uploaded and relinked. */
  store?: ImageStore;
  reportError?: ErrorReporter;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export type BuildDeckParams = {
  source: string;
  config: DeckConfig;
  collaborators: PipelineCollaborators;
  /** Defaults to the directory of the source file. */
  outDir?: string;
};

export type BuildDeckResult = {
  source: string;
  kind: SourceKind;
  deck: SlideRecord[];
  diagrams: DiagramOutcome[];
  outputs: { slides: string } & Partial<Record<OutputFormat, string>>;
};

const SLIDES_PREFIX = "slides_";

export function detectSourceKind(source: string): SourceKind {
  return path.extname(source).toLowerCase() === ".json" ? "slides" : "guide";
}

/** `guide.md` → `guide`; `slides_guide.json` → `guide`. */
export function sourceStemOf(source: string): string {
  const stem = path.basename(source, path.extname(source));
  return stem.startsWith(SLIDES_PREFIX) && stem.length > SLIDES_PREFIX.length ? stem.slice(SLIDES_PREFIX.length) : stem;
}

async function readSource(source: string): Promise<string> {
  try {
    return await fs.readFile(source, "utf8");
  } catch (error) {
    throw new SlideDecodeError(`Unable to read input ${source}`, { cause: error });
  }
}

async function loadRawSlides(
  source: string,
  kind: SourceKind,
  config: DeckConfig,
  collaborators: PipelineCollaborators,
  log: Logger,
): Promise<unknown[]> {
  const text = await readSource(source);
  if (kind === "slides") {
    return decodeSlideList(text, { force: config.force_json, logger: log });
  }
  if (!collaborators.extractor) {
    throw new ConfigError(`Guide input ${source} needs a slide extractor (set OPENAI_API_KEY)`);
  }
  return collaborators.extractor(text, { promptTemplate: config.prompt_template, force: config.force_json });
}

function assertNoInputOverwrite(source: string, outDir: string, stem: string, formats: readonly OutputFormat[]): void {
  const names = buildDeckOutputFilenames(stem);
  for (const format of formats) {
    const target = path.join(outDir, names[format]);
    if (target === source) {
      throw new ConfigError(`Writing ${format} output would overwrite the input ${source}; choose another output directory`);
    }
  }
}

async function publishMarkup(
  artifact: RenderedArtifact,
  outDir: string,
  store: ImageStore,
  log: Logger,
): Promise<RenderedArtifact> {
  const published = await publishLocalImages(new TextDecoder().decode(artifact.bytes), {
    baseDir: outDir,
    store,
    logger: log,
  });
  return { ...artifact, bytes: new TextEncoder().encode(published.markup) };
}

/**
 * One deck end to end: decode or extract, normalize, resolve diagrams, then
 * write the canonical slides file and every configured format. Input and
 * output errors propagate; asset problems are logged and degrade in place.
 */
export async function buildDeck(params: BuildDeckParams): Promise<BuildDeckResult> {
  const { config, collaborators } = params;
  const source = path.resolve(params.source);
  const outDir = path.resolve(params.outDir ?? path.dirname(source));
  const kind = detectSourceKind(source);
  const stem = sourceStemOf(source);
  const log = (collaborators.logger ?? silentLogger).child(stem);

  assertNoInputOverwrite(source, outDir, stem, config.formats);

  log.info("Building deck", { source, kind, outDir });
  const raw = await loadRawSlides(source, kind, config, collaborators, log);
  const normalized = normalizeSlides(raw, {
    defaults: config.slide_defaults,
    layoutMappings: config.layout_mappings,
    logger: log,
  });

  const imagesDir = path.join(outDir, config.images_dir);
  await fs.mkdir(imagesDir, { recursive: true });
  const resolver = new DiagramAssetResolver({
    cache: collaborators.cache,
    renderer: collaborators.renderer,
    repairer: collaborators.repairer,
    workDir: imagesDir,
    sleep: collaborators.sleep,
    reportError: collaborators.reportError,
    logger: log,
  });
  const { deck, outcomes } = await resolveDeckDiagrams(normalized, {
    resolver,
    sourceStem: stem,
    searchDir: imagesDir,
    relativeTo: outDir,
    logger: log,
  });

  const names = buildDeckOutputFilenames(stem);
  const outputs: BuildDeckResult["outputs"] = {
    slides: await writeArtifact(
      { filename: names.slides, contentType: "application/json", bytes: new TextEncoder().encode(serializeDeck(deck)) },
      outDir,
    ),
  };

  for (const format of config.formats) {
    let artifact = await renderDeck(format, deck, {
      baseDir: outDir,
      sourceStem: stem,
      theme: config.reveal_theme,
      embedImages: config.embed_images,
      preferSvg: config.prefer_svg,
      assetsDir: config.embed_images ? undefined : path.join(outDir, `${stem}_assets`),
      fetcher: collaborators.fetcher,
      cache: collaborators.cache,
      logger: log,
    });
    if (format === "markdown" && collaborators.store) {
      artifact = await publishMarkup(artifact, outDir, collaborators.store, log);
    }
    outputs[format] = await writeArtifact(artifact, outDir);
  }

  log.info("Deck written", { slides: deck.length, outputs: Object.values(outputs) });
  return { source, kind, deck, diagrams: outcomes, outputs };
}
