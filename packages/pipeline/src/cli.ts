import { AssetCache, HttpImageFetcher, createSupabaseImageStore } from "@guidedeck/assets";
import type { ImageStore } from "@guidedeck/assets";
import { MermaidCliRenderer } from "@guidedeck/diagrams";
import { captureError, createDiagramRepairer, createSlideExtractor, flushSentry } from "@guidedeck/openai";
import {
  ConfigError,
  DEFAULT_CONFIG_FILENAME,
  createLogger,
  loadDeckConfig,
  resolveCacheDir,
} from "@guidedeck/shared";
import type { DeckConfig, Logger } from "@guidedeck/shared";

import { runBatch } from "./batch.js";
import type { BatchSummary } from "./batch.js";
import { buildDeck } from "./buildDeck.js";
import type { BuildDeckResult, PipelineCollaborators } from "./buildDeck.js";

export type BuildArgs = {
  inputs: string[];
  configPath: string;
  outDir?: string;
  force: boolean;
};

export const BUILD_USAGE = "usage: build [--config <file>] [--out <dir>] [--force] <input...>";

export function parseBuildArgs(argv: readonly string[]): BuildArgs {
  const args: BuildArgs = { inputs: [], configPath: DEFAULT_CONFIG_FILENAME, force: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    const value = (): string => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new ConfigError(`${arg} needs a value\n${BUILD_USAGE}`);
      }
      i += 1;
      return next;
    };

    if (arg === "--config" || arg === "-c") args.configPath = value();
    else if (arg === "--out" || arg === "-o") args.outDir = value();
    else if (arg === "--force") args.force = true;
    else if (arg.startsWith("--")) throw new ConfigError(`Unknown option ${arg}\n${BUILD_USAGE}`);
    else args.inputs.push(arg);
  }

  if (args.inputs.length === 0) {
    throw new ConfigError(`No input files given\n${BUILD_USAGE}`);
  }
  return args;
}

function imageStoreFromEnv(env: NodeJS.ProcessEnv, logger: Logger): ImageStore | undefined {
  const url = env.SUPABASE_URL;
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;
  const bucket = env.GUIDEDECK_IMAGE_BUCKET;
  if (!url || !serviceRoleKey || !bucket) return undefined;
  return createSupabaseImageStore({ url, serviceRoleKey, bucket, logger });
}

/**
 * Production collaborators: Mermaid CLI rendering, HTTP image fetch, and the
 * OpenAI adapters when OPENAI_API_KEY is set.
 */
export async function createCollaborators(
  config: DeckConfig,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineCollaborators> {
  const cache = await AssetCache.open({ cacheDir: resolveCacheDir(config), logger: logger.child("cache") });
  const hasOpenAi = Boolean(env.OPENAI_API_KEY);

  return {
    cache,
    renderer: new MermaidCliRenderer({ configPath: config.mermaid_config, logger: logger.child("mermaid") }),
    extractor: hasOpenAi ? createSlideExtractor({ model: config.model, logger: logger.child("extract") }) : undefined,
    repairer: hasOpenAi ? createDiagramRepairer({ model: config.model, logger: logger.child("repair") }) : null,
    fetcher: new HttpImageFetcher({ logger: logger.child("fetch") }),
    store: imageStoreFromEnv(env, logger.child("store")),
    reportError: (error, context) => captureError("diagrams", error, context),
    logger,
  };
}

export type RunBuildDeps = {
  createCollaborators?: (config: DeckConfig, logger: Logger) => Promise<PipelineCollaborators>;
  logger?: Logger;
};

export async function runBuild(args: BuildArgs, deps: RunBuildDeps = {}): Promise<BatchSummary<BuildDeckResult>> {
  const loaded = await loadDeckConfig(args.configPath, { logger: deps.logger });
  const config: DeckConfig = args.force ? { ...loaded, force_json: true } : loaded;
  const logger = deps.logger ?? createLogger({ level: config.log_level });
  const collaborators = await (deps.createCollaborators ?? createCollaborators)(config, logger);

  const summary = await runBatch(
    args.inputs,
    (source) => buildDeck({ source, config, collaborators, outDir: args.outDir }),
    {
      logger,
      onError: (error, input) => captureError("pipeline", error, { input }),
    },
  );
  await flushSentry();
  return summary;
}
