import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { LOG_LEVELS } from "./enums.js";
import type { LogLevel } from "./enums.js";
import { ConfigError, isNotFoundError } from "./errors.js";
import type { Logger } from "./logger.js";
import { logger as defaultLogger } from "./logger.js";
import { DeckConfigSchema } from "./schemas/deckConfig.js";
import type { DeckConfig } from "./schemas/deckConfig.js";
import { isRecord } from "./guards.js";

export const DEFAULT_CONFIG_FILENAME = "guidedeck.config.json";

export function defaultCacheDir(): string {
  return path.join(os.homedir(), ".guidedeck", "assets");
}

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.GUIDEDECK_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return undefined;
  return LOG_LEVELS.find((level) => level === raw);
}

function applyEnvOverrides(input: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const cacheDir = env.GUIDEDECK_CACHE_DIR?.trim();
  const logLevel = envLogLevel(env);
  return {
    ...input,
    ...(cacheDir ? { cache_dir: cacheDir } : {}),
    ...(logLevel ? { log_level: logLevel } : {}),
  };
}

export function parseDeckConfig(input: unknown, env: NodeJS.ProcessEnv = process.env): DeckConfig {
  const base = isRecord(input) ? input : {};
  const parsed = DeckConfigSchema.safeParse(applyEnvOverrides(base, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load the JSON configuration file. A missing file yields the defaults; a file
 * that exists but does not parse or validate is a ConfigError.
 */
export async function loadDeckConfig(
  configPath: string = DEFAULT_CONFIG_FILENAME,
  options: { env?: NodeJS.ProcessEnv; logger?: Logger } = {},
): Promise<DeckConfig> {
  const log = options.logger ?? defaultLogger;
  const env = options.env ?? process.env;

  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) {
      log.warn("Config file not found, using defaults", { configPath });
      return parseDeckConfig({}, env);
    }
    throw new ConfigError(`Unable to read config file ${configPath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: error });
  }
  return parseDeckConfig(json, env);
}

export function resolveCacheDir(config: DeckConfig): string {
  return config.cache_dir ?? defaultCacheDir();
}
