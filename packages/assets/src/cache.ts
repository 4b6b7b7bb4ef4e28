import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import {
  AssetError,
  buildCachedDiagramFilename,
  buildCachedImageFilename,
  errorMessage,
  hashTextSha256,
  isNotFoundError,
  silentLogger,
} from "@guidedeck/shared";
import type { AssetGroup, Logger } from "@guidedeck/shared";

import { FileLock } from "./lock.js";

export const CACHE_INDEX_FILENAME = "asset_cache.json";

const CacheEntrySchema = z.object({
  path: z.string(),
  category: z.string().nullable().optional(),
  type: z.string().optional(),
  hash: z.string(),
  timestamp: z.number(),
});

const CacheIndexSchema = z.object({
  images: z.record(z.string(), CacheEntrySchema).default({}),
  diagrams: z.record(z.string(), CacheEntrySchema).default({}),
  last_updated: z.number().nullable().default(null),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;
export type CacheIndex = z.infer<typeof CacheIndexSchema>;

export type CachedAsset = {
  group: AssetGroup;
  key: string;
  entry: CacheEntry;
};

export type AssetCacheOptions = {
  cacheDir: string;
  logger?: Logger;
  /** How long a writer waits for the index lock before giving up. */
  lockTimeoutMs?: number;
  /** A lock file older than this is assumed abandoned and removed. */
  staleLockMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type PutImageParams = {
  /** Source URL of the image; the cache key. */
  url: string;
  bytes: Uint8Array;
  extension: string;
  category?: string | null;
};

export type PutDiagramParams = {
  /** SHA-256 of the diagram source text. */
  sourceHash: string;
  pngPath: string;
  svgPath?: string | null;
  kind: string;
};

export type CleanOptions = {
  olderThanDays?: number;
  all?: boolean;
};

const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
const DEFAULT_STALE_LOCK_MS = 30_000;
const SECONDS_PER_DAY = 86_400;

function emptyIndex(): CacheIndex {
  return { images: {}, diagrams: {}, last_updated: null };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

export function svgSiblingPath(pngPath: string): string {
  return pngPath.replace(/\.png$/i, ".svg");
}

/**
 * Content-addressed local store of downloaded images and rendered diagrams,
 * indexed by `asset_cache.json`. Index writes are serialized across processes
 * with an exclusive lock file and land via write-then-rename.
 */
export class AssetCache {
  readonly cacheDir: string;
  readonly indexPath: string;
  readonly lockPath: string;

  private readonly logger: Logger;
  private readonly lock: FileLock;
  private readonly now: () => number;

  private constructor(options: AssetCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.indexPath = path.join(options.cacheDir, CACHE_INDEX_FILENAME);
    this.lockPath = `${this.indexPath}.lock`;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.lock = new FileLock({
      lockPath: this.lockPath,
      timeoutMs: options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
      staleMs: options.staleLockMs ?? DEFAULT_STALE_LOCK_MS,
      now: this.now,
      sleep: options.sleep,
      logger: this.logger,
    });
  }

  static async open(options: AssetCacheOptions): Promise<AssetCache> {
    const cache = new AssetCache(options);
    try {
      await fs.mkdir(cache.dirFor("images"), { recursive: true });
      await fs.mkdir(cache.dirFor("diagrams"), { recursive: true });
    } catch (error) {
      throw new AssetError(`Unable to create asset cache at ${cache.cacheDir}`, { cause: error });
    }
    return cache;
  }

  dirFor(group: AssetGroup): string {
    return path.join(this.cacheDir, group);
  }

  async readIndex(): Promise<CacheIndex> {
    let text: string;
    try {
      text = await fs.readFile(this.indexPath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) return emptyIndex();
      throw new AssetError(`Unable to read cache index ${this.indexPath}`, { cause: error });
    }

    try {
      return CacheIndexSchema.parse(JSON.parse(text));
    } catch (error) {
      this.logger.warn("Cache index unreadable, starting empty", {
        indexPath: this.indexPath,
        error: errorMessage(error),
      });
      return emptyIndex();
    }
  }

  /**
   * Entry for `key`, or null when absent or when its file has gone missing.
   */
  async lookup(group: AssetGroup, key: string): Promise<CacheEntry | null> {
    const index = await this.readIndex();
    const entry = index[group][key];
    if (!entry) return null;
    if (!(await fileExists(entry.path))) {
      this.logger.debug("Cache entry is stale", { group, key, path: entry.path });
      return null;
    }
    return entry;
  }

  async putImage(params: PutImageParams): Promise<CacheEntry> {
    const urlHash = hashTextSha256(params.url).slice(0, 10);
    const target = path.join(
      this.dirFor("images"),
      buildCachedImageFilename({ urlHash, extension: params.extension }),
    );
    await this.writeAsset(target, params.bytes);

    const entry: CacheEntry = {
      path: target,
      category: params.category ?? null,
      hash: urlHash,
      timestamp: this.timestampSeconds(),
    };
    await this.updateIndex((index) => {
      index.images[params.url] = entry;
    });
    return entry;
  }

  async putDiagram(params: PutDiagramParams): Promise<CacheEntry> {
    const target = path.join(
      this.dirFor("diagrams"),
      buildCachedDiagramFilename({ sourceHash: params.sourceHash, extension: ".png" }),
    );
    await this.copyAsset(params.pngPath, target);

    if (params.svgPath && (await fileExists(params.svgPath))) {
      await this.copyAsset(params.svgPath, svgSiblingPath(target));
    }

    const entry: CacheEntry = {
      path: target,
      type: params.kind,
      hash: params.sourceHash,
      timestamp: this.timestampSeconds(),
    };
    await this.updateIndex((index) => {
      index.diagrams[params.sourceHash] = entry;
    });
    return entry;
  }

  async list(filter: { group?: AssetGroup; category?: string } = {}): Promise<CachedAsset[]> {
    const index = await this.readIndex();
    const groups: AssetGroup[] = filter.group ? [filter.group] : ["images", "diagrams"];
    const out: CachedAsset[] = [];
    for (const group of groups) {
      for (const [key, entry] of Object.entries(index[group])) {
        if (filter.category !== undefined && entry.category !== filter.category) continue;
        out.push({ group, key, entry });
      }
    }
    return out;
  }

  /**
   * Remove entries (and their files) older than `olderThanDays`, or every
   * entry with `all`. Returns the number removed per group.
   */
  async clean(options: CleanOptions = {}): Promise<Record<AssetGroup, number>> {
    const threshold = this.timestampSeconds() - (options.olderThanDays ?? 30) * SECONDS_PER_DAY;
    const removed: Record<AssetGroup, number> = { images: 0, diagrams: 0 };

    await this.updateIndex(async (index) => {
      for (const group of ["images", "diagrams"] as const) {
        for (const [key, entry] of Object.entries(index[group])) {
          if (!options.all && entry.timestamp >= threshold) continue;
          await fs.rm(entry.path, { force: true });
          if (group === "diagrams") await fs.rm(svgSiblingPath(entry.path), { force: true });
          delete index[group][key];
          removed[group] += 1;
        }
      }
    });

    this.logger.info("Cleaned asset cache", removed);
    return removed;
  }

  private timestampSeconds(): number {
    return this.now() / 1000;
  }

  private async writeAsset(target: string, bytes: Uint8Array): Promise<void> {
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, bytes);
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw new AssetError(`Unable to write cached asset ${target}`, { cause: error });
    }
  }

  private async copyAsset(source: string, target: string): Promise<void> {
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await fs.copyFile(source, tmp);
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw new AssetError(`Unable to copy ${source} into the asset cache`, { cause: error });
    }
  }

  private async updateIndex(mutate: (index: CacheIndex) => void | Promise<void>): Promise<void> {
    await this.lock.withLock(async () => {
      const index = await this.readIndex();
      await mutate(index);
      index.last_updated = this.timestampSeconds();

      const tmp = `${this.indexPath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, `${JSON.stringify(index, null, 2)}\n`, "utf8");
      await fs.rename(tmp, this.indexPath);
    });
  }
}
