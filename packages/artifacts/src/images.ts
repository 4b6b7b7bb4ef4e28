import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { contentTypeForPath, detectImageExtension, isRemoteRef, resolveRemoteImage } from "@guidedeck/assets";
import type { AssetCache, ImageFetcher } from "@guidedeck/assets";
import { errorMessage, isNotFoundError, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

export type LoadedImage = {
  bytes: Uint8Array;
  contentType: string;
};

export type ImageLoaderOptions = {
  /** Directory relative references are resolved against. */
  baseDir: string;
  fetcher: ImageFetcher;
  /** Remote images go through the asset cache when one is given. */
  cache?: AssetCache;
  logger?: Logger;
};

export function isDataUri(ref: string): boolean {
  return ref.startsWith("data:");
}

export function resolveLocalImagePath(ref: string, baseDir: string): string {
  if (ref.startsWith("file://")) return fileURLToPath(ref);
  return path.isAbsolute(ref) ? ref : path.resolve(baseDir, ref);
}

export function toDataUri(image: LoadedImage): string {
  return `data:${image.contentType};base64,${Buffer.from(image.bytes).toString("base64")}`;
}

async function loadRemote(url: string, options: ImageLoaderOptions): Promise<LoadedImage> {
  if (options.cache) {
    const cachedPath = await resolveRemoteImage(url, {
      cache: options.cache,
      fetcher: options.fetcher,
      logger: options.logger,
    });
    return { bytes: await fs.readFile(cachedPath), contentType: contentTypeForPath(cachedPath) };
  }
  const fetched = await options.fetcher.fetch(url);
  const contentType = fetched.contentType?.split(";")[0]?.trim();
  return {
    bytes: fetched.bytes,
    contentType: contentType || contentTypeForPath(`image${detectImageExtension(null, url)}`),
  };
}

/**
 * Bytes for an image reference (URL, file URL or path). Returns null and logs
 * a warning when the image cannot be read; callers skip or link it instead.
 */
export async function loadImage(ref: string, options: ImageLoaderOptions): Promise<LoadedImage | null> {
  const log = options.logger ?? silentLogger;

  if (isRemoteRef(ref)) {
    try {
      return await loadRemote(ref, options);
    } catch (error) {
      log.warn("Unable to fetch image", { ref, error: errorMessage(error) });
      return null;
    }
  }

  const filePath = resolveLocalImagePath(ref, options.baseDir);
  try {
    return { bytes: await fs.readFile(filePath), contentType: contentTypeForPath(filePath) };
  } catch (error) {
    if (isNotFoundError(error)) {
      log.warn("Image file not found", { ref, path: filePath });
    } else {
      log.warn("Unable to read image", { ref, path: filePath, error: errorMessage(error) });
    }
    return null;
  }
}
