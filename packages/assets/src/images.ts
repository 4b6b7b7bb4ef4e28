import fs from "node:fs/promises";
import path from "node:path";

import { AssetError, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

import type { AssetCache } from "./cache.js";
import type { FetchedImage, ImageFetcher } from "./fetch.js";
import { detectImageExtension } from "./util.js";

export type ResolveRemoteImageParams = {
  cache: AssetCache;
  fetcher: ImageFetcher;
  category?: string | null;
  /** When given, the cached file is also copied here and this path returned. */
  localPath?: string;
  logger?: Logger;
};

async function copyTo(source: string, target: string): Promise<string> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.copyFile(source, target);
  return target;
}

/**
 * Local path for a remote image, downloading and caching it on first use.
 */
export async function resolveRemoteImage(url: string, params: ResolveRemoteImageParams): Promise<string> {
  const log = params.logger ?? silentLogger;

  const cached = await params.cache.lookup("images", url);
  if (cached) {
    log.debug("Using cached image", { url, path: cached.path });
    return params.localPath ? copyTo(cached.path, params.localPath) : cached.path;
  }

  log.info("Downloading image", { url });
  let fetched: FetchedImage;
  try {
    fetched = await params.fetcher.fetch(url);
  } catch (error) {
    throw new AssetError(`Unable to download image ${url}`, { cause: error });
  }

  const entry = await params.cache.putImage({
    url,
    bytes: fetched.bytes,
    extension: detectImageExtension(fetched.contentType, url),
    category: params.category,
  });

  return params.localPath ? copyTo(entry.path, params.localPath) : entry.path;
}
