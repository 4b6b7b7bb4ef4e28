import path from "node:path";

import { createClient } from "@supabase/supabase-js";

import { AssetError, buildImageObjectKey, hashBytesSha256, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

import { contentTypeForPath } from "./util.js";

/** Publishes image bytes and returns a URL that slide viewers can load. */
export interface ImageStore {
  upload(bytes: Uint8Array, meta: { filename: string; contentType?: string }): Promise<string>;
}

type StorageBucket = {
  upload(
    objectKey: string,
    body: Uint8Array,
    options: { contentType: string; upsert: boolean },
  ): Promise<{ error: { message: string } | null }>;
  getPublicUrl(objectKey: string): { data: { publicUrl: string } };
};

/** The slice of a Supabase client the image store touches. */
export type StorageClient = {
  storage: { from(bucket: string): StorageBucket };
};

export type SupabaseImageStoreOptions = {
  client: StorageClient;
  bucket: string;
  logger?: Logger;
};

export class SupabaseImageStore implements ImageStore {
  private readonly client: StorageClient;
  private readonly bucket: string;
  private readonly logger: Logger;

  constructor(options: SupabaseImageStoreOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Upload under a content-addressed key. Treats "already exists" as success,
   * since the same bytes always map to the same object.
   */
  async upload(bytes: Uint8Array, meta: { filename: string; contentType?: string }): Promise<string> {
    const objectKey = buildImageObjectKey({
      contentHash: hashBytesSha256(bytes),
      extension: path.extname(meta.filename) || ".bin",
    });
    const bucket = this.client.storage.from(this.bucket);

    const { error } = await bucket.upload(objectKey, bytes, {
      contentType: meta.contentType ?? contentTypeForPath(meta.filename),
      upsert: false,
    });

    if (error && !error.message.toLowerCase().includes("already exists")) {
      throw new AssetError(`Image upload failed: ${error.message}`);
    }

    const url = bucket.getPublicUrl(objectKey).data.publicUrl;
    this.logger.info("Published image", { filename: meta.filename, objectKey, reused: Boolean(error) });
    return url;
  }
}

export function createSupabaseImageStore(params: {
  url: string;
  serviceRoleKey: string;
  bucket: string;
  logger?: Logger;
}): SupabaseImageStore {
  const client = createClient(params.url, params.serviceRoleKey, {
    auth: { persistSession: false },
  });
  return new SupabaseImageStore({ client, bucket: params.bucket, logger: params.logger });
}
