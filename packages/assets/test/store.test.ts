import { describe, expect, it, vi } from "vitest";

import { AssetError, hashBytesSha256 } from "@guidedeck/shared";

import { SupabaseImageStore } from "../src/store.js";
import type { StorageClient } from "../src/store.js";

function makeClient(uploadError: { message: string } | null = null) {
  const upload = vi.fn(async () => ({ error: uploadError }));
  const getPublicUrl = vi.fn((objectKey: string) => ({
    data: { publicUrl: `https://storage.example.test/public/${objectKey}` },
  }));
  const from = vi.fn(() => ({ upload, getPublicUrl }));
  const client: StorageClient = { storage: { from } };
  return { client, upload, from };
}

describe("SupabaseImageStore", () => {
  const bytes = new Uint8Array([1, 2, 3, 4]);
  const expectedKey = `images/${hashBytesSha256(bytes)}.png`;

  it("uploads under a content-addressed key and returns the public url", async () => {
    const { client, upload, from } = makeClient();
    const store = new SupabaseImageStore({ client, bucket: "slides" });

    const url = await store.upload(bytes, { filename: "chart.PNG" });

    expect(from).toHaveBeenCalledWith("slides");
    expect(upload).toHaveBeenCalledWith(expectedKey, bytes, { contentType: "image/png", upsert: false });
    expect(url).toBe(`https://storage.example.test/public/${expectedKey}`);
  });

  it("treats an existing object as success", async () => {
    const { client } = makeClient({ message: "The resource already exists" });
    const store = new SupabaseImageStore({ client, bucket: "slides" });

    await expect(store.upload(bytes, { filename: "chart.png" })).resolves.toBe(
      `https://storage.example.test/public/${expectedKey}`,
    );
  });

  it("raises other upload errors", async () => {
    const { client } = makeClient({ message: "permission denied" });
    const store = new SupabaseImageStore({ client, bucket: "slides" });

    await expect(store.upload(bytes, { filename: "chart.png" })).rejects.toThrow(AssetError);
  });
});
