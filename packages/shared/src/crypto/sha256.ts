import { createHash } from "node:crypto";

export function hashBytesSha256(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/** Hash of the exact UTF-8 text; whitespace is significant. */
export function hashTextSha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}
