import path from "node:path";

const EXTENSION_BY_CONTENT_TYPE: Array<[string, string]> = [
  ["image/png", ".png"],
  ["image/jpeg", ".jpg"],
  ["image/jpg", ".jpg"],
  ["image/gif", ".gif"],
  ["image/svg+xml", ".svg"],
  ["image/webp", ".webp"],
];

const CONTENT_TYPE_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
};

export function isRemoteRef(ref: string): boolean {
  return /^https?:\/\//i.test(ref.trim());
}

export function getHostname(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Extension for a fetched image, from the response type first and the URL path
 * second. Unknown images are assumed to be JPEG.
 */
export function detectImageExtension(contentType: string | null, url: string): string {
  const lowerType = (contentType ?? "").toLowerCase();
  for (const [type, ext] of EXTENSION_BY_CONTENT_TYPE) {
    if (lowerType.includes(type)) return ext;
  }

  try {
    const ext = path.extname(new URL(url).pathname).toLowerCase();
    if (ext) return ext;
  } catch {
    const ext = path.extname(url).toLowerCase();
    if (ext) return ext;
  }

  return ".jpg";
}

export function contentTypeForPath(filePath: string): string {
  return CONTENT_TYPE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}
